// Algorithm registry
export {
  HASH_ALGORITHMS,
  ALGORITHM_REGISTRY,
  DEFAULT_ALGORITHM,
  isHashAlgorithm,
  getAlgorithmMeta,
  supportedAlgorithms,
} from './algorithms.js';
export type { HashAlgorithm, AlgorithmMeta } from './algorithms.js';
export { resolveDigest, digestLength } from './digest.js';
export type { DigestFunction } from './digest.js';

// Canonical tree
export type {
  CanonicalNode,
  CanonicalScalar,
  CanonicalMap,
  CanonicalList,
  ScalarValue,
} from './types/index.js';
export { DEFAULT_MAX_DEPTH, ROOT_PATH } from './canonical-spec.js';
export { classifyValue } from './classify.js';
export type { ValueClass } from './classify.js';

// Field selection
export { SchemaRegistry, defaultSchemaRegistry, hashable } from './schema.js';
export type {
  FieldDescriptor,
  FieldSchemaProvider,
  HashableField,
  Constructor,
} from './schema.js';

// Pipeline (pure functions, no I/O)
export { canonicalize } from './canonicalize.js';
export type { CanonicalizeOptions } from './canonicalize.js';
export { canonicalJson, canonicalBytes, jsonEncoder } from './encoder.js';
export type { CanonicalEncoder } from './encoder.js';
export { hashObject, tryHashObject, createHasher } from './hash.js';
export type { HashOptions, HashResult, Hasher, HasherInit } from './hash.js';

// Configuration
export {
  HasherConfigSchema,
  ENV_KEYS,
  parseConfig,
  loadConfig,
  loadDefaultAlgorithm,
  loadDefaultMaxDepth,
  getDefaultMaxDepth,
  getProcessConfig,
  getDefaultAlgorithm,
} from './config.js';
export type { HasherConfig } from './config.js';

// Errors
export {
  DigestError,
  UnsupportedAlgorithmError,
  FieldAccessError,
  EncodingError,
  CyclicValueError,
  DepthLimitError,
  SchemaError,
  ConfigurationError,
} from './errors.js';
