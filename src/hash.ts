import type { HashAlgorithm } from './algorithms.js';
import { supportedAlgorithms } from './algorithms.js';
import type { CanonicalMap } from './types/canonical.js';
import type { FieldSchemaProvider } from './schema.js';
import { defaultSchemaRegistry } from './schema.js';
import type { CanonicalEncoder } from './encoder.js';
import { canonicalJson, jsonEncoder } from './encoder.js';
import { canonicalize } from './canonicalize.js';
import { resolveDigest } from './digest.js';
import { getDefaultAlgorithm, getDefaultMaxDepth, parseConfig } from './config.js';
import { DigestError } from './errors.js';

export interface HashOptions {
  /** Defaults to defaultSchemaRegistry. */
  schema?: FieldSchemaProvider;
  /** Defaults to jsonEncoder. */
  encoder?: CanonicalEncoder;
  /** Defaults to FIELD_DIGEST_MAX_DEPTH, or DEFAULT_MAX_DEPTH. */
  maxDepth?: number;
}

export type HashResult = { ok: true; value: string } | { ok: false; error: DigestError };

/**
 * Hash the selected fields of a value.
 *
 * Pipeline: resolve digest -> canonicalize -> encode -> digest -> Base64.
 * The algorithm is resolved first, so an unknown id fails before the value
 * is walked. The configured default algorithm is only read when no algorithm
 * is given.
 *
 * Throws UnsupportedAlgorithmError, FieldAccessError, EncodingError,
 * CyclicValueError or DepthLimitError.
 */
export function hashObject(
  value: unknown,
  algorithm: string = getDefaultAlgorithm(),
  options: HashOptions = {},
): string {
  const digest = resolveDigest(algorithm);
  const tree = canonicalize(value, {
    schema: options.schema,
    maxDepth: options.maxDepth ?? getDefaultMaxDepth(),
  });
  const bytes = (options.encoder ?? jsonEncoder).encode(tree);
  return Buffer.from(digest(bytes)).toString('base64');
}

/**
 * hashObject() with failures returned instead of thrown.
 * Errors that are not DigestErrors still propagate.
 */
export function tryHashObject(
  value: unknown,
  algorithm?: string,
  options?: HashOptions,
): HashResult {
  try {
    return { ok: true, value: hashObject(value, algorithm, options) };
  } catch (err) {
    if (err instanceof DigestError) return { ok: false, error: err };
    throw err;
  }
}

export interface HasherInit {
  schema?: FieldSchemaProvider;
  encoder?: CanonicalEncoder;
  defaultAlgorithm?: string;
  maxDepth?: number;
}

/**
 * Stateless hashing service bound to one schema provider, encoder and
 * default algorithm.
 */
export interface Hasher {
  readonly defaultAlgorithm: HashAlgorithm;
  hash(value: unknown, algorithm?: string): string;
  tryHash(value: unknown, algorithm?: string): HashResult;
  canonicalize(value: unknown): CanonicalMap;
  canonicalString(value: unknown): string;
  supportedAlgorithms(): readonly HashAlgorithm[];
}

export function createHasher(init: HasherInit = {}): Hasher {
  const { defaultAlgorithm, maxDepth } = parseConfig({
    defaultAlgorithm: init.defaultAlgorithm,
    maxDepth: init.maxDepth,
  });
  const options: HashOptions = {
    schema: init.schema ?? defaultSchemaRegistry,
    encoder: init.encoder ?? jsonEncoder,
    maxDepth,
  };

  return {
    defaultAlgorithm,
    hash: (value, algorithm = defaultAlgorithm) => hashObject(value, algorithm, options),
    tryHash: (value, algorithm = defaultAlgorithm) => tryHashObject(value, algorithm, options),
    canonicalize: value => canonicalize(value, options),
    canonicalString: value => canonicalJson(canonicalize(value, options)),
    supportedAlgorithms,
  };
}
