export type {
  ScalarValue,
  CanonicalScalar,
  CanonicalMap,
  CanonicalList,
  CanonicalNode,
} from './canonical.js';
