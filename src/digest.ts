import { createHash } from 'node:crypto';
import type { HashAlgorithm } from './algorithms.js';
import { getAlgorithmMeta, isHashAlgorithm } from './algorithms.js';
import { UnsupportedAlgorithmError } from './errors.js';

export type DigestFunction = (bytes: Uint8Array) => Uint8Array;

/**
 * Look up the digest function for a registry id.
 * Throws UnsupportedAlgorithmError for anything outside the registry.
 */
export function resolveDigest(algorithm: string): DigestFunction {
  const meta = isHashAlgorithm(algorithm) ? getAlgorithmMeta(algorithm) : undefined;
  if (!meta) throw new UnsupportedAlgorithmError(algorithm);

  const { nodeName } = meta;
  return bytes => new Uint8Array(createHash(nodeName).update(bytes).digest());
}

export function digestLength(algorithm: HashAlgorithm): number {
  const meta = getAlgorithmMeta(algorithm);
  if (!meta) throw new UnsupportedAlgorithmError(algorithm);
  return meta.digestLength;
}
