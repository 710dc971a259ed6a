// ─── HASH ALGORITHM IDS (SINGLE SOURCE OF TRUTH) ───

export const HASH_ALGORITHMS = {
  SHA256: 'SHA-256',
  SHA384: 'SHA-384',
  SHA512: 'SHA-512',
  SHA1: 'SHA-1',
  MD5: 'MD5',
} as const;

export type HashAlgorithm = typeof HASH_ALGORITHMS[keyof typeof HASH_ALGORITHMS];

// ─── PER-ALGORITHM METADATA ───

export interface AlgorithmMeta {
  algorithm: HashAlgorithm;
  /** Name understood by node:crypto createHash(). */
  nodeName: string;
  digestLength: number;
  lifecycle: 'active' | 'legacy';
  description: string;
}

export const ALGORITHM_REGISTRY: readonly AlgorithmMeta[] = [
  {
    algorithm: HASH_ALGORITHMS.SHA256,
    nodeName: 'sha256',
    digestLength: 32,
    lifecycle: 'active',
    description: 'SHA-2, 256-bit digest (default)',
  },
  {
    algorithm: HASH_ALGORITHMS.SHA384,
    nodeName: 'sha384',
    digestLength: 48,
    lifecycle: 'active',
    description: 'SHA-2, 384-bit digest',
  },
  {
    algorithm: HASH_ALGORITHMS.SHA512,
    nodeName: 'sha512',
    digestLength: 64,
    lifecycle: 'active',
    description: 'SHA-2, 512-bit digest',
  },
  {
    algorithm: HASH_ALGORITHMS.SHA1,
    nodeName: 'sha1',
    digestLength: 20,
    lifecycle: 'legacy',
    description: 'SHA-1, kept for digests computed by older deployments',
  },
  {
    algorithm: HASH_ALGORITHMS.MD5,
    nodeName: 'md5',
    digestLength: 16,
    lifecycle: 'legacy',
    description: 'MD5, not collision resistant',
  },
] as const;

export const DEFAULT_ALGORITHM: HashAlgorithm = HASH_ALGORITHMS.SHA256;

const SUPPORTED: readonly HashAlgorithm[] = Object.freeze(
  ALGORITHM_REGISTRY.map(m => m.algorithm),
);

// ─── HELPERS ───

export function isHashAlgorithm(id: string): id is HashAlgorithm {
  return SUPPORTED.some(a => a === id);
}

export function getAlgorithmMeta(id: HashAlgorithm): AlgorithmMeta | undefined {
  return ALGORITHM_REGISTRY.find(m => m.algorithm === id);
}

/**
 * Algorithm ids usable with hashObject(). Same array for the process lifetime.
 */
export function supportedAlgorithms(): readonly HashAlgorithm[] {
  return SUPPORTED;
}
