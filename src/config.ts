import { z } from 'zod';
import type { HashAlgorithm } from './algorithms.js';
import { DEFAULT_ALGORITHM, isHashAlgorithm, supportedAlgorithms } from './algorithms.js';
import { DEFAULT_MAX_DEPTH } from './canonical-spec.js';
import { ConfigurationError } from './errors.js';

const AlgorithmSchema = z
  .string()
  .refine(isHashAlgorithm, v => ({
    message: `"${v}" is not one of ${supportedAlgorithms().join(', ')}`,
  }));

export const HasherConfigSchema = z.object({
  defaultAlgorithm: AlgorithmSchema.default(DEFAULT_ALGORITHM),
  maxDepth: z.coerce.number().int().positive().default(DEFAULT_MAX_DEPTH),
});

export interface HasherConfig {
  defaultAlgorithm: HashAlgorithm;
  maxDepth: number;
}

export const ENV_KEYS = {
  ALGORITHM: 'FIELD_DIGEST_ALGORITHM',
  MAX_DEPTH: 'FIELD_DIGEST_MAX_DEPTH',
} as const;

function issueMessages(error: z.ZodError, key?: string): string[] {
  return error.issues.map(i => {
    const path = [...(key ? [key] : []), ...i.path].join('.');
    return `${path || '(root)'}: ${i.message}`;
  });
}

function configError(errors: string[]): ConfigurationError {
  return new ConfigurationError(`Invalid hasher configuration: ${errors.join('; ')}`, errors);
}

function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const v = env[key];
  return v === undefined || v.trim() === '' ? undefined : v.trim();
}

/**
 * Validate a partial config and fill in defaults.
 * Throws ConfigurationError listing every invalid key.
 */
export function parseConfig(input: unknown): HasherConfig {
  const parsed = HasherConfigSchema.safeParse(input ?? {});
  if (!parsed.success) throw configError(issueMessages(parsed.error));
  return parsed.data;
}

/**
 * Read the config from environment variables. Unset or empty variables take
 * their defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): HasherConfig {
  return parseConfig({
    defaultAlgorithm: envValue(env, ENV_KEYS.ALGORITHM),
    maxDepth: envValue(env, ENV_KEYS.MAX_DEPTH),
  });
}

// Single-key loaders: each validates only its own variable.

export function loadDefaultAlgorithm(env: NodeJS.ProcessEnv = process.env): HashAlgorithm {
  const parsed = HasherConfigSchema.shape.defaultAlgorithm.safeParse(envValue(env, ENV_KEYS.ALGORITHM));
  if (!parsed.success) throw configError(issueMessages(parsed.error, 'defaultAlgorithm'));
  return parsed.data;
}

export function loadDefaultMaxDepth(env: NodeJS.ProcessEnv = process.env): number {
  const parsed = HasherConfigSchema.shape.maxDepth.safeParse(envValue(env, ENV_KEYS.MAX_DEPTH));
  if (!parsed.success) throw configError(issueMessages(parsed.error, 'maxDepth'));
  return parsed.data;
}

let defaultAlgorithm: HashAlgorithm | undefined;
let defaultMaxDepth: number | undefined;
let processConfig: HasherConfig | undefined;

/** Read from FIELD_DIGEST_ALGORITHM on first use, then fixed. */
export function getDefaultAlgorithm(): HashAlgorithm {
  defaultAlgorithm ??= loadDefaultAlgorithm();
  return defaultAlgorithm;
}

/** Read from FIELD_DIGEST_MAX_DEPTH on first use, then fixed. */
export function getDefaultMaxDepth(): number {
  defaultMaxDepth ??= loadDefaultMaxDepth();
  return defaultMaxDepth;
}

/**
 * Process-wide config, read from the environment on first use and fixed for
 * the rest of the process lifetime.
 */
export function getProcessConfig(): HasherConfig {
  processConfig ??= { defaultAlgorithm: getDefaultAlgorithm(), maxDepth: getDefaultMaxDepth() };
  return processConfig;
}
