/**
 * Environment Variable Handler
 *
 * Reads the environment-style configuration surface:
 *   EMBEDDING_MODEL, EMBEDDING_DIM, CHUNK_SIZE, CHUNK_OVERLAP,
 *   MAX_CONTEXT_TOKENS, INDEX_FILE, OLLAMA_HOST
 *
 * Supports .env files for local development via dotenv.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../errors/index.js';

// Load .env file (for local development)
// No-op if .env doesn't exist
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/** Blank values count as unset */
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value?.trim() ? value.trim() : undefined));

/** Positive integer given as a string */
const optionalInt = (name: string, min: number) =>
  optionalString.pipe(
    z
      .string()
      .regex(/^\d+$/, `${name} must be a whole number`)
      .transform((value) => Number.parseInt(value, 10))
      .pipe(z.number().int().min(min, `${name} must be at least ${min}`))
      .optional()
  );

export const EnvSchema = z.object({
  EMBEDDING_MODEL: optionalString,
  EMBEDDING_DIM: optionalInt('EMBEDDING_DIM', 8),
  CHUNK_SIZE: optionalInt('CHUNK_SIZE', 32),
  CHUNK_OVERLAP: optionalInt('CHUNK_OVERLAP', 0),
  MAX_CONTEXT_TOKENS: optionalInt('MAX_CONTEXT_TOKENS', 1),
  INDEX_FILE: optionalString,
  OLLAMA_HOST: optionalString.transform((value) => value ?? 'http://localhost:11434'),
});

export type EnvVars = z.infer<typeof EnvSchema>;

// ============================================================================
// PRIVATE STATE
// ============================================================================

/**
 * Cached environment variables (loaded once at first access).
 * Access through loadEnv(); tests reset with _clearEnvCache().
 */
let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Parse an environment object. Throws ConfigError on malformed numbers
 * so a typo like CHUNK_SIZE=5l2 is reported instead of silently ignored.
 */
export function parseEnv(source: NodeJS.ProcessEnv): EnvVars {
  const result = EnvSchema.safeParse({
    EMBEDDING_MODEL: source.EMBEDDING_MODEL,
    EMBEDDING_DIM: source.EMBEDDING_DIM,
    CHUNK_SIZE: source.CHUNK_SIZE,
    CHUNK_OVERLAP: source.CHUNK_OVERLAP,
    MAX_CONTEXT_TOKENS: source.MAX_CONTEXT_TOKENS,
    INDEX_FILE: source.INDEX_FILE,
    OLLAMA_HOST: source.OLLAMA_HOST,
  });

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(
      `Invalid environment override:\n${issues}`,
      'Fix or unset the variables above'
    );
  }

  return result.data;
}

/**
 * Load environment variables from process.env (called once, then cached).
 */
export function loadEnv(): EnvVars {
  if (_envCache === null) {
    _envCache = parseEnv(process.env);
  }
  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Get the Ollama host URL (default http://localhost:11434).
 */
export function getOllamaHost(): string {
  return getEnv('OLLAMA_HOST');
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to stub different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}
