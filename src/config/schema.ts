/**
 * Configuration Schema
 *
 * Defines the shape of ~/.lantern/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Embedding configuration
 * 'ollama' serves a sentence-embedding model from the local runtime;
 * 'hash' skips the model and uses the deterministic digest encoder only.
 */
export const EmbeddingConfigSchema = z.object({
  provider: z
    .enum(['ollama', 'hash'])
    .describe('Embedding provider (ollama for a served model, hash for the deterministic fallback only)'),
  model: z.string().min(1).describe('Embedding model name served by the local runtime'),
  dimensions: z
    .number()
    .int()
    .min(8)
    .max(8192)
    .describe('Embedding vector length; must match the model'),
  batch_size: z
    .number()
    .int()
    .min(1)
    .max(256)
    .default(32)
    .describe('Number of texts to embed per request (1-256, default 32)'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .default(120000)
    .describe('Timeout per embedding request before falling back (default 120000 = 2 minutes)'),
  max_tokens: z
    .number()
    .int()
    .min(16)
    .max(8192)
    .default(512)
    .describe('Token budget each input is truncated to by the model'),
});

/**
 * Chunking configuration (sizes are in characters)
 */
export const ChunkingConfigSchema = z.object({
  chunk_size: z.number().int().min(32).max(100000).describe('Maximum segment length in characters'),
  chunk_overlap: z
    .number()
    .int()
    .min(0)
    .describe('Character budget for the overlap window (0 disables overlap)'),
  overlap_sentences: z.number().int().min(0).max(20).describe('Trailing sentences carried into the next prose segment'),
  overlap_lines: z.number().int().min(0).max(200).describe('Trailing lines carried into the next code segment'),
  locale: z.string().min(2).describe('Locale used for sentence boundary detection'),
});

/**
 * Conversation context configuration
 */
export const ContextConfigSchema = z.object({
  max_tokens: z.number().int().min(1).describe('Token budget for conversation + retrieved context'),
});

/**
 * Vector index configuration
 */
export const IndexConfigSchema = z.object({
  path: z.string().min(1).describe('Base path of the index blob; companions share its stem'),
  m: z.number().int().min(2).max(128).describe('HNSW max connections per node'),
  ef_construction: z.number().int().min(8).max(2000).describe('HNSW build quality'),
  ef_search: z.number().int().min(1).max(2000).describe('HNSW search quality'),
  snapshot_every: z
    .number()
    .int()
    .min(1)
    .describe('Write a snapshot once the write-ahead log holds this many records'),
});

/**
 * Search configuration
 */
export const SearchConfigSchema = z.object({
  top_k: z.number().int().min(1).max(100).describe('Number of results to return'),
});

/**
 * Indexing configuration
 * Controls file discovery when a directory is ingested
 */
export const IndexingConfigSchema = z.object({
  ignore_patterns: z
    .array(z.string())
    .optional()
    .describe('Additional gitignore-style patterns to ignore during ingestion'),
  max_file_size: z
    .number()
    .int()
    .min(1)
    .optional()
    .describe('Files larger than this many bytes are skipped'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  embedding: EmbeddingConfigSchema,
  chunking: ChunkingConfigSchema,
  context: ContextConfigSchema,
  index: IndexConfigSchema,
  search: SearchConfigSchema,
  /** Optional indexing configuration */
  indexing: IndexingConfigSchema.optional(),
});

/**
 * TypeScript type inferred from the schema
 * Use this for type-safe config access throughout the codebase
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
