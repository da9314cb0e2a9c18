/**
 * Embedder Module
 *
 * Maps text to fixed-dimension vectors, with a deterministic fallback.
 */

export { Embedder, EmbeddingTimeoutError } from './embedder.js';
export { createEmbedder } from './provider.js';
export { HashEmbeddingProvider, hashEmbedding, HASH_MODEL_NAME } from './hash-provider.js';
export { OllamaEmbeddingProvider, DEFAULT_OLLAMA_HOST, modelMatches } from './ollama-provider.js';
export type { OllamaProviderOptions } from './ollama-provider.js';
export type {
  EmbeddingProvider,
  EmbeddingResult,
  EmbedRequestOptions,
  EmbeddingSource,
  EncodeResult,
  EmbedderOptions,
  EmbeddingConfig,
  CreateEmbedderOptions,
} from './types.js';
