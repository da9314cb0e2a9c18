/**
 * Embedder Types
 *
 * Type definitions for turning text into fixed-dimension vectors.
 *
 * Architecture Decision:
 * - Providers return `number[]` (what JSON APIs hand back)
 * - The index stores `Float32Array` (4 bytes per dimension)
 * - The Embedder converts at the boundary and owns the fallback policy
 */

import type { Logger } from '../../utils/index.js';

/**
 * One embedding from a provider.
 */
export interface EmbeddingResult {
  /** The vector */
  embedding: number[];

  /** Model that produced it */
  model: string;

  /** Approximate input tokens, when the provider reports it */
  tokenCount?: number;
}

/**
 * Per-request options for a provider call.
 */
export interface EmbedRequestOptions {
  /** Aborted when the caller stops waiting (e.g. on timeout) */
  signal?: AbortSignal;
}

/**
 * Anything that can embed text: a served model or the hash encoder.
 */
export interface EmbeddingProvider {
  /** Human-readable provider name for logs */
  readonly name: string;

  /** Vector length this provider is expected to return */
  readonly dimensions: number;

  embed(text: string): Promise<EmbeddingResult>;

  embedBatch(texts: string[], options?: EmbedRequestOptions): Promise<EmbeddingResult[]>;

  /** Probe whether the provider can serve requests right now */
  isAvailable(): Promise<boolean>;
}

/**
 * Which path produced a set of vectors.
 * `fallback` if any batch fell back to the hash encoder.
 */
export type EmbeddingSource = 'model' | 'fallback';

/**
 * Result of Embedder.encode: one vector per input, in input order.
 */
export interface EncodeResult {
  vectors: Float32Array[];
  source: EmbeddingSource;
}

/**
 * Options for the Embedder.
 */
export interface EmbedderOptions {
  /**
   * Number of texts per provider request.
   * @default 32
   */
  batchSize?: number;

  /**
   * Timeout in milliseconds for one batch.
   * A batch that takes longer is re-encoded with the fallback.
   * @default 120000 (2 minutes)
   */
  timeout?: number;

  /**
   * Progress callback, fired after each batch completes.
   */
  onProgress?: (processed: number, total: number) => void;

  /** Receives fallback warnings */
  logger?: Logger;
}

/**
 * Embedding configuration.
 * Matches the [embedding] section in config.toml.
 */
export interface EmbeddingConfig {
  provider: 'ollama' | 'hash';
  model: string;
  dimensions: number;
  batch_size: number;
  timeout_ms: number;
  max_tokens: number;
}

/**
 * Options for createEmbedder.
 */
export interface CreateEmbedderOptions {
  /** Ollama base URL (default: OLLAMA_HOST or http://localhost:11434) */
  host?: string;

  /** Receives startup and fallback warnings */
  logger?: Logger;

  /** Fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
}
