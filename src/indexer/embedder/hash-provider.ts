/**
 * Hash Embedding Provider
 *
 * Deterministic, content-derived vectors used whenever the served model
 * is missing or fails. The MD5 hex digest of the text is read cyclically,
 * one hex digit per dimension, each digit scaled from 0..15 into [0, 1].
 *
 * Identical input always yields a bit-identical vector. Similarity between
 * two hash vectors carries no meaning beyond exact-match equality.
 */

import { createHash } from 'node:crypto';

import type { EmbeddingProvider, EmbeddingResult } from './types.js';

export const HASH_MODEL_NAME = 'md5-digest';

/**
 * Compute the hash vector for one text.
 */
export function hashEmbedding(text: string, dimensions: number): number[] {
  const hex = createHash('md5').update(text, 'utf8').digest('hex');
  return Array.from({ length: dimensions }, (_, i) => parseInt(hex.charAt(i % hex.length), 16) / 15);
}

export class HashEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'hash';

  constructor(readonly dimensions: number) {}

  async embed(text: string): Promise<EmbeddingResult> {
    return {
      embedding: hashEmbedding(text, this.dimensions),
      model: HASH_MODEL_NAME,
      tokenCount: Math.ceil(text.length / 4),
    };
  }

  async embedBatch(texts: string[]): Promise<EmbeddingResult[]> {
    return Promise.all(texts.map((text) => this.embed(text)));
  }

  /** Always available: no model, no network */
  async isAvailable(): Promise<boolean> {
    return true;
  }

  /**
   * Synchronous variants used by the Embedder's fallback path.
   */
  encodeOneSync(text: string): Float32Array {
    return new Float32Array(hashEmbedding(text, this.dimensions));
  }

  encodeSync(texts: readonly string[]): Float32Array[] {
    return texts.map((text) => this.encodeOneSync(text));
  }
}
