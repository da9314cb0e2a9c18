/**
 * Ollama Embedding Provider
 *
 * Talks to a local Ollama server:
 * - GET  /api/tags   lists installed models (availability probe)
 * - POST /api/embed  embeds a batch, truncating each input to num_ctx tokens
 *
 * Responses are validated with zod; anything unexpected throws, and the
 * Embedder turns that into a fallback.
 */

import { z } from 'zod';

import type { EmbedRequestOptions, EmbeddingProvider, EmbeddingResult } from './types.js';

export const DEFAULT_OLLAMA_HOST = 'http://localhost:11434';

/** Probe timeout; embedding requests use the Embedder's batch timeout */
const PROBE_TIMEOUT_MS = 5000;

const TagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })),
});

const EmbedResponseSchema = z.object({
  model: z.string().optional(),
  embeddings: z.array(z.array(z.number())),
  prompt_eval_count: z.number().optional(),
});

export interface OllamaProviderOptions {
  /** Model name as installed in Ollama (e.g. "all-minilm") */
  model: string;

  /** Expected vector length */
  dimensions: number;

  /** Server URL (default http://localhost:11434) */
  baseUrl?: string;

  /** Token budget each input is truncated to (default 512) */
  maxTokens?: number;

  /** Fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * Installed model names carry a tag ("all-minilm:latest"); a configured
 * name without one matches any tag.
 */
export function modelMatches(installed: string, wanted: string): boolean {
  return installed === wanted || installed.startsWith(`${wanted}:`);
}

export class OllamaEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'ollama';
  readonly model: string;
  readonly dimensions: number;
  readonly baseUrl: string;
  private readonly maxTokens: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OllamaProviderOptions) {
    this.model = options.model;
    this.dimensions = options.dimensions;
    this.baseUrl = trimTrailingSlash(options.baseUrl ?? DEFAULT_OLLAMA_HOST);
    this.maxTokens = options.maxTokens ?? 512;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async embed(text: string): Promise<EmbeddingResult> {
    const [result] = await this.embedBatch([text]);
    if (!result) {
      throw new Error('Ollama returned no embedding');
    }
    return result;
  }

  async embedBatch(texts: string[], options: EmbedRequestOptions = {}): Promise<EmbeddingResult[]> {
    if (texts.length === 0) {
      return [];
    }

    const response = await this.fetchImpl(`${this.baseUrl}/api/embed`, {
      method: 'POST',
      signal: options.signal,
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.model,
        input: texts,
        truncate: true,
        options: { num_ctx: this.maxTokens },
      }),
    });

    if (!response.ok) {
      throw new Error(`Ollama embed request failed: ${response.status} ${response.statusText}`);
    }

    const parsed = EmbedResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Unexpected Ollama embed response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
    }

    const model = parsed.data.model ?? this.model;
    return parsed.data.embeddings.map((embedding) => ({ embedding, model }));
  }

  /**
   * True when the server answers and has the configured model installed.
   */
  async isAvailable(): Promise<boolean> {
    const response = await this.fetchImpl(`${this.baseUrl}/api/tags`, {
      method: 'GET',
      signal: AbortSignal.timeout(PROBE_TIMEOUT_MS),
    });

    if (!response.ok) {
      return false;
    }

    const parsed = TagsResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      return false;
    }

    return parsed.data.models.some((installed) => modelMatches(installed.name, this.model));
  }
}
