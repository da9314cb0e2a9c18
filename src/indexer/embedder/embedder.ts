/**
 * Embedder
 *
 * Turns text into vectors for the index, one vector per input in input order.
 *
 * Key responsibilities:
 * 1. Batch texts for the primary provider (default: 32 per batch)
 * 2. Race each batch against a timeout
 * 3. Re-encode any batch that throws, times out or returns malformed
 *    vectors with the deterministic hash encoder
 * 4. Report whether any vector came from the fallback
 *
 * Embedding failures never propagate to callers.
 */

import { silentLogger, type Logger } from '../../utils/index.js';
import { HashEmbeddingProvider } from './hash-provider.js';
import type { EmbedderOptions, EmbeddingProvider, EncodeResult } from './types.js';

/** Default batch size - 32 is a good balance of speed vs memory */
const DEFAULT_BATCH_SIZE = 32;

/** Default per-batch timeout (2 minutes) */
const DEFAULT_TIMEOUT_MS = 120_000;

/**
 * Error raised when a batch takes longer than the configured timeout.
 */
export class EmbeddingTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Embedding batch timed out after ${timeoutMs}ms`);
    this.name = 'EmbeddingTimeoutError';
  }
}

/**
 * Run a request against a timeout, clearing the timer either way.
 * On timeout the request's signal is aborted.
 */
async function withTimeout<T>(run: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new EmbeddingTimeoutError(timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([run(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export class Embedder {
  /** Vector length of every vector this Embedder returns */
  readonly dimensions: number;

  private readonly fallback: HashEmbeddingProvider;
  private readonly batchSize: number;
  private readonly timeout: number;
  private readonly logger: Logger;
  private readonly onProgress?: (processed: number, total: number) => void;

  /**
   * @param primary - Served model provider, or null for fallback-only mode
   */
  constructor(
    private readonly primary: EmbeddingProvider | null,
    dimensions: number,
    options: EmbedderOptions = {}
  ) {
    this.dimensions = dimensions;
    this.fallback = new HashEmbeddingProvider(dimensions);
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
    this.onProgress = options.onProgress;
  }

  /**
   * True when no served model is in use.
   */
  get fallbackOnly(): boolean {
    return this.primary === null;
  }

  /**
   * Name of the provider that serves normal requests.
   */
  get providerName(): string {
    return this.primary?.name ?? this.fallback.name;
  }

  /**
   * Encode texts. `source` is "fallback" when any vector came from
   * the hash encoder, including fallback-only mode.
   */
  async encode(texts: readonly string[]): Promise<EncodeResult> {
    if (texts.length === 0) {
      return { vectors: [], source: this.primary ? 'model' : 'fallback' };
    }

    if (!this.primary) {
      const vectors = this.fallback.encodeSync(texts);
      this.onProgress?.(texts.length, texts.length);
      return { vectors, source: 'fallback' };
    }

    const vectors: Float32Array[] = [];
    let usedFallback = false;

    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);

      try {
        vectors.push(...(await this.encodeWithPrimary(this.primary, batch)));
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.warn(
          `Embedding with ${this.primary.name} failed for ${batch.length} text(s), using fallback: ${reason}`
        );
        vectors.push(...this.fallback.encodeSync(batch));
        usedFallback = true;
      }

      this.onProgress?.(Math.min(i + batch.length, texts.length), texts.length);
    }

    return { vectors, source: usedFallback ? 'fallback' : 'model' };
  }

  /**
   * Encode a single text.
   */
  async encodeOne(text: string): Promise<{ vector: Float32Array; source: EncodeResult['source'] }> {
    const { vectors, source } = await this.encode([text]);
    return { vector: vectors[0] ?? this.fallback.encodeOneSync(text), source };
  }

  private async encodeWithPrimary(
    primary: EmbeddingProvider,
    batch: string[]
  ): Promise<Float32Array[]> {
    const results = await withTimeout((signal) => primary.embedBatch(batch, { signal }), this.timeout);

    if (results.length !== batch.length) {
      throw new Error(`expected ${batch.length} vectors, got ${results.length}`);
    }

    return results.map((result) => {
      if (result.embedding.length !== this.dimensions) {
        throw new Error(
          `expected ${this.dimensions} dimensions, got ${result.embedding.length}`
        );
      }
      if (!result.embedding.every(Number.isFinite)) {
        throw new Error('vector contains non-finite values');
      }
      return new Float32Array(result.embedding);
    });
  }
}
