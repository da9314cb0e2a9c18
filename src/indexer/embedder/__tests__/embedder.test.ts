/**
 * Embedder Tests
 *
 * Tests for batching, timeouts and the deterministic fallback.
 * Uses mock providers; no model server is contacted.
 */

import { describe, it, expect, vi, afterEach, type Mock } from 'vitest';

import { Embedder, EmbeddingTimeoutError } from '../embedder.js';
import { HashEmbeddingProvider, hashEmbedding } from '../hash-provider.js';
import type { EmbeddingProvider, EmbeddingResult } from '../types.js';

const DIMS = 4;

/**
 * Create a mock embedding provider for testing.
 * Returns [length, 1, 2, 3] for each text unless overridden.
 */
function createMockProvider(
  embedBatch: (texts: string[]) => Promise<EmbeddingResult[]> = async (texts) =>
    texts.map((text) => ({ embedding: [text.length, 1, 2, 3], model: 'mock-model' }))
): EmbeddingProvider & { embedBatch: Mock<(texts: string[]) => Promise<EmbeddingResult[]>> } {
  return {
    name: 'mock',
    dimensions: DIMS,
    embed: async (text: string) => ({ embedding: [text.length, 1, 2, 3], model: 'mock-model' }),
    embedBatch: vi.fn(embedBatch),
    isAvailable: async () => true,
  };
}

function createLogger() {
  return { warn: vi.fn<(message: string) => void>(), debug: vi.fn<(message: string) => void>() };
}

describe('hashEmbedding', () => {
  it('reads the MD5 hex digits in order, scaled into [0, 1]', () => {
    // md5('hello') = 5d41402abc4b2a76b9719d911017c592
    expect(hashEmbedding('hello', 4)).toEqual([5 / 15, 13 / 15, 4 / 15, 1 / 15]);
  });

  it('wraps around the digest to fill larger dimensions', () => {
    const vector = hashEmbedding('hello', 40);
    expect(vector).toHaveLength(40);
    expect(vector[32]).toBe(vector[0]);
    expect(vector[39]).toBe(vector[7]);
  });

  it('is deterministic', () => {
    const provider = new HashEmbeddingProvider(384);
    const [a] = provider.encodeSync(['Python is a language.']);
    const [b] = provider.encodeSync(['Python is a language.']);
    expect(a).toEqual(b);
    expect(a?.length).toBe(384);
  });

  it('keeps every value within [0, 1]', () => {
    const vector = hashEmbedding('some other text', 64);
    expect(vector.every((v) => v >= 0 && v <= 1)).toBe(true);
  });
});

describe('Embedder', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('fallback-only mode', () => {
    it('uses hash vectors and reports the fallback source', async () => {
      const embedder = new Embedder(null, DIMS);
      const result = await embedder.encode(['hello', 'world']);

      expect(embedder.fallbackOnly).toBe(true);
      expect(result.source).toBe('fallback');
      expect(result.vectors).toHaveLength(2);
      expect(Array.from(result.vectors[0] ?? [])).toEqual(
        [5, 13, 4, 1].map((digit) => Math.fround(digit / 15))
      );
    });

    it('returns identical vectors for identical input', async () => {
      const embedder = new Embedder(null, 384);
      const first = await embedder.encode(['same text']);
      const second = await embedder.encode(['same text']);
      expect(first.vectors[0]).toEqual(second.vectors[0]);
    });
  });

  describe('with a primary provider', () => {
    it('returns model vectors in input order', async () => {
      const embedder = new Embedder(createMockProvider(), DIMS);
      const result = await embedder.encode(['a', 'bbb']);

      expect(result.source).toBe('model');
      expect(result.vectors.map((v) => Array.from(v))).toEqual([
        [1, 1, 2, 3],
        [3, 1, 2, 3],
      ]);
    });

    it('returns no vectors for no input', async () => {
      const provider = createMockProvider();
      const result = await new Embedder(provider, DIMS).encode([]);

      expect(result).toEqual({ vectors: [], source: 'model' });
      expect(provider.embedBatch).not.toHaveBeenCalled();
    });

    it('splits input into batches', async () => {
      const provider = createMockProvider();
      const onProgress = vi.fn();
      const embedder = new Embedder(provider, DIMS, { batchSize: 2, onProgress });

      const result = await embedder.encode(['a', 'b', 'c', 'd', 'e']);

      expect(result.vectors).toHaveLength(5);
      expect(provider.embedBatch.mock.calls.map(([texts]) => texts)).toEqual([
        ['a', 'b'],
        ['c', 'd'],
        ['e'],
      ]);
      expect(onProgress.mock.calls).toEqual([
        [2, 5],
        [4, 5],
        [5, 5],
      ]);
    });

    it('falls back for a batch that throws and logs a warning', async () => {
      const provider = createMockProvider(async () => {
        throw new Error('connection refused');
      });
      const logger = createLogger();
      const embedder = new Embedder(provider, DIMS, { logger });

      const result = await embedder.encode(['hello']);

      expect(result.source).toBe('fallback');
      expect(result.vectors[0]).toEqual(new Float32Array(hashEmbedding('hello', DIMS)));
      expect(logger.warn).toHaveBeenCalledWith(
        'Embedding with mock failed for 1 text(s), using fallback: connection refused'
      );
    });

    it('falls back only for the failing batch', async () => {
      let calls = 0;
      const provider = createMockProvider(async (texts) => {
        calls++;
        if (calls === 2) throw new Error('boom');
        return texts.map(() => ({ embedding: [9, 9, 9, 9], model: 'mock-model' }));
      });
      const embedder = new Embedder(provider, DIMS, { batchSize: 1 });

      const result = await embedder.encode(['one', 'hello', 'three']);

      expect(result.source).toBe('fallback');
      expect(Array.from(result.vectors[0] ?? [])).toEqual([9, 9, 9, 9]);
      expect(result.vectors[1]).toEqual(new Float32Array(hashEmbedding('hello', DIMS)));
      expect(Array.from(result.vectors[2] ?? [])).toEqual([9, 9, 9, 9]);
    });

    it('falls back when the provider returns the wrong dimension', async () => {
      const provider = createMockProvider(async (texts) =>
        texts.map(() => ({ embedding: [1, 2], model: 'mock-model' }))
      );
      const logger = createLogger();
      const result = await new Embedder(provider, DIMS, { logger }).encode(['hello']);

      expect(result.source).toBe('fallback');
      expect(result.vectors[0]).toHaveLength(DIMS);
      expect(logger.warn.mock.calls[0]?.[0]).toContain('expected 4 dimensions, got 2');
    });

    it('falls back when the provider returns the wrong number of vectors', async () => {
      const provider = createMockProvider(async () => [{ embedding: [1, 2, 3, 4], model: 'mock-model' }]);
      const result = await new Embedder(provider, DIMS).encode(['a', 'b']);

      expect(result.source).toBe('fallback');
      expect(result.vectors).toHaveLength(2);
    });

    it('falls back when a batch times out', async () => {
      vi.useFakeTimers();
      const provider = createMockProvider(() => new Promise<EmbeddingResult[]>(() => {}));
      const logger = createLogger();
      const embedder = new Embedder(provider, DIMS, { timeout: 1000, logger });

      const pending = embedder.encode(['hello']);
      await vi.advanceTimersByTimeAsync(1000);
      const result = await pending;

      expect(result.source).toBe('fallback');
      expect(logger.warn.mock.calls[0]?.[0]).toContain('timed out after 1000ms');
    });

    it('aborts the provider request when a batch times out', async () => {
      vi.useFakeTimers();
      let received: AbortSignal | undefined;
      const provider: EmbeddingProvider = {
        name: 'slow',
        dimensions: DIMS,
        embed: async () => ({ embedding: [0, 0, 0, 0], model: 'slow' }),
        embedBatch: (_texts, options) => {
          received = options?.signal;
          return new Promise<EmbeddingResult[]>(() => {});
        },
        isAvailable: async () => true,
      };

      const pending = new Embedder(provider, DIMS, { timeout: 1000 }).encode(['hello']);
      expect(received?.aborted).toBe(false);

      await vi.advanceTimersByTimeAsync(1000);
      await pending;

      expect(received?.aborted).toBe(true);
      expect(received?.reason).toBeInstanceOf(EmbeddingTimeoutError);
    });

    it('encodes a single text with encodeOne', async () => {
      const { vector, source } = await new Embedder(createMockProvider(), DIMS).encodeOne('abcd');
      expect(source).toBe('model');
      expect(Array.from(vector)).toEqual([4, 1, 2, 3]);
    });
  });

  it('names the timeout error', () => {
    expect(new EmbeddingTimeoutError(50).name).toBe('EmbeddingTimeoutError');
  });
});
