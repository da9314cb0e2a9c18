/**
 * Embedder Factory
 *
 * Creates the Embedder from configuration:
 * - provider = "ollama": probe the server once; if it is unreachable or the
 *   model is not installed, run in fallback-only mode with a warning
 * - provider = "hash": fallback-only mode, no network
 */

import { getOllamaHost } from '../../config/env.js';
import { silentLogger } from '../../utils/index.js';
import { Embedder } from './embedder.js';
import { OllamaEmbeddingProvider } from './ollama-provider.js';
import type { CreateEmbedderOptions, EmbeddingConfig, EmbeddingProvider } from './types.js';

/**
 * Check if a provider is available/ready to use.
 * Network errors count as unavailable.
 */
async function isProviderAvailable(provider: EmbeddingProvider): Promise<boolean> {
  try {
    return await provider.isAvailable();
  } catch {
    return false;
  }
}

/**
 * Create an Embedder from the [embedding] config section.
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * const embedder = await createEmbedder(config.embedding, { logger: ctx });
 *
 * const { vectors, source } = await embedder.encode(['Hello, world!']);
 * console.log(vectors[0]?.length); // 384 for all-minilm
 * ```
 */
export async function createEmbedder(
  config: EmbeddingConfig,
  options: CreateEmbedderOptions = {}
): Promise<Embedder> {
  const logger = options.logger ?? silentLogger;
  const embedderOptions = {
    batchSize: config.batch_size,
    timeout: config.timeout_ms,
    logger,
  };

  if (config.provider === 'hash') {
    logger.debug?.('Using deterministic hash embeddings');
    return new Embedder(null, config.dimensions, embedderOptions);
  }

  const host = options.host ?? getOllamaHost();
  const provider = new OllamaEmbeddingProvider({
    model: config.model,
    dimensions: config.dimensions,
    baseUrl: host,
    maxTokens: config.max_tokens,
    fetch: options.fetch,
  });

  if (!(await isProviderAvailable(provider))) {
    logger.warn(
      `Embedding model '${config.model}' is not available at ${provider.baseUrl}; ` +
        'using deterministic fallback embeddings (lower retrieval quality)'
    );
    return new Embedder(null, config.dimensions, embedderOptions);
  }

  logger.debug?.(`Using Ollama embeddings: ${config.model} (${config.dimensions} dims)`);
  return new Embedder(provider, config.dimensions, embedderOptions);
}
