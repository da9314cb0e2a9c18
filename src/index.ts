/**
 * Lantern - Library Entry Point
 *
 * A local retrieval engine: split documents into Segments, embed them,
 * keep them in a persistent vector index and hand the best matches back
 * as context for an LLM prompt.
 *
 * ## Primary Interface
 *
 * ```bash
 * lantern ingest ./docs            # Chunk, embed and index a directory
 * lantern search "install steps"   # Nearest Segments for a query
 * lantern context history.json     # Fit a conversation into the token budget
 * ```
 *
 * @example Embedding the engine
 * ```typescript
 * import { createRetrievalEngine, loadConfig } from 'lantern-rag';
 *
 * const engine = await createRetrievalEngine(loadConfig());
 * await engine.ingest({ content: 'Lanterns burn oil.', id: 'notes' });
 * const results = await engine.retrieve({ query: 'what burns?', k: 3 });
 * await engine.close();
 * ```
 *
 * @packageDocumentation
 */

export type { GlobalOptions, CommandContext } from './cli/types.js';

export * from './agent/index.js';
export * from './indexer/index.js';
export * from './search/index.js';
export * from './storage/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './utils/index.js';
