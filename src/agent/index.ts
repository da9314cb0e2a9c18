/**
 * Agent Module
 *
 * Retrieval pipeline for Lantern.
 *
 * This module provides the engine that:
 * 1. Ingests documents (chunk, embed, index)
 * 2. Retrieves the Segments most similar to a query
 * 3. Fits a conversation into a token budget
 * 4. Formats retrieved Segments as XML context for an LLM prompt
 *
 * @example
 * ```typescript
 * import { createRetrievalEngine } from './agent';
 * import { loadConfig } from './config';
 *
 * const engine = await createRetrievalEngine(loadConfig());
 *
 * await engine.ingest({ content: readme, id: 'README.md' });
 * const results = await engine.retrieve({ query: 'How do I install it?', k: 3 });
 *
 * const turns = engine.truncateContext(history, results);
 * const prompt = engine.buildAugmentedQuery('How do I install it?', results);
 *
 * await engine.close();
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Core Factories
// ============================================================================

export {
  createRetrievalEngine,
  RetrievalEngine,
  deriveDocumentId,
  PREVIEW_LENGTH,
} from './rag-engine.js';

export { ContextWindowManager, DEFAULT_MAX_CONTEXT_TOKENS } from './context-window.js';

export { buildAugmentedQuery, formatSources, escapeXml } from './assembler.js';

// ============================================================================
// Types
// ============================================================================

export type {
  IngestRequest,
  IngestResult,
  RetrieveRequest,
  RetrievedResult,
  DocumentSummary,
  DocumentInfo,
  EngineStatus,
  ConversationTurn,
  TurnRole,
  TokenCounter,
  RetrievalEngineOptions,
} from './types.js';

export type { AssemblerOptions } from './assembler.js';
export type { ContextWindowOptions } from './context-window.js';

// ============================================================================
// Schemas
// ============================================================================

export {
  IngestRequestSchema,
  RetrieveRequestSchema,
  ConversationTurnSchema,
  ConversationSchema,
  TurnRoleSchema,
  MAX_RETRIEVE_K,
} from './types.js';
