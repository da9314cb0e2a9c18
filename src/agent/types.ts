/**
 * Retrieval Engine Types
 *
 * Request schemas, result shapes and options for the engine. Requests
 * are validated with zod at the engine boundary; a failed parse becomes
 * a ValidationError before anything is mutated.
 */

import { z } from 'zod';

import type { ContentKind, Metadata } from '../indexer/chunker/index.js';
import type { Embedder, EmbeddingSource } from '../indexer/embedder/index.js';
import type { IndexStats } from '../search/index.js';
import { MetadataValueSchema } from '../storage/schemas.js';
import type { Logger } from '../utils/index.js';

// ============================================================================
// REQUEST SCHEMAS
// ============================================================================

const nonBlank = (field: string) =>
  z.string({ required_error: `${field} is required` }).refine((value) => value.trim().length > 0, {
    message: `${field} must not be empty`,
  });

/** Largest k a retrieve call accepts */
export const MAX_RETRIEVE_K = 100;

export const IngestRequestSchema = z.object({
  content: nonBlank('content'),
  /** Caller-supplied id; derived from the content hash when absent */
  id: z.string().trim().min(1, 'id must not be empty').max(512).optional(),
  metadata: z.record(MetadataValueSchema).optional(),
  /** Skip detection and chunk as this kind */
  contentKind: z.enum(['prose', 'code']).optional(),
});

export type IngestRequest = z.input<typeof IngestRequestSchema>;

export const RetrieveRequestSchema = z.object({
  query: nonBlank('query'),
  k: z
    .number()
    .int('k must be an integer')
    .min(1, 'k must be at least 1')
    .max(MAX_RETRIEVE_K, `k cannot exceed ${MAX_RETRIEVE_K}`)
    .optional(),
});

export type RetrieveRequest = z.input<typeof RetrieveRequestSchema>;

/**
 * Role of a conversation turn.
 */
export const TurnRoleSchema = z.enum(['system', 'user', 'assistant']);
export type TurnRole = z.infer<typeof TurnRoleSchema>;

export const ConversationTurnSchema = z.object({
  role: TurnRoleSchema,
  content: z.string(),
  timestamp: z.string().optional(),
});

export type ConversationTurn = z.infer<typeof ConversationTurnSchema>;

export const ConversationSchema = z.array(ConversationTurnSchema);

// ============================================================================
// RESULTS
// ============================================================================

export interface IngestResult {
  documentId: string;
  chunkCount: number;
  contentKind: ContentKind;
  /** `fallback` when any Segment was embedded by the hash encoder */
  embeddingSource: EmbeddingSource;
}

/**
 * One retrieved Segment. Never persisted.
 */
export interface RetrievedResult {
  content: string;
  /** Similarity in (0, 1], higher is better */
  score: number;
  document_id: string;
  chunk_id: string;
  metadata: Metadata;
}

export interface DocumentSummary {
  id: string;
  /** Characters in the ingested content */
  length: number;
  chunk_count: number;
  /** First 100 characters of the first Segment, `...` appended when cut */
  preview: string;
  ingested_at: string | null;
}

/**
 * A document as listed by `listDocuments`.
 */
export interface DocumentInfo {
  id: string;
  length: number;
  chunk_count: number;
  content_kind: ContentKind;
  embedding_source: EmbeddingSource;
  ingested_at: string;
  metadata: Metadata;
}

export interface EngineStatus {
  index: IndexStats;
  /** Documents in the Document Store */
  documents: number;
  embedding: {
    provider: string;
    fallbackOnly: boolean;
    dimensions: number;
  };
}

// ============================================================================
// OPTIONS
// ============================================================================

/**
 * Counts tokens in a string.
 */
export type TokenCounter = (text: string) => number;

export interface RetrievalEngineOptions {
  /** Receives degraded-path warnings and debug lines */
  logger?: Logger;

  /** Use this Embedder instead of building one from config */
  embedder?: Embedder;

  /** Ollama base URL (default: OLLAMA_HOST) */
  host?: string;

  /** Fetch implementation for the model runtime */
  fetch?: typeof fetch;

  /** Token counter for the context window (default: length / 4) */
  tokenCounter?: TokenCounter;
}
