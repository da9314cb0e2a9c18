/**
 * Retrieval Engine
 *
 * Composition root for ingestion and retrieval:
 *
 * ```
 * ingest:   content ──► Chunker ──► Embedder.encode ──► VectorIndex.addMany
 *                                                    └─► DocumentStore.put
 *
 * retrieve: query ──► Embedder.encodeOne ──► VectorIndex.search ──► hydrate ──► sort
 * ```
 *
 * Each engine owns its index, document store and embedder. Create one
 * with createRetrievalEngine and close it when done; there is no shared
 * process-wide instance.
 *
 * Only invalid requests throw (ValidationError). Unknown documents are
 * reported as null / false. Embedding and persistence failures are
 * logged and the engine carries on.
 *
 * @example
 * ```typescript
 * const engine = await createRetrievalEngine(loadConfig(), { logger: ctx });
 *
 * await engine.ingest({ content: 'Python is a language.', id: 'doc1' });
 * const results = await engine.retrieve({ query: 'language', k: 3 });
 * const prompt = engine.buildAugmentedQuery('What is Python?', results);
 *
 * await engine.close();
 * ```
 */

import { createHash } from 'node:crypto';
import type { z } from 'zod';

import { resolveIndexPath } from '../config/loader.js';
import type { Config } from '../config/schema.js';
import { ValidationError } from '../errors/index.js';
import { Chunker, detectContentKind, type Segment } from '../indexer/chunker/index.js';
import { createEmbedder, type Embedder } from '../indexer/embedder/index.js';
import { VectorIndex, type IndexEntry } from '../search/index.js';
import { DocumentStore } from '../storage/document-store.js';
import { companionPaths } from '../storage/paths.js';
import type { DocumentRecord } from '../storage/schemas.js';
import { silentLogger, type Logger } from '../utils/index.js';
import { buildAugmentedQuery, type AssemblerOptions } from './assembler.js';
import { ContextWindowManager } from './context-window.js';
import {
  IngestRequestSchema,
  RetrieveRequestSchema,
  type ConversationTurn,
  type DocumentInfo,
  type DocumentSummary,
  type EngineStatus,
  type IngestRequest,
  type IngestResult,
  type RetrievalEngineOptions,
  type RetrievedResult,
  type RetrieveRequest,
} from './types.js';

/** Characters of the first Segment shown in a summary */
export const PREVIEW_LENGTH = 100;

/**
 * Id for a document ingested without one: `doc_` + 12 hex chars of MD5(content).
 */
export function deriveDocumentId(content: string): string {
  return `doc_${createHash('md5').update(content, 'utf-8').digest('hex').slice(0, 12)}`;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Parse a request or throw ValidationError listing every issue.
 */
function parseRequest<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ValidationError(`Invalid ${what} request`, issues);
  }
  return result.data;
}

export class RetrievalEngine {
  constructor(
    private readonly config: Config,
    private readonly chunker: Chunker,
    private readonly embedder: Embedder,
    private readonly index: VectorIndex,
    private readonly documents: DocumentStore,
    private readonly contextWindow: ContextWindowManager,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Chunk, embed and index a document. Re-ingesting an id replaces its
   * previous Segments.
   *
   * @throws ValidationError for empty content or a bad id / metadata
   */
  async ingest(request: IngestRequest): Promise<IngestResult> {
    const { content, id, metadata = {}, contentKind } = parseRequest(IngestRequestSchema, request, 'ingest');

    const documentId = id ?? deriveDocumentId(content);
    const kind = contentKind ?? detectContentKind(content);
    const segments = this.chunker.chunk(content, documentId, kind);

    const { vectors, source } = await this.embedder.encode(segments.map((segment) => segment.content));

    const entries: IndexEntry[] = [];
    segments.forEach((segment, i) => {
      const vector = vectors[i];
      if (!vector) return;
      entries.push({
        segment: {
          ...segment,
          // Chunker keys win over caller metadata
          metadata: { ...metadata, ...segment.metadata, embedding_source: source },
        },
        vector,
      });
    });

    await this.index.replaceDocument(documentId, entries);

    const record: DocumentRecord = {
      id: documentId,
      content,
      length: content.length,
      metadata,
      ingested_at: new Date().toISOString(),
      chunk_count: entries.length,
      content_kind: kind,
      embedding_source: source,
    };
    try {
      await this.documents.put(record);
    } catch (error) {
      this.logger.warn(`Could not save document store ${this.documents.path}: ${errorMessage(error)}`);
    }

    this.logger.debug?.(`Ingested document '${documentId}' with ${entries.length} chunks (${kind}, ${source})`);
    return { documentId, chunkCount: entries.length, contentKind: kind, embeddingSource: source };
  }

  /**
   * The k Segments most similar to the query, highest score first.
   * An empty index returns [].
   *
   * @throws ValidationError for an empty query or k outside 1..100
   */
  async retrieve(request: RetrieveRequest): Promise<RetrievedResult[]> {
    const { query, k = this.config.search.top_k } = parseRequest(RetrieveRequestSchema, request, 'retrieve');

    if (this.index.size === 0) {
      return [];
    }

    const { vector } = await this.embedder.encodeOne(query);
    const results: RetrievedResult[] = [];

    for (const hit of this.index.search(vector, k)) {
      const segment = this.index.getSegment(hit.id);
      if (!segment) continue;
      results.push({
        content: segment.content,
        score: hit.score,
        document_id: segment.document_id,
        chunk_id: segment.id,
        metadata: { ...segment.metadata },
      });
    }

    return results.sort((a, b) => b.score - a.score);
  }

  /**
   * Length, chunk count, preview and ingestion time of a document, or
   * null when nothing is known about it.
   */
  getDocumentSummary(documentId: string): DocumentSummary | null {
    const segments: Segment[] = this.index.segmentsForDocument(documentId);
    const record = this.documents.get(documentId);
    if (segments.length === 0 && !record) {
      return null;
    }

    const first = segments[0];
    let preview = '';
    if (first) {
      preview =
        first.content.length > PREVIEW_LENGTH ? `${first.content.slice(0, PREVIEW_LENGTH)}...` : first.content;
    }

    return {
      id: documentId,
      length: record?.length ?? segments.reduce((total, segment) => total + segment.content.length, 0),
      chunk_count: segments.length,
      preview,
      ingested_at: first?.created_at ?? record?.ingested_at ?? null,
    };
  }

  /**
   * Ingested documents, oldest first.
   */
  listDocuments(): DocumentInfo[] {
    return this.documents.list().map(({ content: _content, ...info }) => info);
  }

  /**
   * Remove a document and its Segments. False when it was not ingested.
   */
  async removeDocument(documentId: string): Promise<boolean> {
    const removed = await this.index.removeDocument(documentId);

    let deleted = false;
    try {
      deleted = await this.documents.delete(documentId);
    } catch (error) {
      deleted = true;
      this.logger.warn(`Could not save document store ${this.documents.path}: ${errorMessage(error)}`);
    }

    if (removed > 0 || deleted) {
      this.logger.debug?.(`Removed document '${documentId}' (${removed} chunks)`);
      return true;
    }
    return false;
  }

  /**
   * Fit a conversation (plus retrieved content) into the token budget.
   */
  truncateContext(turns: readonly ConversationTurn[], retrieved: readonly RetrievedResult[] = []): ConversationTurn[] {
    return this.contextWindow.truncate(turns, retrieved);
  }

  countTokens(turns: readonly ConversationTurn[], retrieved: readonly RetrievedResult[] = []): number {
    return this.contextWindow.countTokens(turns, retrieved);
  }

  buildAugmentedQuery(query: string, results: readonly RetrievedResult[], options?: AssemblerOptions): string {
    return buildAugmentedQuery(query, results, options);
  }

  status(): EngineStatus {
    return {
      index: this.index.stats(),
      documents: this.documents.size,
      embedding: {
        provider: this.embedder.providerName,
        fallbackOnly: this.embedder.fallbackOnly,
        dimensions: this.embedder.dimensions,
      },
    };
  }

  /**
   * Snapshot the index now.
   */
  async flush(): Promise<void> {
    await this.index.flush();
  }

  async close(): Promise<void> {
    await this.index.close();
  }
}

/**
 * Build an engine from configuration: chunker, embedder (probing the model
 * runtime once), vector index and document store.
 *
 * @throws ConfigError for an unsupported chunking locale
 */
export async function createRetrievalEngine(
  config: Config,
  options: RetrievalEngineOptions = {}
): Promise<RetrievalEngine> {
  const logger = options.logger ?? silentLogger;

  const chunker = new Chunker({
    chunkSize: config.chunking.chunk_size,
    chunkOverlap: config.chunking.chunk_overlap,
    overlapSentences: config.chunking.overlap_sentences,
    overlapLines: config.chunking.overlap_lines,
    locale: config.chunking.locale,
  });

  const embedder =
    options.embedder ??
    (await createEmbedder(config.embedding, { host: options.host, logger, fetch: options.fetch }));

  const basePath = resolveIndexPath(config);
  const index = await VectorIndex.open({
    basePath,
    dimensions: embedder.dimensions,
    hnsw: {
      m: config.index.m,
      efConstruction: config.index.ef_construction,
      efSearch: config.index.ef_search,
    },
    snapshotEvery: config.index.snapshot_every,
    logger,
  });
  const documents = await DocumentStore.load(companionPaths(basePath).documents, logger);

  const contextWindow = new ContextWindowManager({
    maxTokens: config.context.max_tokens,
    tokenCounter: options.tokenCounter,
  });

  return new RetrievalEngine(config, chunker, embedder, index, documents, contextWindow, logger);
}
