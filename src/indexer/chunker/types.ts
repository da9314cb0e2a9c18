/**
 * Chunker Types
 *
 * Type definitions for splitting a document into Segments.
 * Prose and code take separate tracks with their own metadata.
 */

/**
 * Content kind of a whole document.
 * - prose: split on sentence boundaries
 * - code: split on structural line boundaries
 */
export type ContentKind = 'prose' | 'code';

/**
 * Source language detected for code documents.
 */
export type Language = 'python' | 'javascript' | 'java' | 'cpp' | 'go' | 'rust' | 'unknown';

/**
 * Metadata values are JSON scalars so Segments survive the sidecar round trip.
 */
export type MetadataValue = string | number | boolean | null;

export type Metadata = Record<string, MetadataValue>;

/**
 * Metadata attached to a prose Segment.
 */
export interface ProseSegmentMetadata {
  content_type: 'prose';
  /** Sentences in the Segment, overlap included */
  sentence_count: number;
  /** Position within the document (0-indexed) */
  chunk_index: number;
}

/**
 * Metadata attached to a code Segment.
 */
export interface CodeSegmentMetadata {
  content_type: 'code';
  language: Language;
  /** First line in the source document (1-indexed) */
  start_line: number;
  /** Last line in the source document (1-indexed, inclusive) */
  end_line: number;
  /** Position within the document (0-indexed) */
  chunk_index: number;
}

/**
 * A bounded span of a document's text, the unit of embedding and retrieval.
 */
export interface Segment {
  /** `<doc>_chunk_<n>` for prose, `<doc>_code_chunk_<n>` for code */
  id: string;

  /** Owning document */
  document_id: string;

  /** The Segment text */
  content: string;

  /** Chunker metadata plus whatever the engine adds at ingest */
  metadata: Metadata;

  /** Creation time (ISO-8601) */
  created_at: string;
}

/**
 * Options for the chunking process. Sizes are in characters.
 */
export interface ChunkerOptions {
  /** Maximum Segment length */
  chunkSize: number;

  /** Character budget for the overlap window (0 disables overlap) */
  chunkOverlap: number;

  /** Trailing sentences carried into the next prose Segment */
  overlapSentences: number;

  /** Trailing lines carried into the next code Segment */
  overlapLines: number;

  /** Locale for sentence boundary detection */
  locale: string;
}
