/**
 * Chunker
 *
 * Splits a document into ordered Segments.
 *
 * Architecture:
 * 1. Classify the document (prose or code) unless the caller says which
 * 2. Prose → sentence packing with a sentence overlap window
 * 3. Code → structural line boundaries with a line overlap window
 * 4. Assign Segment ids, metadata and creation time
 */

import { DEFAULT_CHUNKER_OPTIONS } from './config.js';
import { detectContentKind, detectLanguage } from './detect.js';
import { packSentences } from './prose.js';
import { splitCode } from './code.js';
import { createSentenceSegmenter, splitSentences } from './sentences.js';
import type { ChunkerOptions, ContentKind, Segment } from './types.js';

export class Chunker {
  readonly options: ChunkerOptions;
  private readonly segmenter: Intl.Segmenter;

  constructor(options: Partial<ChunkerOptions> = {}) {
    this.options = { ...DEFAULT_CHUNKER_OPTIONS, ...options };
    this.segmenter = createSentenceSegmenter(this.options.locale);
  }

  /**
   * Split text into Segments owned by `documentId`.
   * Empty or whitespace-only text yields no Segments.
   */
  chunk(text: string, documentId: string, contentKind?: ContentKind): Segment[] {
    if (!text.trim()) {
      return [];
    }

    const kind = contentKind ?? detectContentKind(text);
    const createdAt = new Date().toISOString();

    if (kind === 'code') {
      const language = detectLanguage(text);
      return splitCode(text, language, this.options).map((span) => ({
        id: `${documentId}_code_chunk_${span.metadata.chunk_index}`,
        document_id: documentId,
        content: span.content,
        metadata: { ...span.metadata },
        created_at: createdAt,
      }));
    }

    const sentences = splitSentences(text, this.segmenter);
    return packSentences(sentences, this.options).map((span) => ({
      id: `${documentId}_chunk_${span.metadata.chunk_index}`,
      document_id: documentId,
      content: span.content,
      metadata: { ...span.metadata },
      created_at: createdAt,
    }));
  }
}
