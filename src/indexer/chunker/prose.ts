/**
 * Prose Chunking
 *
 * Greedy sentence packing: sentences are joined with single spaces until
 * the next one would push the buffer past chunkSize. The next buffer starts
 * with an overlap window taken from the tail of the one just emitted.
 */

import type { ChunkerOptions, ProseSegmentMetadata } from './types.js';

/**
 * A prose Segment before ids and timestamps are assigned.
 */
export interface ProseSpan {
  content: string;
  metadata: ProseSegmentMetadata;
}

function joinedLength(sentences: readonly string[]): number {
  if (sentences.length === 0) return 0;
  return sentences.reduce((sum, sentence) => sum + sentence.length, 0) + sentences.length - 1;
}

/**
 * Pick the overlap window to carry from an emitted buffer into the next.
 *
 * Takes the last `overlapSentences` sentences, then drops from the front
 * while the window exceeds `chunkOverlap` (the final sentence always stays)
 * and while window + next sentence would not fit in `chunkSize`.
 */
export function overlapWindow(
  emitted: readonly string[],
  nextLength: number,
  options: ChunkerOptions
): string[] {
  if (options.chunkOverlap <= 0 || options.overlapSentences <= 0) {
    return [];
  }

  const window = emitted.slice(-options.overlapSentences);

  while (window.length > 1 && joinedLength(window) > options.chunkOverlap) {
    window.shift();
  }
  while (window.length > 0 && joinedLength(window) + 1 + nextLength > options.chunkSize) {
    window.shift();
  }

  return window;
}

/**
 * Pack sentences into bounded spans.
 * A single sentence longer than chunkSize becomes its own span, kept whole.
 */
export function packSentences(sentences: readonly string[], options: ChunkerOptions): ProseSpan[] {
  const spans: ProseSpan[] = [];
  let buffer: string[] = [];

  const emit = (): void => {
    spans.push({
      content: buffer.join(' '),
      metadata: {
        content_type: 'prose',
        sentence_count: buffer.length,
        chunk_index: spans.length,
      },
    });
  };

  for (const sentence of sentences) {
    if (buffer.length > 0 && joinedLength(buffer) + 1 + sentence.length > options.chunkSize) {
      emit();
      buffer = overlapWindow(buffer, sentence.length, options);
    }
    buffer.push(sentence);
  }

  if (buffer.length > 0) {
    emit();
  }

  return spans;
}
