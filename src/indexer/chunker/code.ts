/**
 * Code Chunking
 *
 * Line scan that closes a span whenever a line opens a new logical unit
 * (declaration, control structure or comment) or would push the span past
 * chunkSize. The next span is seeded with a few trailing lines.
 */

import { CODE_BOUNDARY_PATTERNS } from './config.js';
import type { ChunkerOptions, CodeSegmentMetadata, Language } from './types.js';

/**
 * A code Segment before ids and timestamps are assigned.
 */
export interface CodeSpan {
  content: string;
  metadata: CodeSegmentMetadata;
}

function joinedLength(lines: readonly string[]): number {
  if (lines.length === 0) return 0;
  return lines.reduce((sum, line) => sum + line.length, 0) + lines.length - 1;
}

/**
 * True when the line starts a new logical unit.
 */
export function isBoundaryLine(line: string): boolean {
  return CODE_BOUNDARY_PATTERNS.some((pattern) => pattern.test(line));
}

/**
 * Trailing lines carried into the next span: up to `overlapLines`,
 * trimmed to `chunkOverlap` characters (at least one line) and so that
 * the window plus the next line fits `chunkSize`.
 */
export function overlapLines(
  emitted: readonly string[],
  nextLength: number,
  options: ChunkerOptions
): string[] {
  if (options.chunkOverlap <= 0 || options.overlapLines <= 0) {
    return [];
  }

  const window = emitted.slice(-options.overlapLines);

  while (window.length > 1 && joinedLength(window) > options.chunkOverlap) {
    window.shift();
  }
  while (window.length > 0 && joinedLength(window) + 1 + nextLength > options.chunkSize) {
    window.shift();
  }

  return window;
}

/**
 * Split source code into spans tagged with language and line range.
 * Whitespace-only spans are dropped.
 */
export function splitCode(code: string, language: Language, options: ChunkerOptions): CodeSpan[] {
  const lines = code.split('\n');
  const spans: CodeSpan[] = [];

  let current: string[] = [];
  // 0-indexed line number of current[0]
  let startIndex = 0;

  const emit = (): void => {
    const content = current.join('\n');
    if (!content.trim()) return;

    spans.push({
      content,
      metadata: {
        content_type: 'code',
        language,
        start_line: startIndex + 1,
        end_line: startIndex + current.length,
        chunk_index: spans.length,
      },
    });
  };

  lines.forEach((line, index) => {
    const overflows = joinedLength(current) + 1 + line.length > options.chunkSize;

    if (current.length > 0 && (isBoundaryLine(line) || overflows)) {
      emit();
      current = overlapLines(current, line.length, options);
      startIndex = index - current.length;
    }
    if (current.length === 0) {
      startIndex = index;
    }
    current.push(line);
  });

  if (current.length > 0) {
    emit();
  }

  return spans;
}
