/**
 * Search Result Formatter
 *
 * Utilities for formatting retrieved results for CLI display.
 * Provides human-readable output with scores, document ids, line
 * ranges for code and truncated snippets.
 *
 * @example
 * ```typescript
 * import { formatResult } from './formatter.js';
 *
 * const text = formatResult(result);
 * // [0.92] src/app.py:12-30 (src/app.py_code_chunk_2)
 * //   def handle(request): ...
 * ```
 *
 * @packageDocumentation
 */

import type { RetrievedResult } from '../agent/types.js';

// ============================================================================
// Constants
// ============================================================================

/** Default maximum snippet length in characters */
const DEFAULT_SNIPPET_LENGTH = 200;

/** Indent for snippet content in text output */
const SNIPPET_INDENT = '  ';

export interface FormatOptions {
  /** Maximum snippet length (default: 200) */
  snippetLength?: number;
  /** Prefix each result with its score (default: true) */
  showScore?: boolean;
  /** Append the chunk id to the header (default: true) */
  showChunkId?: boolean;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Format a similarity score as a 2-decimal string.
 *
 * @example
 * ```typescript
 * formatScore(0.9234)  // "0.92"
 * formatScore(1)       // "1.00"
 * ```
 */
export function formatScore(score: number): string {
  return score.toFixed(2);
}

/**
 * Truncate content to a maximum length with ellipsis.
 *
 * Newlines and runs of whitespace collapse to single spaces so
 * snippets read on one line.
 *
 * @example
 * ```typescript
 * truncateSnippet("Hello world", 5)       // "Hello..."
 * truncateSnippet("Line 1\nLine 2", 20)   // "Line 1 Line 2"
 * ```
 */
export function truncateSnippet(content: string, maxLength: number = DEFAULT_SNIPPET_LENGTH): string {
  const normalized = content.replace(/\s+/g, ' ').trim();

  if (normalized.length <= maxLength) {
    return normalized;
  }

  return normalized.slice(0, maxLength) + '...';
}

/**
 * "start-end", or just "start" when both are the same line.
 */
function formatLineRange(start: number, end: number): string {
  if (start === end) {
    return String(start);
  }
  return `${start}-${end}`;
}

/**
 * Document id plus the line range for code Segments.
 */
function formatLocation(result: RetrievedResult): string {
  const { start_line: start, end_line: end } = result.metadata;
  if (typeof start === 'number' && typeof end === 'number') {
    return `${result.document_id}:${formatLineRange(start, end)}`;
  }
  return result.document_id;
}

// ============================================================================
// Text Formatting Functions
// ============================================================================

/**
 * Format a single result for text display.
 *
 * Output format:
 * ```
 * [0.92] notes/intro.md (notes/intro.md_chunk_0)
 *   Lantern keeps a local index of your documents...
 * ```
 */
export function formatResult(result: RetrievedResult, options: FormatOptions = {}): string {
  const { snippetLength = DEFAULT_SNIPPET_LENGTH, showScore = true, showChunkId = true } = options;

  const parts: string[] = [];

  if (showScore) {
    parts.push(`[${formatScore(result.score)}]`);
  }

  parts.push(formatLocation(result));

  if (showChunkId) {
    parts.push(`(${result.chunk_id})`);
  }

  const snippet = truncateSnippet(result.content, snippetLength);
  return `${parts.join(' ')}\n${SNIPPET_INDENT}${snippet}`;
}

/**
 * Format multiple results, separated by blank lines.
 */
export function formatResults(results: readonly RetrievedResult[], options: FormatOptions = {}): string {
  return results.map((result) => formatResult(result, options)).join('\n\n');
}
