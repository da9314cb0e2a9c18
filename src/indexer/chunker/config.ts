/**
 * Chunker Configuration
 *
 * Default sizes and the heuristics used to classify content.
 */

import type { ChunkerOptions } from './types.js';

/**
 * Default chunker options (characters, not tokens).
 */
export const DEFAULT_CHUNKER_OPTIONS: ChunkerOptions = {
  chunkSize: 512,
  chunkOverlap: 64,
  overlapSentences: 2,
  overlapLines: 2,
  locale: 'en',
};

/**
 * Number of leading lines inspected by content and language detection.
 */
export const DETECTION_LINES = 10;

/**
 * Content is code when more than this share of the inspected lines
 * contain a code indicator.
 */
export const CODE_LINE_RATIO = 0.3;

/**
 * Substrings that mark a line as looking like source code.
 */
export const CODE_INDICATORS: readonly string[] = [
  'def ',
  'class ',
  'import ',
  'from ',
  'function ',
  '{',
  '}',
  'var ',
  'let ',
  'const ',
  'public ',
  'private ',
  '#include',
  'int main',
  'void ',
  'struct ',
  'enum ',
];

/**
 * Lines that open a new logical unit of code: declarations,
 * control structures and comments.
 */
export const CODE_BOUNDARY_PATTERNS: readonly RegExp[] = [
  /^\s*(?:export\s+)?(?:async\s+)?(?:def|class|function|public|private|protected|fn|func|struct|impl|interface)\s+\w+/,
  /^\s*export\s+(?:default\s+)?(?:const|let|var|type|enum|abstract)\b/,
  /^\s*(?:if|for|while|switch)\s*\(/,
  /^\s*#\s+/,
  /^\s*(?:\/\/|\/\*)/,
];

/**
 * Estimate token count from text.
 * Uses a simple heuristic: ~4 characters per token on average.
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}
