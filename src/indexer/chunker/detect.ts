/**
 * Content Detection
 *
 * Heuristics that decide whether a document is code and, if so,
 * which language it is written in. Both look at the first lines only.
 */

import { CODE_INDICATORS, CODE_LINE_RATIO, DETECTION_LINES } from './config.js';
import type { ContentKind, Language } from './types.js';

function leadingLines(text: string): string[] {
  return text.split('\n').slice(0, DETECTION_LINES);
}

/**
 * True when more than 30% of the first 10 lines contain a code indicator.
 */
export function isCode(text: string): boolean {
  const lines = leadingLines(text);
  const codeLines = lines.filter((line) =>
    CODE_INDICATORS.some((indicator) => line.includes(indicator))
  ).length;

  return codeLines / Math.max(lines.length, 1) > CODE_LINE_RATIO;
}

/**
 * Classify a document as prose or code.
 */
export function detectContentKind(text: string): ContentKind {
  return isCode(text) ? 'code' : 'prose';
}

/**
 * Detect the language of a code document. Rules are checked in order;
 * the first match wins.
 */
export function detectLanguage(text: string): Language {
  const head = leadingLines(text).join('\n').toLowerCase();

  if (
    (head.includes('def ') && head.includes('import ')) ||
    head.includes('import torch') ||
    head.includes('import tensorflow')
  ) {
    return 'python';
  }
  if (head.includes('function ') || head.includes('const ')) {
    return 'javascript';
  }
  if (head.includes('public class') || head.includes('private void')) {
    return 'java';
  }
  if (head.includes('#include')) {
    return 'cpp';
  }
  if (head.includes('func ')) {
    return 'go';
  }
  if (head.includes('fn ') && head.includes('->')) {
    return 'rust';
  }
  return 'unknown';
}
