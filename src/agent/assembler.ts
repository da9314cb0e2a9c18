/**
 * Query Augmentation
 *
 * Wraps retrieved Segments in an XML block ahead of the user's question:
 *
 * ```xml
 * <sources>
 *   <source id="1" document="doc1" chunk="doc1_chunk_0">
 *     Python is a language.
 *   </source>
 * </sources>
 *
 * Question: what is python?
 * ```
 */

import type { RetrievedResult } from './types.js';

export interface AssemblerOptions {
  /** Add score="0.873" to each source */
  includeScores?: boolean;
}

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => XML_ESCAPES[char] ?? char);
}

function indent(text: string, prefix: string): string {
  return text
    .split('\n')
    .map((line) => (line.length > 0 ? prefix + line : line))
    .join('\n');
}

/**
 * Format results as a `<sources>` block, in the order given.
 */
export function formatSources(results: readonly RetrievedResult[], options: AssemblerOptions = {}): string {
  const sources = results.map((result, index) => {
    const attributes = [
      `id="${index + 1}"`,
      `document="${escapeXml(result.document_id)}"`,
      `chunk="${escapeXml(result.chunk_id)}"`,
    ];
    if (options.includeScores) {
      attributes.push(`score="${result.score.toFixed(3)}"`);
    }
    return [
      `  <source ${attributes.join(' ')}>`,
      indent(escapeXml(result.content), '    '),
      '  </source>',
    ].join('\n');
  });

  return ['<sources>', ...sources, '</sources>'].join('\n');
}

/**
 * Prefix a query with retrieved context. No results leaves the query as is.
 */
export function buildAugmentedQuery(
  query: string,
  results: readonly RetrievedResult[],
  options: AssemblerOptions = {}
): string {
  if (results.length === 0) {
    return query;
  }
  return `${formatSources(results, options)}\n\nQuestion: ${query}`;
}
