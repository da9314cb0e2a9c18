/**
 * Sentence splitting with Intl.Segmenter.
 */

import { ConfigError } from '../../errors/index.js';

/**
 * Create a sentence segmenter for a locale.
 *
 * @throws ConfigError when the locale tag is malformed
 */
export function createSentenceSegmenter(locale: string): Intl.Segmenter {
  try {
    return new Intl.Segmenter(locale, { granularity: 'sentence' });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(
      `Invalid chunking locale '${locale}': ${message}`,
      'Set chunking.locale to a BCP 47 tag such as "en" or "fr"'
    );
  }
}

/**
 * Split text into trimmed, non-empty sentences.
 */
export function splitSentences(text: string, segmenter: Intl.Segmenter): string[] {
  const sentences: string[] = [];
  for (const part of segmenter.segment(text)) {
    const sentence = part.segment.trim();
    if (sentence) {
      sentences.push(sentence);
    }
  }
  return sentences;
}
