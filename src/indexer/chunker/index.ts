/**
 * Chunker Module
 *
 * Splits documents into Segments ready for embedding.
 */

export { Chunker } from './chunker.js';
export { packSentences, overlapWindow } from './prose.js';
export { splitCode, isBoundaryLine, overlapLines } from './code.js';
export { isCode, detectContentKind, detectLanguage } from './detect.js';
export { splitSentences, createSentenceSegmenter } from './sentences.js';
export {
  DEFAULT_CHUNKER_OPTIONS,
  CODE_INDICATORS,
  CODE_BOUNDARY_PATTERNS,
  estimateTokens,
} from './config.js';
export type {
  ContentKind,
  Language,
  Metadata,
  MetadataValue,
  Segment,
  ChunkerOptions,
  ProseSegmentMetadata,
  CodeSegmentMetadata,
} from './types.js';
export type { ProseSpan } from './prose.js';
export type { CodeSpan } from './code.js';
