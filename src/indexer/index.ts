/**
 * Indexer Module
 *
 * Everything between raw text and vectors: file discovery, chunking
 * and embedding.
 *
 * @example
 * ```ts
 * import { scanDirectory, Chunker } from './indexer/index.js';
 *
 * const { files } = await scanDirectory('./notes');
 * const chunker = new Chunker({ chunkSize: 512 });
 * ```
 */

// File discovery
export { scanDirectory } from './scanner.js';
export { createIgnoreFilter, loadGitignoreFile, parseGitignoreContent, type IgnoreFilter, type IgnoreFilterOptions } from './ignore.js';
export {
  TEXT_EXTENSIONS,
  CODE_EXTENSIONS,
  PROSE_EXTENSIONS,
  DEFAULT_IGNORE_PATTERNS,
  contentKindForExtension,
  type ScannedFile,
  type ScanOptions,
  type ScanResult,
  type SkippedFile,
  type SkipReason,
} from './types.js';

export * from './chunker/index.js';
export * from './embedder/index.js';
