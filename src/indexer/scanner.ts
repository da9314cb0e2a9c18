/**
 * File Scanner
 *
 * Finds ingestible text files under a directory using fast-glob,
 * respecting .gitignore, default and configured ignore patterns.
 */

import { statSync } from 'node:fs';
import { extname, relative, resolve, sep } from 'node:path';
import fg from 'fast-glob';

import { FileNotFoundError } from '../errors/index.js';
import { createIgnoreFilter } from './ignore.js';
import {
  TEXT_EXTENSIONS,
  contentKindForExtension,
  type ScanOptions,
  type ScanResult,
  type ScannedFile,
  type SkippedFile,
} from './types.js';

/**
 * Scan a directory for files to ingest.
 *
 * @throws FileNotFoundError when rootPath is not a directory
 *
 * @example
 * ```ts
 * const { files, skipped } = await scanDirectory('./notes', {
 *   ignorePatterns: ['drafts/'],
 *   maxFileSize: 512_000,
 * });
 * ```
 */
export async function scanDirectory(rootPath: string, options: ScanOptions = {}): Promise<ScanResult> {
  const absoluteRoot = resolve(rootPath);
  const rootStat = statSync(absoluteRoot, { throwIfNoEntry: false });
  if (!rootStat?.isDirectory()) {
    throw new FileNotFoundError(absoluteRoot);
  }

  const extensions = options.extensions ?? TEXT_EXTENSIONS;
  const shouldIgnore = createIgnoreFilter({
    rootPath: absoluteRoot,
    additionalPatterns: options.ignorePatterns,
  });

  const entries = await fg(buildGlobPatterns(extensions), {
    cwd: absoluteRoot,
    absolute: true,
    dot: false,
    onlyFiles: true,
    followSymbolicLinks: false,
    deep: options.maxDepth ?? Infinity,
    suppressErrors: true,
    caseSensitiveMatch: false,
  });

  const files: ScannedFile[] = [];
  const skipped: SkippedFile[] = [];

  for (const absolutePath of entries) {
    const relativePath = relative(absoluteRoot, absolutePath).split(sep).join('/');
    if (shouldIgnore(relativePath)) {
      continue;
    }

    const stat = statSync(absolutePath, { throwIfNoEntry: false });
    if (!stat) {
      skipped.push({ path: absolutePath, reason: 'unreadable' });
      continue;
    }
    if (options.maxFileSize !== undefined && stat.size > options.maxFileSize) {
      skipped.push({ path: absolutePath, reason: 'too-large' });
      continue;
    }

    const extension = extname(absolutePath).slice(1).toLowerCase();
    files.push({
      path: absolutePath,
      relativePath,
      extension,
      size: stat.size,
      contentKind: contentKindForExtension(extension),
    });
  }

  files.sort((a, b) => a.relativePath.localeCompare(b.relativePath));
  return { rootPath: absoluteRoot, files, skipped };
}

/**
 * Build glob patterns for the given extensions.
 */
function buildGlobPatterns(extensions: readonly string[]): string[] {
  if (extensions.length === 0) return [];
  if (extensions.length === 1) return [`**/*.${extensions[0] ?? ''}`];
  return [`**/*.{${extensions.join(',')}}`];
}
