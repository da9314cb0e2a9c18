/**
 * Gitignore Pattern Handling
 *
 * Utilities for loading and applying gitignore-style patterns.
 * Uses the 'ignore' package which implements the full gitignore spec.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, relative, sep } from 'node:path';
import ignore, { type Ignore } from 'ignore';

import { DEFAULT_IGNORE_PATTERNS } from './types.js';

/**
 * Options for creating an ignore filter.
 */
export interface IgnoreFilterOptions {
  /** Root directory containing .gitignore */
  rootPath: string;

  /** Additional patterns to ignore (merged with .gitignore) */
  additionalPatterns?: readonly string[];

  /** Whether to use default ignore patterns */
  useDefaults?: boolean;
}

/**
 * A filter function that tests whether a path should be ignored.
 */
export type IgnoreFilter = (filePath: string) => boolean;

/**
 * Load gitignore patterns from a file.
 * Returns empty array if file doesn't exist or can't be read.
 */
export function loadGitignoreFile(gitignorePath: string): string[] {
  if (!existsSync(gitignorePath)) {
    return [];
  }

  try {
    return parseGitignoreContent(readFileSync(gitignorePath, 'utf-8'));
  } catch {
    // An unreadable .gitignore means no extra patterns
    return [];
  }
}

/**
 * Parse gitignore file content into an array of patterns.
 * Drops comments and empty lines; keeps negations.
 */
export function parseGitignoreContent(content: string): string[] {
  return content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}

/**
 * Create an ignore filter function for the given root directory.
 *
 * Patterns are applied in order:
 * 1. DEFAULT_IGNORE_PATTERNS (if useDefaults is true)
 * 2. .gitignore in the root directory
 * 3. Additional patterns passed in options
 *
 * @returns A filter that returns true if a path should be IGNORED
 *
 * @example
 * ```ts
 * const shouldIgnore = createIgnoreFilter({
 *   rootPath: '/path/to/notes',
 *   additionalPatterns: ['drafts/'],
 * });
 *
 * shouldIgnore('drafts/todo.md'); // true
 * ```
 */
export function createIgnoreFilter(options: IgnoreFilterOptions): IgnoreFilter {
  const { rootPath, additionalPatterns = [], useDefaults = true } = options;

  const ig: Ignore = ignore();

  if (useDefaults) {
    ig.add(DEFAULT_IGNORE_PATTERNS);
  }

  const gitignorePatterns = loadGitignoreFile(join(rootPath, '.gitignore'));
  if (gitignorePatterns.length > 0) {
    ig.add(gitignorePatterns);
  }

  if (additionalPatterns.length > 0) {
    ig.add([...additionalPatterns]);
  }

  // The ignore library expects paths relative to the root, using forward slashes
  return (filePath: string): boolean => {
    let relativePath = filePath;
    if (filePath.startsWith(rootPath)) {
      relativePath = relative(rootPath, filePath);
    }

    if (sep === '\\') {
      relativePath = relativePath.split(sep).join('/');
    }

    // Root itself is never ignored
    if (relativePath === '') {
      return false;
    }

    return ig.ignores(relativePath);
  };
}
