/**
 * File Discovery Types
 *
 * Types and constants for finding ingestible files when a directory
 * is ingested.
 */

import type { ContentKind } from './chunker/index.js';

/**
 * A file discovered by the scanner.
 */
export interface ScannedFile {
  /** Absolute path */
  path: string;

  /** Path relative to the scanned root, forward slashes */
  relativePath: string;

  /** Lowercase extension without the dot */
  extension: string;

  /** Size in bytes */
  size: number;

  /** Content kind implied by the extension; undefined means auto-detect */
  contentKind?: ContentKind;
}

/**
 * Why a discovered file was not returned.
 */
export type SkipReason = 'too-large' | 'unreadable';

export interface SkippedFile {
  path: string;
  reason: SkipReason;
}

export interface ScanOptions {
  /** Extensions to include (default: TEXT_EXTENSIONS) */
  extensions?: readonly string[];

  /** Extra gitignore-style patterns, applied after .gitignore */
  ignorePatterns?: readonly string[];

  /** Skip files larger than this many bytes */
  maxFileSize?: number;

  /** Maximum directory depth (default: unlimited) */
  maxDepth?: number;
}

export interface ScanResult {
  /** Absolute root that was scanned */
  rootPath: string;

  /** Files to ingest, sorted by relative path */
  files: ScannedFile[];

  /** Files found but skipped */
  skipped: SkippedFile[];
}

/**
 * Extensions read as source code.
 */
export const CODE_EXTENSIONS: Readonly<Record<string, true>> = {
  py: true,
  js: true,
  mjs: true,
  cjs: true,
  jsx: true,
  ts: true,
  tsx: true,
  java: true,
  c: true,
  h: true,
  cc: true,
  cpp: true,
  hpp: true,
  go: true,
  rs: true,
};

/**
 * Extensions read as prose.
 */
export const PROSE_EXTENSIONS: Readonly<Record<string, true>> = {
  txt: true,
  md: true,
  mdx: true,
  markdown: true,
  rst: true,
  adoc: true,
};

/**
 * Extensions ingested by default.
 */
export const TEXT_EXTENSIONS: readonly string[] = [
  ...Object.keys(PROSE_EXTENSIONS),
  ...Object.keys(CODE_EXTENSIONS),
];

/**
 * Patterns always ignored during discovery (gitignore syntax).
 */
export const DEFAULT_IGNORE_PATTERNS = [
  // Version control
  '.git',
  '.svn',
  '.hg',

  // Dependencies
  'node_modules',
  'vendor',
  'venv',
  '.venv',
  '__pycache__',

  // Build outputs
  'dist',
  'build',
  'out',
  'target',
  '.next',
  '.cache',

  // Test coverage
  'coverage',

  // Environment
  '.env',
  '.env.*',
];

/**
 * Content kind implied by an extension, or undefined to auto-detect.
 */
export function contentKindForExtension(extension: string): ContentKind | undefined {
  const normalized = extension.toLowerCase();
  if (CODE_EXTENSIONS[normalized]) return 'code';
  if (PROSE_EXTENSIONS[normalized]) return 'prose';
  return undefined;
}
