/**
 * Test Utilities - Temporary Workspace
 *
 * A throwaway directory plus a Config whose index lives inside it and
 * whose embeddings come from the hash encoder, so nothing touches the
 * network or the user's ~/.lantern.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { DEFAULT_CONFIG } from '../config/defaults.js';
import type { Config } from '../config/schema.js';

export interface TestWorkspace {
  dir: string;
  config: Config;
  /** Remove the directory and everything in it */
  cleanup: () => void;
}

export interface TestWorkspaceOptions {
  /** Embedding dimension (default 64) */
  dimensions?: number;
  chunking?: Partial<Config['chunking']>;
  context?: Partial<Config['context']>;
  index?: Partial<Config['index']>;
}

export function createTestWorkspace(options: TestWorkspaceOptions = {}): TestWorkspace {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lantern-test-'));

  const config: Config = {
    ...DEFAULT_CONFIG,
    embedding: { ...DEFAULT_CONFIG.embedding, provider: 'hash', dimensions: options.dimensions ?? 64 },
    chunking: { ...DEFAULT_CONFIG.chunking, ...options.chunking },
    context: { ...DEFAULT_CONFIG.context, ...options.context },
    index: { ...DEFAULT_CONFIG.index, path: path.join(dir, 'index.hnsw'), ...options.index },
  };

  return {
    dir,
    config,
    cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
  };
}
