/**
 * Centralized Path Definitions
 *
 * Directory structure:
 * ~/.lantern/                 (or $LANTERN_HOME)
 * ├── config.toml             (User configuration)
 * ├── vector_index.hnsw       (HNSW graph snapshot)
 * ├── vector_index.chunks.json
 * ├── vector_index.documents.json
 * └── vector_index.wal
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

/**
 * Get the lantern directory path.
 * LANTERN_HOME wins over ~/.lantern so tests and CI can isolate state.
 */
export function getLanternDir(): string {
  const override = process.env.LANTERN_HOME?.trim();
  return override ? override : join(homedir(), '.lantern');
}

/**
 * Get the config file path (<lantern dir>/config.toml)
 */
export function getConfigPath(): string {
  return join(getLanternDir(), 'config.toml');
}

/**
 * Default base path of the vector index blob
 */
export function getDefaultIndexPath(): string {
  return join(getLanternDir(), 'vector_index.hnsw');
}

/**
 * Expand a leading `~` to the home directory.
 */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}
