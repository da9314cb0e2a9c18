/**
 * Companion file paths for a vector index base path.
 *
 * /data/vector_index.hnsw →
 *   /data/vector_index.hnsw            (graph snapshot)
 *   /data/vector_index.chunks.json     (Segment sidecar)
 *   /data/vector_index.wal             (write-ahead log)
 *   /data/vector_index.documents.json  (Document Store)
 */

import * as path from 'node:path';

export interface CompanionPaths {
  blob: string;
  chunks: string;
  wal: string;
  documents: string;
}

export function companionPaths(basePath: string): CompanionPaths {
  const parsed = path.parse(basePath);
  const stem = path.join(parsed.dir, parsed.name);

  return {
    blob: basePath,
    chunks: `${stem}.chunks.json`,
    wal: `${stem}.wal`,
    documents: `${stem}.documents.json`,
  };
}
