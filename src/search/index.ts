/**
 * Search Module
 *
 * Durable approximate nearest-neighbor index over Segments.
 *
 * @example
 * ```typescript
 * import { VectorIndex } from './search/index.js';
 *
 * const index = await VectorIndex.open({ basePath, dimensions: 384 });
 * await index.add(segment, vector);
 * const hits = index.search(queryVector, 5);
 * await index.close();
 * ```
 */

export type { IndexEntry, IndexStats, SearchHit } from './types.js';

export { VectorIndex, DEFAULT_SNAPSHOT_EVERY, type VectorIndexOptions } from './vector-index.js';

export {
  HnswGraph,
  cosineDistance,
  distanceToScore,
  DEFAULT_HNSW_PARAMS,
  type HnswParams,
  type HnswState,
  type Neighbor,
} from './hnsw.js';

export { encodeSnapshot, decodeSnapshot, SnapshotFormatError, type Snapshot } from './snapshot.js';

export { formatResult, formatResults, formatScore, truncateSnippet, type FormatOptions } from './formatter.js';
