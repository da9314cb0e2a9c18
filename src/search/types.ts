/**
 * Search Module Types
 */

import type { Segment } from '../indexer/chunker/index.js';

/**
 * One search result: a Segment id and its similarity in (0, 1].
 */
export interface SearchHit {
  id: string;
  score: number;
}

export interface IndexEntry {
  segment: Segment;
  vector: Float32Array;
}

/**
 * Snapshot of index state, shown by `lantern status`.
 */
export interface IndexStats {
  /** Graph blob path */
  basePath: string;
  dimensions: number;
  /** Live Segments */
  segments: number;
  /** Distinct document ids among live Segments */
  documents: number;
  /** Removed entries awaiting compaction */
  tombstones: number;
  /** Writes not yet folded into a snapshot */
  pendingWrites: number;
  /** Snapshot generation */
  generation: number;
}
