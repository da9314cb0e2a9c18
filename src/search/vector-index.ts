/**
 * Vector Index
 *
 * Approximate nearest-neighbor index over Segments, durable across restarts.
 *
 * - HNSW graph over dense integer keys; key i is the i-th inserted Segment,
 *   so every key resolves to exactly one Segment (no hash collisions)
 * - Every write is appended to the write-ahead log and fsynced before the
 *   call resolves
 * - A snapshot (graph blob + Segment sidecar) is written once the log holds
 *   `snapshotEvery` records, and on flush() and close(); removed entries are
 *   compacted away at that point
 * - Writes are serialized by a mutex; search() is synchronous and never
 *   sees a half-applied write
 *
 * Load and save failures are logged and the index carries on (empty, or
 * in memory only). Only caller mistakes such as a wrong vector dimension
 * throw.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';

import { IndexError } from '../errors/index.js';
import type { Segment } from '../indexer/chunker/index.js';
import { companionPaths, type CompanionPaths } from '../storage/paths.js';
import { writeFileAtomic } from '../storage/atomic.js';
import { SidecarSchema, type WalRecord } from '../storage/schemas.js';
import { WriteAheadLog, readWal } from '../storage/wal.js';
import { Mutex, safeJsonParse, silentLogger, type Logger } from '../utils/index.js';
import { HnswGraph, distanceToScore, type HnswParams } from './hnsw.js';
import { decodeSnapshot, encodeSnapshot } from './snapshot.js';
import type { IndexEntry, IndexStats, SearchHit } from './types.js';

/** Default number of log records that triggers a snapshot */
export const DEFAULT_SNAPSHOT_EVERY = 256;

export interface VectorIndexOptions {
  /** Path of the graph blob; companions share its stem */
  basePath: string;

  /** Vector length; a snapshot with another dimension is discarded */
  dimensions: number;

  /** HNSW tuning (default M=16, efConstruction=200, efSearch=100) */
  hnsw?: Partial<HnswParams>;

  /** Snapshot once the write-ahead log holds this many records */
  snapshotEvery?: number;

  /** Receives load, replay and save warnings */
  logger?: Logger;
}

interface LoadedSnapshot {
  graph: HnswGraph;
  arena: Array<Segment | null>;
  generation: number;
}

function copySegment(segment: Segment): Segment {
  return { ...segment, metadata: { ...segment.metadata } };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class VectorIndex {
  readonly dimensions: number;
  readonly paths: CompanionPaths;

  private graph: HnswGraph;
  /** key → Segment; null for keys without a sidecar entry */
  private arena: Array<Segment | null>;
  /** Live Segment id → key */
  private keyById = new Map<string, number>();
  private generation: number;
  /** Writes since the last successful snapshot */
  private unsnapshotted: number;
  private closed = false;

  private readonly mutex = new Mutex();
  private readonly hnswParams: Partial<HnswParams>;
  private readonly snapshotEvery: number;
  private readonly logger: Logger;

  private constructor(
    options: VectorIndexOptions,
    loaded: LoadedSnapshot,
    private readonly wal: WriteAheadLog,
    unsnapshotted: number
  ) {
    this.dimensions = options.dimensions;
    this.paths = companionPaths(options.basePath);
    this.hnswParams = options.hnsw ?? {};
    this.snapshotEvery = Math.max(1, options.snapshotEvery ?? DEFAULT_SNAPSHOT_EVERY);
    this.logger = options.logger ?? silentLogger;
    this.graph = loaded.graph;
    this.arena = loaded.arena;
    this.generation = loaded.generation;
    this.unsnapshotted = unsnapshotted;
    this.rebuildKeyMap();
  }

  /**
   * Open (or create) the index at `basePath`: load the snapshot if there is
   * a usable one, then replay the write-ahead log.
   */
  static async open(options: VectorIndexOptions): Promise<VectorIndex> {
    const logger = options.logger ?? silentLogger;
    const paths = companionPaths(options.basePath);

    const snapshot = await loadSnapshot(paths, options, logger);
    const loaded: LoadedSnapshot = snapshot ?? {
      graph: new HnswGraph(options.dimensions, options.hnsw),
      arena: [],
      generation: 0,
    };

    const records = await readWal(paths.wal, logger);
    const wal = await WriteAheadLog.open(paths.wal, records.length);
    const index = new VectorIndex(options, loaded, wal, records.length);
    index.replay(records, snapshot ? snapshot.generation : null);

    logger.debug?.(
      `Vector index ready: ${index.size} segments, ${records.length} log record(s) replayed`
    );
    return index;
  }

  /** Live Segments */
  get size(): number {
    return this.keyById.size;
  }

  /**
   * Add one Segment. Replaces a live Segment with the same id.
   */
  async add(segment: Segment, vector: Float32Array): Promise<void> {
    await this.addMany([{ segment, vector }]);
  }

  /**
   * Add Segments in order, with one log write for the batch.
   *
   * @throws IndexError when a vector has the wrong dimension or the index is closed
   */
  async addMany(entries: readonly IndexEntry[]): Promise<void> {
    if (entries.length === 0) return;
    await this.write(null, entries);
  }

  /**
   * Swap every Segment of a document for `entries` in one critical
   * section, so concurrent replacements of one document never mix.
   * Returns how many Segments were removed.
   *
   * @throws IndexError when a vector has the wrong dimension or the index is closed
   */
  async replaceDocument(documentId: string, entries: readonly IndexEntry[]): Promise<number> {
    return this.write(documentId, entries);
  }

  /**
   * Remove one Segment. Returns false when no live Segment has that id.
   */
  async remove(segmentId: string): Promise<boolean> {
    return this.mutex.runExclusive(async () => {
      this.ensureOpen();
      if (!this.keyById.has(segmentId)) return false;

      await this.log([{ op: 'remove', gen: this.generation, id: segmentId }]);
      this.applyRemove(segmentId);
      await this.maybeSnapshot();
      return true;
    });
  }

  /**
   * Remove every Segment of a document. Returns how many were removed.
   */
  async removeDocument(documentId: string): Promise<number> {
    return this.write(documentId, []);
  }

  /**
   * Up to k Segments nearest to `vector`, highest score first.
   * An empty index returns [].
   *
   * @throws IndexError when the vector has the wrong dimension
   */
  search(vector: Float32Array, k: number): SearchHit[] {
    this.checkDimensions(vector, 'Query vector');
    if (k <= 0 || this.size === 0) return [];

    const hits: SearchHit[] = [];
    for (const neighbor of this.graph.search(vector, k)) {
      const segment = this.arena[neighbor.key];
      if (segment) {
        hits.push({ id: segment.id, score: distanceToScore(neighbor.distance) });
      }
    }
    return hits.sort((a, b) => b.score - a.score);
  }

  /**
   * A copy of the Segment; the indexed record is never handed out.
   */
  getSegment(id: string): Segment | undefined {
    const key = this.keyById.get(id);
    const segment = key === undefined ? undefined : this.arena[key];
    return segment ? copySegment(segment) : undefined;
  }

  /**
   * Live Segments in insertion order (copies).
   */
  segments(): Segment[] {
    return this.liveSegments().map(copySegment);
  }

  /**
   * Live Segments of one document, in chunk order (copies).
   */
  segmentsForDocument(documentId: string): Segment[] {
    return this.liveSegments()
      .filter((segment) => segment.document_id === documentId)
      .map(copySegment);
  }

  stats(): IndexStats {
    const live = this.liveSegments();
    return {
      basePath: this.paths.blob,
      dimensions: this.dimensions,
      segments: live.length,
      documents: new Set(live.map((segment) => segment.document_id)).size,
      tombstones: this.graph.tombstones,
      pendingWrites: this.unsnapshotted,
      generation: this.generation,
    };
  }

  /**
   * Write a snapshot now (no-op when nothing changed since the last one).
   */
  async flush(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.ensureOpen();
      await this.snapshot();
    });
  }

  /**
   * Snapshot and release the log. Further writes throw.
   */
  async close(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      if (this.closed) return;
      await this.snapshot();
      await this.wal.close();
      this.closed = true;
    });
  }

  // ==========================================================================
  // Internals (callers hold the mutex)
  // ==========================================================================

  private liveSegments(): Segment[] {
    const live: Segment[] = [];
    this.arena.forEach((segment, key) => {
      if (segment && !this.graph.isDeleted(key)) live.push(segment);
    });
    return live;
  }

  /**
   * Remove a document's Segments (when `documentId` is given) and add
   * `entries`, as one log write under the mutex.
   */
  private async write(documentId: string | null, entries: readonly IndexEntry[]): Promise<number> {
    for (const { segment, vector } of entries) {
      this.checkDimensions(vector, `Vector for segment ${segment.id}`);
    }

    return this.mutex.runExclusive(async () => {
      this.ensureOpen();
      const removed =
        documentId === null
          ? []
          : this.liveSegments()
              .filter((segment) => segment.document_id === documentId)
              .map((segment) => segment.id);
      if (removed.length === 0 && entries.length === 0) return 0;

      const copies = entries.map(({ segment, vector }) => ({
        segment: copySegment(segment),
        vector: Float32Array.from(vector),
      }));

      await this.log([
        ...removed.map((id): WalRecord => ({ op: 'remove', gen: this.generation, id })),
        ...copies.map(({ segment, vector }): WalRecord => ({
          op: 'add',
          gen: this.generation,
          segment,
          vector: Array.from(vector),
        })),
      ]);
      for (const id of removed) {
        this.applyRemove(id);
      }
      for (const { segment, vector } of copies) {
        this.applyAdd(segment, vector);
      }
      await this.maybeSnapshot();
      return removed.length;
    });
  }

  private replay(records: readonly WalRecord[], snapshotGeneration: number | null): void {
    let stale = 0;
    for (const record of records) {
      // Records older than the loaded snapshot are already part of it
      if (snapshotGeneration !== null && record.gen !== snapshotGeneration) {
        stale++;
        continue;
      }
      if (record.op === 'add') {
        if (record.vector.length !== this.dimensions) {
          this.logger.warn(
            `Skipping logged segment ${record.segment.id}: ${record.vector.length} dimensions, expected ${this.dimensions}`
          );
          continue;
        }
        this.applyAdd(record.segment, Float32Array.from(record.vector));
      } else {
        this.applyRemove(record.id);
      }
      this.generation = Math.max(this.generation, record.gen);
    }
    if (stale > 0) {
      this.logger.debug?.(`Ignored ${stale} log record(s) already in the snapshot`);
    }
  }

  private applyAdd(segment: Segment, vector: Float32Array): void {
    this.applyRemove(segment.id);
    const key = this.graph.insert(vector);
    this.arena[key] = segment;
    this.keyById.set(segment.id, key);
  }

  private applyRemove(segmentId: string): void {
    const key = this.keyById.get(segmentId);
    if (key === undefined) return;
    this.graph.markDeleted(key);
    this.keyById.delete(segmentId);
  }

  private async log(records: WalRecord[]): Promise<void> {
    this.unsnapshotted += records.length;
    try {
      await this.wal.append(records);
    } catch (error) {
      this.logger.warn(
        `Could not write to ${this.paths.wal} (${errorMessage(error)}); ` +
          'the change is held in memory until the next snapshot'
      );
    }
  }

  private async maybeSnapshot(): Promise<void> {
    if (this.unsnapshotted >= this.snapshotEvery) {
      await this.snapshot();
    }
  }

  /**
   * Compact tombstones, then write sidecar, blob, and empty the log.
   * The generation only advances once the blob is in place.
   */
  private async snapshot(): Promise<void> {
    if (this.unsnapshotted === 0 && this.graph.tombstones === 0) return;

    if (this.graph.tombstones > 0) {
      this.compact();
    }

    const nextGeneration = this.generation + 1;
    const live = this.arena.filter((segment): segment is Segment => segment !== null);

    try {
      await writeFileAtomic(this.paths.chunks, JSON.stringify(live, null, 2));
      await writeFileAtomic(
        this.paths.blob,
        encodeSnapshot({
          generation: nextGeneration,
          state: this.graph.exportState(),
          ids: this.arena.map((segment) => segment?.id ?? ''),
        })
      );
    } catch (error) {
      this.logger.warn(
        `Could not write index snapshot to ${this.paths.blob} (${errorMessage(error)}); ` +
          'changes remain in the write-ahead log'
      );
      return;
    }

    this.generation = nextGeneration;
    this.unsnapshotted = 0;
    try {
      await this.wal.reset();
    } catch (error) {
      // Stale records are skipped on load by generation
      this.logger.warn(`Could not truncate ${this.paths.wal}: ${errorMessage(error)}`);
    }
  }

  /**
   * Rebuild the graph from live entries in key order, so keys stay dense.
   */
  private compact(): void {
    const state = this.graph.exportState();
    const graph = new HnswGraph(this.dimensions, this.hnswParams, state.rngState);
    const arena: Segment[] = [];

    this.arena.forEach((segment, key) => {
      const vector = this.graph.vectorOf(key);
      if (segment && vector && !this.graph.isDeleted(key)) {
        arena[graph.insert(vector)] = segment;
      }
    });

    this.graph = graph;
    this.arena = arena;
    this.rebuildKeyMap();
  }

  private rebuildKeyMap(): void {
    this.keyById = new Map();
    this.arena.forEach((segment, key) => {
      if (segment && !this.graph.isDeleted(key)) {
        this.keyById.set(segment.id, key);
      }
    });
  }

  private checkDimensions(vector: Float32Array, what: string): void {
    if (vector.length !== this.dimensions) {
      throw new IndexError(
        `${what} has ${vector.length} dimensions, index expects ${this.dimensions}`
      );
    }
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new IndexError('Vector index is closed');
    }
  }
}

/**
 * Load blob + sidecar. Returns null (after a warning) when either is
 * missing, corrupt, or built for another dimension.
 */
async function loadSnapshot(
  paths: CompanionPaths,
  options: VectorIndexOptions,
  logger: Logger
): Promise<LoadedSnapshot | null> {
  const hasBlob = existsSync(paths.blob);
  const hasSidecar = existsSync(paths.chunks);
  if (!hasBlob && !hasSidecar) return null;
  if (hasBlob !== hasSidecar) {
    logger.warn(
      `Found ${hasBlob ? paths.blob : paths.chunks} without its companion; starting with an empty index`
    );
    return null;
  }

  let graph: HnswGraph;
  let ids: string[];
  let generation: number;
  try {
    const snapshot = decodeSnapshot(await readFile(paths.blob));
    if (snapshot.state.dimensions !== options.dimensions) {
      logger.warn(
        `Index at ${paths.blob} has ${snapshot.state.dimensions} dimensions but ${options.dimensions} are configured; ` +
          'starting with an empty index (re-ingest your documents)'
      );
      return null;
    }
    graph = HnswGraph.fromState({
      ...snapshot.state,
      params: { ...snapshot.state.params, ...options.hnsw },
    });
    ids = snapshot.ids;
    generation = snapshot.generation;
  } catch (error) {
    logger.warn(`Could not load index ${paths.blob} (${errorMessage(error)}); starting with an empty index`);
    return null;
  }

  let sidecarText: string;
  try {
    sidecarText = await readFile(paths.chunks, 'utf-8');
  } catch (error) {
    logger.warn(`Could not read ${paths.chunks} (${errorMessage(error)}); starting with an empty index`);
    return null;
  }
  const sidecar = safeJsonParse(sidecarText, SidecarSchema, null, (error) => {
    logger.warn(`Sidecar ${paths.chunks} is corrupt (${error.message}); starting with an empty index`);
  });
  if (!sidecar) return null;

  const byId = new Map(sidecar.map((segment) => [segment.id, segment]));
  let unreachable = 0;
  const arena = ids.map((id, key) => {
    const segment = byId.get(id);
    if (segment) return segment;
    if (!graph.isDeleted(key)) {
      graph.markDeleted(key);
      unreachable++;
    }
    return null;
  });

  if (unreachable > 0) {
    logger.warn(`${unreachable} index entr${unreachable === 1 ? 'y has' : 'ies have'} no sidecar entry and will not be returned`);
  }

  return { graph, arena, generation };
}
