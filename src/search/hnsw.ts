/**
 * HNSW Graph
 *
 * Hierarchical navigable small world graph over dense integer keys.
 * Key i is the i-th inserted vector; keys are never reused. Deleted
 * nodes stay in the graph as tombstones so navigation is unaffected,
 * and are filtered out of results.
 *
 * Distance is cosine distance (1 - cosine similarity); a zero vector
 * is at distance 1 from everything.
 */

import { BinaryHeap } from './heap.js';
import { Mulberry32 } from './random.js';

export interface HnswParams {
  /** Max connections per node per layer (layer 0 allows 2M) */
  m: number;
  /** Candidate list size while inserting */
  efConstruction: number;
  /** Candidate list size while searching (raised to k when smaller) */
  efSearch: number;
}

export const DEFAULT_HNSW_PARAMS: HnswParams = {
  m: 16,
  efConstruction: 200,
  efSearch: 100,
};

export const DEFAULT_HNSW_SEED = 0x5eed1e55;

/**
 * A graph node as held in memory and in snapshots.
 */
export interface HnswNode {
  vector: Float32Array;
  level: number;
  /** neighbors[layer] = keys of adjacent nodes on that layer */
  neighbors: number[][];
  deleted: boolean;
}

/**
 * Everything needed to restore a graph exactly.
 */
export interface HnswState {
  dimensions: number;
  params: HnswParams;
  rngState: number;
  entryPoint: number;
  maxLevel: number;
  nodes: HnswNode[];
}

export interface Neighbor {
  key: number;
  distance: number;
}

function norm(vector: Float32Array): number {
  let sum = 0;
  for (let i = 0; i < vector.length; i++) {
    const v = vector[i] ?? 0;
    sum += v * v;
  }
  return Math.sqrt(sum);
}

function cosine(a: Float32Array, normA: number, b: Float32Array, normB: number): number {
  if (normA === 0 || normB === 0) return 1;

  let dot = 0;
  for (let i = 0; i < a.length; i++) {
    dot += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return Math.min(2, Math.max(0, 1 - dot / (normA * normB)));
}

/**
 * Cosine distance in [0, 2]. Zero-norm vectors are at distance 1.
 */
export function cosineDistance(a: Float32Array, b: Float32Array): number {
  return cosine(a, norm(a), b, norm(b));
}

/**
 * Map a distance to a similarity score in (0, 1]; 1 is an exact match.
 */
export function distanceToScore(distance: number): number {
  return 1 / (1 + distance);
}

const byDistance = (a: Neighbor, b: Neighbor): number => a.distance - b.distance;
const byDistanceDesc = (a: Neighbor, b: Neighbor): number => b.distance - a.distance;

export class HnswGraph {
  readonly dimensions: number;
  readonly params: HnswParams;

  private nodes: HnswNode[] = [];
  private norms: number[] = [];
  private entryPoint = -1;
  private maxLevel = -1;
  private deletedCount = 0;
  private readonly rng: Mulberry32;
  private readonly levelMultiplier: number;

  constructor(dimensions: number, params: Partial<HnswParams> = {}, seed: number = DEFAULT_HNSW_SEED) {
    this.dimensions = dimensions;
    this.params = { ...DEFAULT_HNSW_PARAMS, ...params };
    this.rng = new Mulberry32(seed);
    this.levelMultiplier = 1 / Math.log(Math.max(2, this.params.m));
  }

  /** Number of keys ever assigned, tombstones included */
  get capacity(): number {
    return this.nodes.length;
  }

  /** Number of live (non-deleted) nodes */
  get size(): number {
    return this.nodes.length - this.deletedCount;
  }

  get tombstones(): number {
    return this.deletedCount;
  }

  /** Key the next insert will receive */
  get nextKey(): number {
    return this.nodes.length;
  }

  isDeleted(key: number): boolean {
    return this.nodes[key]?.deleted ?? true;
  }

  vectorOf(key: number): Float32Array | undefined {
    return this.nodes[key]?.vector;
  }

  /**
   * Insert a vector and return its key.
   */
  insert(vector: Float32Array): number {
    if (vector.length !== this.dimensions) {
      throw new RangeError(`Expected vector of ${this.dimensions} dimensions, got ${vector.length}`);
    }

    const key = this.nodes.length;
    const level = this.randomLevel();
    const node: HnswNode = {
      vector,
      level,
      neighbors: Array.from({ length: level + 1 }, () => []),
      deleted: false,
    };
    this.nodes.push(node);
    this.norms.push(norm(vector));

    if (this.entryPoint === -1) {
      this.entryPoint = key;
      this.maxLevel = level;
      return key;
    }

    let entry: Neighbor = { key: this.entryPoint, distance: this.distanceTo(vector, this.entryPoint) };

    for (let layer = this.maxLevel; layer > level; layer--) {
      entry = this.greedyClosest(vector, entry, layer);
    }

    for (let layer = Math.min(level, this.maxLevel); layer >= 0; layer--) {
      const candidates = this.searchLayer(vector, [entry], this.params.efConstruction, layer);
      const selected = candidates.slice(0, this.params.m);

      node.neighbors[layer] = selected.map((candidate) => candidate.key);
      for (const candidate of selected) {
        this.connect(candidate.key, key, layer);
      }

      const closest = candidates[0];
      if (closest) entry = closest;
    }

    if (level > this.maxLevel) {
      this.maxLevel = level;
      this.entryPoint = key;
    }

    return key;
  }

  /**
   * Tombstone a key. Returns false when the key is unknown or already deleted.
   */
  markDeleted(key: number): boolean {
    const node = this.nodes[key];
    if (!node || node.deleted) return false;
    node.deleted = true;
    this.deletedCount++;
    return true;
  }

  /**
   * Up to k live nearest neighbors, closest first.
   */
  search(query: Float32Array, k: number, efSearch: number = this.params.efSearch): Neighbor[] {
    if (query.length !== this.dimensions) {
      throw new RangeError(`Expected vector of ${this.dimensions} dimensions, got ${query.length}`);
    }
    if (k <= 0 || this.size === 0 || this.entryPoint === -1) {
      return [];
    }

    let entry: Neighbor = { key: this.entryPoint, distance: this.distanceTo(query, this.entryPoint) };
    for (let layer = this.maxLevel; layer > 0; layer--) {
      entry = this.greedyClosest(query, entry, layer);
    }

    // Tombstones take candidate slots; widen until k live hits or the graph is exhausted
    let ef = Math.max(efSearch, k);
    for (;;) {
      const live = this.searchLayer(query, [entry], ef, 0).filter((n) => !this.isDeleted(n.key));
      if (live.length >= k || ef >= this.nodes.length) {
        return live.slice(0, k);
      }
      ef = Math.min(ef * 2, this.nodes.length);
    }
  }

  /**
   * Snapshot of the full graph state.
   */
  exportState(): HnswState {
    return {
      dimensions: this.dimensions,
      params: { ...this.params },
      rngState: this.rng.state,
      entryPoint: this.entryPoint,
      maxLevel: this.maxLevel,
      nodes: this.nodes,
    };
  }

  /**
   * Restore a graph from exported state.
   *
   * @throws RangeError when the state is internally inconsistent
   */
  static fromState(state: HnswState): HnswGraph {
    const graph = new HnswGraph(state.dimensions, state.params, state.rngState);
    const count = state.nodes.length;

    for (const [key, node] of state.nodes.entries()) {
      if (node.vector.length !== state.dimensions) {
        throw new RangeError(`Node ${key} has ${node.vector.length} dimensions, expected ${state.dimensions}`);
      }
      if (node.neighbors.length !== node.level + 1) {
        throw new RangeError(`Node ${key} has ${node.neighbors.length} layers, expected ${node.level + 1}`);
      }
      for (const layer of node.neighbors) {
        if (layer.some((neighbor) => neighbor < 0 || neighbor >= count)) {
          throw new RangeError(`Node ${key} links to a key outside the graph`);
        }
      }
    }
    const validEntry = count === 0 ? state.entryPoint === -1 : state.entryPoint >= 0 && state.entryPoint < count;
    if (!validEntry) {
      throw new RangeError(`Entry point ${state.entryPoint} is outside the graph`);
    }

    graph.nodes = state.nodes;
    graph.norms = state.nodes.map((node) => norm(node.vector));
    graph.entryPoint = state.entryPoint;
    graph.maxLevel = state.maxLevel;
    graph.deletedCount = state.nodes.filter((node) => node.deleted).length;
    return graph;
  }

  private randomLevel(): number {
    // 1 - U is in (0, 1], so the log is finite
    return Math.floor(-Math.log(1 - this.rng.next()) * this.levelMultiplier);
  }

  private distanceTo(query: Float32Array, key: number): number {
    const node = this.nodes[key];
    if (!node) return 1;
    return cosine(query, norm(query), node.vector, this.norms[key] ?? 0);
  }

  private greedyClosest(query: Float32Array, start: Neighbor, layer: number): Neighbor {
    let best = start;
    let improved = true;
    while (improved) {
      improved = false;
      for (const neighbor of this.nodes[best.key]?.neighbors[layer] ?? []) {
        const distance = this.distanceTo(query, neighbor);
        if (distance < best.distance) {
          best = { key: neighbor, distance };
          improved = true;
        }
      }
    }
    return best;
  }

  /**
   * Beam search on one layer. Returns up to ef nodes, closest first.
   */
  private searchLayer(query: Float32Array, entries: Neighbor[], ef: number, layer: number): Neighbor[] {
    const visited = new Set<number>(entries.map((entry) => entry.key));
    const candidates = new BinaryHeap<Neighbor>(byDistance);
    const results = new BinaryHeap<Neighbor>(byDistanceDesc);

    for (const entry of entries) {
      candidates.push(entry);
      results.push(entry);
    }

    while (candidates.size > 0) {
      const current = candidates.pop();
      const furthest = results.peek();
      if (!current || !furthest) break;
      if (current.distance > furthest.distance && results.size >= ef) break;

      for (const neighbor of this.nodes[current.key]?.neighbors[layer] ?? []) {
        if (visited.has(neighbor)) continue;
        visited.add(neighbor);

        const distance = this.distanceTo(query, neighbor);
        const worst = results.peek();
        if (results.size < ef || (worst !== undefined && distance < worst.distance)) {
          const candidate = { key: neighbor, distance };
          candidates.push(candidate);
          results.push(candidate);
          if (results.size > ef) results.pop();
        }
      }
    }

    return results.toArray().sort(byDistance);
  }

  /**
   * Add a directed edge from -> to on a layer, pruning `from` back to
   * its connection limit by keeping its closest neighbors.
   */
  private connect(from: number, to: number, layer: number): void {
    const node = this.nodes[from];
    if (!node) return;
    const links = node.neighbors[layer];
    if (!links) return;

    links.push(to);
    const limit = layer === 0 ? this.params.m * 2 : this.params.m;
    if (links.length <= limit) return;

    const ranked = links
      .map((key) => ({ key, distance: this.distanceTo(node.vector, key) }))
      .sort(byDistance)
      .slice(0, limit);
    node.neighbors[layer] = ranked.map((neighbor) => neighbor.key);
  }
}
