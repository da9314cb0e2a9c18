/**
 * Binary snapshot codec for the HNSW graph.
 *
 * Layout (little-endian):
 *   "HNSW" | u32 version | u32 generation | u32 dimensions | u32 metric
 *   u32 m | u32 efConstruction | u32 efSearch | u32 rngState
 *   i32 entryPoint | i32 maxLevel | u32 nodeCount
 *   per node:
 *     u32 level | u8 deleted | u32 idLength | id (utf-8)
 *     f32 × dimensions
 *     per layer 0..level: u32 count | u32 × count
 *
 * Each node carries its Segment id so the sidecar is joined by id,
 * not by position.
 */

import type { HnswNode, HnswState } from './hnsw.js';

const MAGIC = 'HNSW';
export const SNAPSHOT_VERSION = 1;
/** Only cosine is supported */
const METRIC_COSINE = 0;

export interface Snapshot {
  /** Incremented on every snapshot; WAL records carry the generation they follow */
  generation: number;
  state: HnswState;
  /** Segment id per key */
  ids: string[];
}

export class SnapshotFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SnapshotFormatError';
  }
}

export function encodeSnapshot(snapshot: Snapshot): Buffer {
  const { state, ids, generation } = snapshot;
  const idBytes = ids.map((id) => Buffer.from(id, 'utf-8'));

  let size = 4 + 4 * 8 + 4 * 2 + 4;
  state.nodes.forEach((node, key) => {
    size += 4 + 1 + 4 + (idBytes[key]?.length ?? 0) + 4 * state.dimensions;
    for (const layer of node.neighbors) {
      size += 4 + 4 * layer.length;
    }
  });

  const buffer = Buffer.alloc(size);
  let offset = buffer.write(MAGIC, 0, 'ascii');
  offset = buffer.writeUInt32LE(SNAPSHOT_VERSION, offset);
  offset = buffer.writeUInt32LE(generation, offset);
  offset = buffer.writeUInt32LE(state.dimensions, offset);
  offset = buffer.writeUInt32LE(METRIC_COSINE, offset);
  offset = buffer.writeUInt32LE(state.params.m, offset);
  offset = buffer.writeUInt32LE(state.params.efConstruction, offset);
  offset = buffer.writeUInt32LE(state.params.efSearch, offset);
  offset = buffer.writeUInt32LE(state.rngState, offset);
  offset = buffer.writeInt32LE(state.entryPoint, offset);
  offset = buffer.writeInt32LE(state.maxLevel, offset);
  offset = buffer.writeUInt32LE(state.nodes.length, offset);

  state.nodes.forEach((node, key) => {
    const id = idBytes[key] ?? Buffer.alloc(0);
    offset = buffer.writeUInt32LE(node.level, offset);
    offset = buffer.writeUInt8(node.deleted ? 1 : 0, offset);
    offset = buffer.writeUInt32LE(id.length, offset);
    offset += id.copy(buffer, offset);
    for (let i = 0; i < state.dimensions; i++) {
      offset = buffer.writeFloatLE(node.vector[i] ?? 0, offset);
    }
    for (const layer of node.neighbors) {
      offset = buffer.writeUInt32LE(layer.length, offset);
      for (const neighbor of layer) {
        offset = buffer.writeUInt32LE(neighbor, offset);
      }
    }
  });

  return buffer;
}

/**
 * Decode a snapshot.
 *
 * @throws SnapshotFormatError on a wrong magic, version or metric, or a truncated buffer
 */
export function decodeSnapshot(buffer: Buffer): Snapshot {
  if (buffer.length < 4 || buffer.toString('ascii', 0, 4) !== MAGIC) {
    throw new SnapshotFormatError('Not an HNSW snapshot (bad magic)');
  }

  try {
    let offset = 4;
    const u32 = (): number => {
      const value = buffer.readUInt32LE(offset);
      offset += 4;
      return value;
    };
    const i32 = (): number => {
      const value = buffer.readInt32LE(offset);
      offset += 4;
      return value;
    };

    const version = u32();
    if (version !== SNAPSHOT_VERSION) {
      throw new SnapshotFormatError(`Unsupported snapshot version ${version}`);
    }
    const generation = u32();
    const dimensions = u32();
    const metric = u32();
    if (metric !== METRIC_COSINE) {
      throw new SnapshotFormatError(`Unsupported distance metric ${metric}`);
    }
    const params = { m: u32(), efConstruction: u32(), efSearch: u32() };
    const rngState = u32();
    const entryPoint = i32();
    const maxLevel = i32();
    const count = u32();
    if (count > 0 && dimensions * 4 * count > buffer.length) {
      throw new SnapshotFormatError(`Truncated snapshot: ${count} nodes of ${dimensions} dimensions`);
    }

    const nodes: HnswNode[] = [];
    const ids: string[] = [];

    for (let key = 0; key < count; key++) {
      const level = u32();
      const deleted = buffer.readUInt8(offset) === 1;
      offset += 1;

      const idLength = u32();
      if (offset + idLength > buffer.length) {
        throw new SnapshotFormatError(`Truncated snapshot at node ${key}`);
      }
      ids.push(buffer.toString('utf-8', offset, offset + idLength));
      offset += idLength;

      const vector = new Float32Array(dimensions);
      for (let i = 0; i < dimensions; i++) {
        vector[i] = buffer.readFloatLE(offset);
        offset += 4;
      }

      const neighbors: number[][] = [];
      for (let layer = 0; layer <= level; layer++) {
        const linkCount = u32();
        const links: number[] = [];
        for (let j = 0; j < linkCount; j++) {
          links.push(u32());
        }
        neighbors.push(links);
      }

      nodes.push({ vector, level, neighbors, deleted });
    }

    if (offset !== buffer.length) {
      throw new SnapshotFormatError(`Trailing bytes after ${count} nodes`);
    }

    return {
      generation,
      ids,
      state: { dimensions, params, rngState, entryPoint, maxLevel, nodes },
    };
  } catch (error) {
    if (error instanceof SnapshotFormatError) throw error;
    // Buffer reads past the end throw ERR_OUT_OF_RANGE
    throw new SnapshotFormatError(
      `Truncated snapshot: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
