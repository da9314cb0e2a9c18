/**
 * Tests for the durable vector index
 *
 * Each test works in its own temp directory; nothing is shared.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { IndexError } from '../../errors/index.js';
import type { Segment } from '../../indexer/chunker/index.js';
import { companionPaths } from '../../storage/paths.js';
import { VectorIndex } from '../vector-index.js';

const vec = (...values: number[]): Float32Array => Float32Array.from(values);

function segment(id: string, documentId: string, content = `text of ${id}`): Segment {
  return {
    id,
    document_id: documentId,
    content,
    metadata: { content_type: 'prose', chunk_index: 0, sentence_count: 1 },
    created_at: '2026-01-01T00:00:00.000Z',
  };
}

function walLine(record: object): string {
  return JSON.stringify(record) + '\n';
}

describe('VectorIndex', () => {
  let dir: string;
  let basePath: string;
  let logger: { warn: Mock<(message: string) => void>; debug: Mock<(message: string) => void> };

  const open = (options: { dimensions?: number; snapshotEvery?: number } = {}): Promise<VectorIndex> =>
    VectorIndex.open({
      basePath,
      dimensions: options.dimensions ?? 4,
      snapshotEvery: options.snapshotEvery,
      logger,
    });

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lantern-index-'));
    basePath = path.join(dir, 'idx.hnsw');
    logger = { warn: vi.fn<(message: string) => void>(), debug: vi.fn<(message: string) => void>() };
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('search', () => {
    it('returns [] from an empty index', async () => {
      const index = await open();
      expect(index.size).toBe(0);
      expect(index.search(vec(1, 0, 0, 0), 5)).toEqual([]);
      await index.close();
    });

    it('returns hits with non-increasing scores', async () => {
      const index = await open();
      await index.add(segment('c', 'doc'), vec(0, 0, 1, 0));
      await index.add(segment('a', 'doc'), vec(1, 0, 0, 0));
      await index.add(segment('b', 'doc'), vec(1, 1, 0, 0));

      const hits = index.search(vec(1, 0, 0, 0), 3);

      expect(hits.map((h) => h.id)).toEqual(['a', 'b', 'c']);
      expect(hits[0]?.score).toBeCloseTo(1, 6);
      expect(hits[1]?.score).toBeCloseTo(1 / (2 - Math.SQRT1_2), 6);
      expect(hits[2]?.score).toBeCloseTo(0.5, 6);
      await index.close();
    });

    it('limits results to k', async () => {
      const index = await open();
      await index.addMany([
        { segment: segment('a', 'doc'), vector: vec(1, 0, 0, 0) },
        { segment: segment('b', 'doc'), vector: vec(0, 1, 0, 0) },
      ]);

      expect(index.search(vec(1, 0, 0, 0), 1).map((h) => h.id)).toEqual(['a']);
      expect(index.search(vec(1, 0, 0, 0), 0)).toEqual([]);
      await index.close();
    });

    it('throws IndexError for a query of the wrong dimension', async () => {
      const index = await open();
      expect(() => index.search(vec(1, 0), 1)).toThrow(IndexError);
      await index.close();
    });
  });

  describe('writes', () => {
    it('rejects vectors of the wrong dimension without changing the index', async () => {
      const index = await open();
      await expect(index.add(segment('a', 'doc'), vec(1, 0))).rejects.toThrow(
        'Vector for segment a has 2 dimensions, index expects 4'
      );
      expect(index.size).toBe(0);
      await index.close();
    });

    it('replaces a segment added twice under the same id', async () => {
      const index = await open();
      await index.add(segment('a', 'doc', 'first'), vec(1, 0, 0, 0));
      await index.add(segment('a', 'doc', 'second'), vec(0, 1, 0, 0));

      expect(index.size).toBe(1);
      expect(index.getSegment('a')?.content).toBe('second');
      expect(index.search(vec(1, 0, 0, 0), 5).map((h) => h.id)).toEqual(['a']);
      await index.close();
    });

    it('removes a segment and reports unknown ids', async () => {
      const index = await open();
      await index.add(segment('a', 'doc'), vec(1, 0, 0, 0));
      await index.add(segment('b', 'doc'), vec(0, 1, 0, 0));

      expect(await index.remove('a')).toBe(true);
      expect(await index.remove('a')).toBe(false);
      expect(index.getSegment('a')).toBeUndefined();
      expect(index.search(vec(1, 0, 0, 0), 5).map((h) => h.id)).toEqual(['b']);
      await index.close();
    });

    it('removes all segments of a document', async () => {
      const index = await open();
      await index.addMany([
        { segment: segment('x_chunk_0', 'x'), vector: vec(1, 0, 0, 0) },
        { segment: segment('x_chunk_1', 'x'), vector: vec(0, 1, 0, 0) },
        { segment: segment('y_chunk_0', 'y'), vector: vec(0, 0, 1, 0) },
      ]);

      expect(await index.removeDocument('x')).toBe(2);
      expect(await index.removeDocument('x')).toBe(0);
      expect(index.segments().map((s) => s.id)).toEqual(['y_chunk_0']);
      await index.close();
    });

    it('lists segments of one document in insertion order', async () => {
      const index = await open();
      await index.addMany([
        { segment: segment('x_chunk_0', 'x'), vector: vec(1, 0, 0, 0) },
        { segment: segment('y_chunk_0', 'y'), vector: vec(0, 0, 1, 0) },
        { segment: segment('x_chunk_1', 'x'), vector: vec(0, 1, 0, 0) },
      ]);

      expect(index.segmentsForDocument('x').map((s) => s.id)).toEqual(['x_chunk_0', 'x_chunk_1']);
      await index.close();
    });

    it('replaces the segments of a document and reports how many were removed', async () => {
      const index = await open();
      await index.addMany([
        { segment: segment('x_chunk_0', 'x'), vector: vec(1, 0, 0, 0) },
        { segment: segment('x_chunk_1', 'x'), vector: vec(0, 1, 0, 0) },
        { segment: segment('y_chunk_0', 'y'), vector: vec(0, 0, 1, 0) },
      ]);

      const removed = await index.replaceDocument('x', [
        { segment: segment('x_chunk_0', 'x', 'rewritten'), vector: vec(0, 0, 0, 1) },
      ]);

      expect(removed).toBe(2);
      expect(index.segmentsForDocument('x').map((s) => s.content)).toEqual(['rewritten']);
      expect(index.segmentsForDocument('y')).toHaveLength(1);
      await index.close();
    });

    it('never mixes two overlapping replacements of one document', async () => {
      const index = await open();
      const longer = [0, 1, 2].map((n) => ({
        segment: segment(`x_chunk_${n}`, 'x', `long ${n}`),
        vector: vec(1, n, 0, 0),
      }));
      const shorter = [{ segment: segment('x_chunk_0', 'x', 'short 0'), vector: vec(0, 1, 0, 0) }];

      await Promise.all([index.replaceDocument('x', longer), index.replaceDocument('x', shorter)]);

      expect(index.segmentsForDocument('x').map((s) => s.content)).toEqual(['short 0']);
      await index.close();
    });

    it('hands out copies that cannot change the indexed segment', async () => {
      const index = await open();
      await index.add(segment('a', 'doc'), vec(1, 0, 0, 0));

      const copy = index.getSegment('a');
      if (copy) copy.metadata.content_type = 'changed';
      const listed = index.segments()[0];
      if (listed) listed.metadata.chunk_index = 99;
      await index.close();

      const reopened = await open();
      expect(reopened.getSegment('a')?.metadata).toEqual({ content_type: 'prose', chunk_index: 0, sentence_count: 1 });
      await reopened.close();
    });

    it('rejects writes after close', async () => {
      const index = await open();
      await index.close();
      await expect(index.add(segment('a', 'doc'), vec(1, 0, 0, 0))).rejects.toBeInstanceOf(IndexError);
    });
  });

  describe('persistence', () => {
    it('restores segments and search results after reopening', async () => {
      const first = await open();
      await first.add(segment('a', 'doc'), vec(1, 0, 0, 0));
      await first.add(segment('b', 'doc'), vec(0, 1, 0, 0));
      const before = first.search(vec(1, 0.2, 0, 0), 2);
      await first.close();

      const paths = companionPaths(basePath);
      expect(fs.existsSync(paths.blob)).toBe(true);
      expect(fs.existsSync(paths.chunks)).toBe(true);
      expect(fs.readFileSync(paths.wal, 'utf-8')).toBe('');

      const second = await open();
      expect(second.size).toBe(2);
      expect(second.getSegment('b')?.content).toBe('text of b');
      expect(second.search(vec(1, 0.2, 0, 0), 2)).toEqual(before);
      expect(logger.warn).not.toHaveBeenCalled();
      await second.close();
    });

    it('keeps every segment of overlapping writes across a reopen', async () => {
      const first = await open();
      await Promise.all([
        first.addMany([
          { segment: segment('x_chunk_0', 'x'), vector: vec(1, 0, 0, 0) },
          { segment: segment('x_chunk_1', 'x'), vector: vec(1, 1, 0, 0) },
        ]),
        first.addMany([{ segment: segment('y_chunk_0', 'y'), vector: vec(0, 0, 1, 0) }]),
        first.add(segment('z_chunk_0', 'z'), vec(0, 0, 0, 1)),
      ]);
      await first.close();

      const second = await open();
      expect(second.segments().map((s) => s.id)).toEqual(['x_chunk_0', 'x_chunk_1', 'y_chunk_0', 'z_chunk_0']);
      await second.close();
    });

    it('snapshots once the log reaches snapshotEvery records', async () => {
      const index = await open({ snapshotEvery: 2 });
      await index.add(segment('a', 'doc'), vec(1, 0, 0, 0));
      expect(fs.existsSync(basePath)).toBe(false);

      await index.add(segment('b', 'doc'), vec(0, 1, 0, 0));

      expect(fs.existsSync(basePath)).toBe(true);
      expect(fs.readFileSync(companionPaths(basePath).wal, 'utf-8')).toBe('');
      expect(index.stats()).toMatchObject({ generation: 1, pendingWrites: 0, segments: 2, documents: 1 });
      await index.close();
    });

    it('compacts removed entries on flush', async () => {
      const index = await open();
      await index.add(segment('a', 'doc'), vec(1, 0, 0, 0));
      await index.add(segment('b', 'doc'), vec(0, 1, 0, 0));
      await index.add(segment('c', 'doc'), vec(0, 0, 1, 0));
      await index.remove('b');
      expect(index.stats().tombstones).toBe(1);

      await index.flush();

      expect(index.stats().tombstones).toBe(0);
      expect(index.segments().map((s) => s.id)).toEqual(['a', 'c']);
      expect(index.search(vec(0, 0, 1, 0), 1).map((h) => h.id)).toEqual(['c']);
      await index.close();
    });

    it('replays the write-ahead log when no snapshot exists', async () => {
      fs.writeFileSync(
        companionPaths(basePath).wal,
        walLine({ op: 'add', gen: 0, segment: segment('a', 'doc'), vector: [1, 0, 0, 0] }) +
          walLine({ op: 'add', gen: 0, segment: segment('b', 'doc'), vector: [0, 1, 0, 0] }) +
          walLine({ op: 'remove', gen: 0, id: 'a' })
      );

      const index = await open();

      expect(index.segments().map((s) => s.id)).toEqual(['b']);
      expect(index.stats().pendingWrites).toBe(3);
      await index.close();
    });

    it('skips a torn trailing log record and keeps the rest', async () => {
      fs.writeFileSync(
        companionPaths(basePath).wal,
        walLine({ op: 'add', gen: 0, segment: segment('a', 'doc'), vector: [1, 0, 0, 0] }) +
          walLine({ op: 'add', gen: 0, segment: segment('b', 'doc'), vector: [0, 1, 0, 0] }) +
          '{"op":"add","gen":0,"seg'
      );

      const index = await open();

      expect(index.size).toBe(2);
      expect(logger.warn).toHaveBeenCalledWith('Skipping torn record at the end of idx.wal (line 3)');
      await index.close();
    });

    it('ignores log records from before the loaded snapshot', async () => {
      const first = await open();
      await first.add(segment('a', 'doc'), vec(1, 0, 0, 0));
      await first.close();

      // Left behind by a crash between writing the blob and truncating the log
      fs.writeFileSync(
        companionPaths(basePath).wal,
        walLine({ op: 'add', gen: 0, segment: segment('stale', 'doc'), vector: [0, 1, 0, 0] })
      );

      const second = await open();
      expect(second.segments().map((s) => s.id)).toEqual(['a']);
      await second.close();
    });

    it('starts empty with a warning when the blob is corrupt', async () => {
      const first = await open();
      await first.add(segment('a', 'doc'), vec(1, 0, 0, 0));
      await first.close();
      fs.writeFileSync(basePath, 'garbage');

      const second = await open();

      expect(second.size).toBe(0);
      expect(logger.warn).toHaveBeenCalledWith(expect.stringContaining('Could not load index'));
      await second.close();
    });

    it('starts empty with a warning when the sidecar is corrupt', async () => {
      const first = await open();
      await first.add(segment('a', 'doc'), vec(1, 0, 0, 0));
      await first.close();
      fs.writeFileSync(companionPaths(basePath).chunks, '[{"id":');

      const second = await open();

      expect(second.size).toBe(0);
      expect(logger.warn).toHaveBeenCalledWith(expect.stringContaining('is corrupt'));
      await second.close();
    });

    it('starts empty with a warning when the stored dimension differs', async () => {
      const first = await open();
      await first.add(segment('a', 'doc'), vec(1, 0, 0, 0));
      await first.close();

      const second = await open({ dimensions: 8 });

      expect(second.size).toBe(0);
      expect(logger.warn).toHaveBeenCalledWith(expect.stringContaining('has 4 dimensions but 8 are configured'));
      await second.close();
    });

    it('hides entries whose sidecar record is missing', async () => {
      const first = await open();
      await first.add(segment('a', 'doc'), vec(1, 0, 0, 0));
      await first.add(segment('b', 'doc'), vec(0, 1, 0, 0));
      await first.close();

      const chunksPath = companionPaths(basePath).chunks;
      const sidecar: unknown = JSON.parse(fs.readFileSync(chunksPath, 'utf-8'));
      const kept = Array.isArray(sidecar) ? sidecar.slice(0, 1) : [];
      fs.writeFileSync(chunksPath, JSON.stringify(kept));

      const second = await open();

      expect(second.size).toBe(1);
      expect(second.search(vec(0, 1, 0, 0), 5).map((h) => h.id)).toEqual(['a']);
      expect(logger.warn).toHaveBeenCalledWith('1 index entry has no sidecar entry and will not be returned');
      await second.close();
    });
  });
});
