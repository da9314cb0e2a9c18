/**
 * Tests for the Document Store
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { DocumentStore } from '../document-store.js';
import type { DocumentRecord } from '../schemas.js';

const record = (id: string, ingestedAt: string): DocumentRecord => ({
  id,
  content: `Content of ${id}.`,
  length: `Content of ${id}.`.length,
  metadata: { source: 'test' },
  ingested_at: ingestedAt,
  chunk_count: 1,
  content_kind: 'prose',
  embedding_source: 'fallback',
});

describe('DocumentStore', () => {
  let dir: string;
  let filePath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lantern-docs-'));
    filePath = path.join(dir, 'index.documents.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('starts empty when the file does not exist', async () => {
    const store = await DocumentStore.load(filePath);
    expect(store.size).toBe(0);
    expect(store.list()).toEqual([]);
  });

  it('persists documents across loads', async () => {
    const store = await DocumentStore.load(filePath);
    await store.put(record('a', '2026-01-02T00:00:00.000Z'));

    const reloaded = await DocumentStore.load(filePath);
    expect(reloaded.get('a')).toEqual(record('a', '2026-01-02T00:00:00.000Z'));
    expect(reloaded.has('b')).toBe(false);
  });

  it('keeps every record when puts overlap', async () => {
    const store = await DocumentStore.load(filePath);
    const big = (id: string): DocumentRecord => ({
      ...record(id, '2026-01-01T00:00:00.000Z'),
      content: `${id} `.repeat(20_000),
    });

    await Promise.all(Array.from({ length: 40 }, (_, i) => store.put(big(`doc${i}`))));

    const warn = vi.fn();
    const reloaded = await DocumentStore.load(filePath, { warn });
    expect(reloaded.size).toBe(40);
    expect(reloaded.get('doc39')?.content).toBe('doc39 '.repeat(20_000));
    expect(warn).not.toHaveBeenCalled();
    expect(fs.readdirSync(dir)).toEqual(['index.documents.json']);
  });

  it('lists documents oldest first', async () => {
    const store = await DocumentStore.load(filePath);
    await store.put(record('late', '2026-03-01T00:00:00.000Z'));
    await store.put(record('early', '2026-01-01T00:00:00.000Z'));

    expect(store.list().map((d) => d.id)).toEqual(['early', 'late']);
  });

  it('replaces a document put twice', async () => {
    const store = await DocumentStore.load(filePath);
    await store.put(record('a', '2026-01-01T00:00:00.000Z'));
    await store.put({ ...record('a', '2026-01-05T00:00:00.000Z'), chunk_count: 4 });

    expect(store.size).toBe(1);
    expect(store.get('a')?.chunk_count).toBe(4);
  });

  it('deletes documents and reports unknown ids', async () => {
    const store = await DocumentStore.load(filePath);
    await store.put(record('a', '2026-01-01T00:00:00.000Z'));

    expect(await store.delete('a')).toBe(true);
    expect(await store.delete('a')).toBe(false);
    expect((await DocumentStore.load(filePath)).size).toBe(0);
  });

  it('starts empty with a warning when the file is corrupt', async () => {
    fs.writeFileSync(filePath, '[{"id": "a"');
    const logger = { warn: vi.fn() };

    const store = await DocumentStore.load(filePath, logger);

    expect(store.size).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith(expect.stringContaining('is corrupt'));
  });
});
