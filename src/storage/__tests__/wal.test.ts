/**
 * Tests for the write-ahead log
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import type { WalRecord } from '../schemas.js';
import { WriteAheadLog, readWal } from '../wal.js';

const addRecord = (id: string): WalRecord => ({
  op: 'add',
  gen: 0,
  segment: {
    id,
    document_id: 'doc',
    content: 'hello',
    metadata: { chunk_index: 0 },
    created_at: '2026-01-01T00:00:00.000Z',
  },
  vector: [0.5, -0.25],
});

describe('write-ahead log', () => {
  let dir: string;
  let walPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lantern-wal-'));
    walPath = path.join(dir, 'index.wal');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads a missing file as an empty log', async () => {
    expect(await readWal(walPath)).toEqual([]);
  });

  it('appends records as JSON lines', async () => {
    const wal = await WriteAheadLog.open(walPath);
    await wal.append([addRecord('a'), { op: 'remove', gen: 0, id: 'a' }]);
    await wal.close();

    const lines = fs.readFileSync(walPath, 'utf-8').split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[1]).toBe('{"op":"remove","gen":0,"id":"a"}');
    expect(lines[2]).toBe('');
    expect(wal.size).toBe(2);
  });

  it('reads back what was appended', async () => {
    const wal = await WriteAheadLog.open(walPath);
    await wal.append([addRecord('a')]);
    await wal.append([{ op: 'remove', gen: 0, id: 'a' }]);
    await wal.close();

    expect(await readWal(walPath)).toEqual([addRecord('a'), { op: 'remove', gen: 0, id: 'a' }]);
  });

  it('counts existing records passed to open', async () => {
    const wal = await WriteAheadLog.open(walPath, 5);
    await wal.append([addRecord('a')]);
    expect(wal.size).toBe(6);
    await wal.close();
  });

  it('empties the file on reset and keeps appending', async () => {
    const wal = await WriteAheadLog.open(walPath);
    await wal.append([addRecord('a')]);
    await wal.reset();
    expect(wal.size).toBe(0);
    expect(fs.readFileSync(walPath, 'utf-8')).toBe('');

    await wal.append([{ op: 'remove', gen: 1, id: 'b' }]);
    await wal.close();
    expect(fs.readFileSync(walPath, 'utf-8')).toBe('{"op":"remove","gen":1,"id":"b"}\n');
  });

  it('rejects appends after close', async () => {
    const wal = await WriteAheadLog.open(walPath);
    await wal.close();
    await expect(wal.append([addRecord('a')])).rejects.toThrow('is closed');
  });

  it('warns about a torn last line and keeps earlier records', async () => {
    fs.writeFileSync(walPath, JSON.stringify(addRecord('a')) + '\n{"op":"remove","ge');
    const logger = { warn: vi.fn() };

    const records = await readWal(walPath, logger);

    expect(records).toEqual([addRecord('a')]);
    expect(logger.warn).toHaveBeenCalledWith('Skipping torn record at the end of index.wal (line 2)');
  });

  it('warns about a malformed record in the middle', async () => {
    fs.writeFileSync(walPath, '{"op":"unknown"}\n' + JSON.stringify(addRecord('a')) + '\n');
    const logger = { warn: vi.fn() };

    const records = await readWal(walPath, logger);

    expect(records).toEqual([addRecord('a')]);
    expect(logger.warn).toHaveBeenCalledWith('Skipping malformed record in index.wal (line 1)');
  });
});
