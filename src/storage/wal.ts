/**
 * Write-Ahead Log
 *
 * JSON lines of index mutations since the last snapshot. Each append is
 * written and fsynced before it resolves, so an acknowledged write
 * survives a crash. On startup the log is replayed over the snapshot.
 *
 * A crash mid-append leaves a torn last line; readWal skips it with a
 * warning instead of failing the load.
 */

import { existsSync } from 'node:fs';
import { mkdir, open, readFile, type FileHandle } from 'node:fs/promises';
import * as path from 'node:path';

import { safeJsonParse, silentLogger, type Logger } from '../utils/index.js';
import { WalRecordSchema, type WalRecord } from './schemas.js';

/**
 * Read every valid record from a log file. A missing file is an empty log.
 */
export async function readWal(walPath: string, logger: Logger = silentLogger): Promise<WalRecord[]> {
  if (!existsSync(walPath)) {
    return [];
  }

  const raw = await readFile(walPath, 'utf-8');
  const lines = raw.split('\n');
  // A complete log ends with '\n', leaving one empty trailing element
  const lastIndex = raw.endsWith('\n') ? lines.length - 2 : lines.length - 1;
  const records: WalRecord[] = [];

  lines.forEach((line, index) => {
    if (!line.trim()) return;

    const record = safeJsonParse(line, WalRecordSchema, null);
    if (record) {
      records.push(record);
    } else if (index === lastIndex) {
      logger.warn(`Skipping torn record at the end of ${path.basename(walPath)} (line ${index + 1})`);
    } else {
      logger.warn(`Skipping malformed record in ${path.basename(walPath)} (line ${index + 1})`);
    }
  });

  return records;
}

export class WriteAheadLog {
  private constructor(
    readonly path: string,
    private handle: FileHandle | null,
    private records: number
  ) {}

  /**
   * Open a log for appending.
   *
   * @param existingRecords - Records already in the file (from readWal)
   */
  static async open(walPath: string, existingRecords = 0): Promise<WriteAheadLog> {
    await mkdir(path.dirname(walPath), { recursive: true });
    const handle = await open(walPath, 'a');
    return new WriteAheadLog(walPath, handle, existingRecords);
  }

  /** Records appended since the last reset */
  get size(): number {
    return this.records;
  }

  /**
   * Append records as one write and fsync.
   */
  async append(records: readonly WalRecord[]): Promise<void> {
    if (records.length === 0) return;
    const handle = this.requireHandle();

    const payload = records.map((record) => JSON.stringify(record)).join('\n') + '\n';
    await handle.appendFile(payload, 'utf-8');
    await handle.sync();
    this.records += records.length;
  }

  /**
   * Empty the log after a snapshot made its records redundant.
   */
  async reset(): Promise<void> {
    const handle = this.requireHandle();
    await handle.truncate(0);
    await handle.sync();
    this.records = 0;
  }

  async close(): Promise<void> {
    if (this.handle) {
      const handle = this.handle;
      this.handle = null;
      await handle.close();
    }
  }

  private requireHandle(): FileHandle {
    if (!this.handle) {
      throw new Error(`Write-ahead log ${this.path} is closed`);
    }
    return this.handle;
  }
}
