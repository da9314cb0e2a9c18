/**
 * Document Store
 *
 * Full text and ingestion metadata of every Document, kept in memory and
 * persisted as one JSON file beside the vector index. Each change rewrites
 * the file atomically; saves run one at a time and always write the
 * latest in-memory state.
 *
 * A corrupt file is logged and the store starts empty; the index remains
 * the source of truth for Segments.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';

import { Mutex, safeJsonParse, silentLogger, type Logger } from '../utils/index.js';
import { writeFileAtomic } from './atomic.js';
import { DocumentFileSchema, type DocumentRecord } from './schemas.js';

export class DocumentStore {
  private readonly documents = new Map<string, DocumentRecord>();
  private readonly writeLock = new Mutex();

  private constructor(readonly path: string) {}

  /**
   * Load the store from disk (missing file = empty store).
   */
  static async load(filePath: string, logger: Logger = silentLogger): Promise<DocumentStore> {
    const store = new DocumentStore(filePath);
    if (!existsSync(filePath)) {
      return store;
    }

    let raw: string;
    try {
      raw = await readFile(filePath, 'utf-8');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`Could not read document store ${filePath}: ${message}; starting empty`);
      return store;
    }

    const records = safeJsonParse(raw, DocumentFileSchema, null, (error) => {
      logger.warn(`Document store ${filePath} is corrupt (${error.message}); starting empty`);
    });
    for (const record of records ?? []) {
      store.documents.set(record.id, record);
    }
    return store;
  }

  get size(): number {
    return this.documents.size;
  }

  get(id: string): DocumentRecord | undefined {
    return this.documents.get(id);
  }

  has(id: string): boolean {
    return this.documents.has(id);
  }

  /**
   * All documents, oldest ingestion first.
   */
  list(): DocumentRecord[] {
    return [...this.documents.values()].sort((a, b) => a.ingested_at.localeCompare(b.ingested_at));
  }

  /**
   * Insert or replace a document and persist.
   */
  async put(record: DocumentRecord): Promise<void> {
    this.documents.set(record.id, record);
    await this.save();
  }

  /**
   * Delete a document and persist. Returns false when it did not exist.
   */
  async delete(id: string): Promise<boolean> {
    if (!this.documents.delete(id)) {
      return false;
    }
    await this.save();
    return true;
  }

  async save(): Promise<void> {
    await this.writeLock.runExclusive(() =>
      writeFileAtomic(this.path, JSON.stringify([...this.documents.values()], null, 2))
    );
  }
}
