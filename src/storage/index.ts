/**
 * Storage Module
 *
 * Durable building blocks shared by the vector index and the engine.
 */

export { companionPaths } from './paths.js';
export type { CompanionPaths } from './paths.js';
export { writeFileAtomic } from './atomic.js';
export { WriteAheadLog, readWal } from './wal.js';
export { DocumentStore } from './document-store.js';
export {
  SegmentRecordSchema,
  SidecarSchema,
  WalRecordSchema,
  DocumentRecordSchema,
  DocumentFileSchema,
} from './schemas.js';
export type { WalRecord, DocumentRecord } from './schemas.js';
