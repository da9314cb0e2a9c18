/**
 * Zod schemas for everything persisted as JSON: the Segment sidecar,
 * write-ahead log records and the Document Store.
 */

import { z } from 'zod';

export const MetadataValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const SegmentRecordSchema = z.object({
  id: z.string().min(1),
  content: z.string(),
  document_id: z.string().min(1),
  metadata: z.record(MetadataValueSchema),
  created_at: z.string(),
});

export const SidecarSchema = z.array(SegmentRecordSchema);

export const WalAddRecordSchema = z.object({
  op: z.literal('add'),
  /** Snapshot generation the record was written after */
  gen: z.number().int().nonnegative(),
  segment: SegmentRecordSchema,
  vector: z.array(z.number()),
});

export const WalRemoveRecordSchema = z.object({
  op: z.literal('remove'),
  gen: z.number().int().nonnegative(),
  id: z.string().min(1),
});

export const WalRecordSchema = z.discriminatedUnion('op', [WalAddRecordSchema, WalRemoveRecordSchema]);

export type WalRecord = z.infer<typeof WalRecordSchema>;

export const DocumentRecordSchema = z.object({
  id: z.string().min(1),
  content: z.string(),
  length: z.number().int().nonnegative(),
  metadata: z.record(MetadataValueSchema),
  ingested_at: z.string(),
  chunk_count: z.number().int().nonnegative(),
  content_kind: z.enum(['prose', 'code']),
  embedding_source: z.enum(['model', 'fallback']),
});

export type DocumentRecord = z.infer<typeof DocumentRecordSchema>;

export const DocumentFileSchema = z.array(DocumentRecordSchema);
