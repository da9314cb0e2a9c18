/**
 * JSON Utilities
 *
 * Schema-checked JSON parsing with fallback for corrupted data.
 */

import type { z } from 'zod';

/**
 * Parse a JSON string and validate it against a zod schema, returning
 * `fallback` when the text is missing, malformed, or the wrong shape.
 *
 * Used for files that may be torn by a crash (WAL lines, sidecars)
 * where one bad record must not take the rest down with it.
 *
 * @example
 * ```typescript
 * const record = safeJsonParse(line, WalRecordSchema, null, (err) => {
 *   logger.warn(`Skipping WAL record: ${err.message}`);
 * });
 * ```
 */
export function safeJsonParse<S extends z.ZodTypeAny, F>(
  json: string | null | undefined,
  schema: S,
  fallback: F,
  onError?: (error: Error, rawValue: string) => void
): z.output<S> | F {
  if (json === null || json === undefined) {
    return fallback;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    if (onError && error instanceof Error) {
      onError(error, json);
    }
    return fallback;
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    onError?.(new Error(`Unexpected JSON shape${where}: ${issue?.message ?? 'invalid'}`), json);
    return fallback;
  }

  return result.data;
}
