/**
 * Zod validation schemas for CLI inputs
 *
 * These schemas validate and transform user input from the command line.
 * Commander.js parses arguments, then we validate with Zod for:
 * - Type coercion (string "5" -> number 5)
 * - key=value metadata pairs
 * - Helpful error messages
 */

import { z } from 'zod';

import { ValidationError } from '../errors/index.js';
import { MAX_RETRIEVE_K } from '../agent/index.js';

// ============================================================================
// SHARED
// ============================================================================

const topK = z
  .string()
  .regex(/^\d+$/, 'k must be a whole number')
  .transform((val) => parseInt(val, 10))
  .refine((val) => val >= 1 && val <= MAX_RETRIEVE_K, {
    message: `k must be between 1 and ${MAX_RETRIEVE_K}`,
  });

// ============================================================================
// INGEST COMMAND SCHEMA
// ============================================================================

export const IngestOptionsSchema = z.object({
  text: z.string().optional(),
  id: z.string().min(1, 'Document id cannot be empty').optional(),
  meta: z
    .array(z.string().regex(/^[^=\s]+=/, 'metadata must look like key=value'))
    .default([])
    .transform((pairs) =>
      Object.fromEntries(
        pairs.map((pair) => {
          const at = pair.indexOf('=');
          return [pair.slice(0, at), pair.slice(at + 1)];
        })
      )
    ),
  kind: z.enum(['prose', 'code']).optional(),
});

export type IngestOptions = z.input<typeof IngestOptionsSchema>;

// ============================================================================
// SEARCH / CONTEXT COMMAND SCHEMAS
// ============================================================================

export const SearchOptionsSchema = z.object({
  k: topK.optional(),
});

export type SearchOptions = z.input<typeof SearchOptionsSchema>;

export const ContextOptionsSchema = z.object({
  query: z.string().min(1, 'Query cannot be empty').optional(),
  k: topK.optional(),
});

export type ContextOptions = z.input<typeof ContextOptionsSchema>;

// ============================================================================
// VALIDATION HELPER
// ============================================================================

/**
 * Validate input with a Zod schema, throwing ValidationError with one
 * issue per failed field.
 *
 * @example
 * ```typescript
 * const { k } = validateInput(SearchOptionsSchema, options, 'search options');
 * ```
 */
export function validateInput<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  what: string
): z.output<T> {
  const result = schema.safeParse(input);

  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `${path}${issue.message}`;
  });

  throw new ValidationError(`Invalid ${what}`, issues);
}
