import { z } from 'zod';
import type { ErrorResponse } from '../../../shared/types';

const gridSchema = z
  .array(z.array(z.number().int()))
  .min(1, 'Grid must have at least one row')
  .superRefine((rows, ctx) => {
    const width = rows[0]?.length ?? 0;
    if (width === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Grid rows must not be empty' });
      return;
    }
    const ragged = rows.findIndex(row => row.length !== width);
    if (ragged >= 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Row ${ragged} has ${rows[ragged].length} values, expected ${width}`,
        path: [ragged],
      });
    }
  });

const gridRequestSchema = z.object({
  grid: gridSchema,
  threshold: z.number().int().optional(),
  invert: z.boolean().optional(),
  despeckleAreaMin: z.number().int().min(0).optional(),
});

export const componentsRequestSchema = gridRequestSchema.extend({
  connectivity: z.union([z.literal(4), z.literal(8)]).optional(),
  strategy: z.enum(['flood', 'two-pass']).optional(),
});

export const contoursRequestSchema = gridRequestSchema.extend({
  retrieval: z.enum(['tree', 'list', 'external']).optional(),
  epsilon: z.number().min(0).optional(),
});

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: ErrorResponse };

/**
 * Validate a parsed JSON body against a schema
 */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, body: unknown): ParseResult<z.infer<T>> {
  const result = schema.safeParse(body);
  if (!result.success) {
    return {
      success: false,
      error: {
        error: 'Validation failed',
        code: 'INVALID_REQUEST',
        details: result.error.flatten(),
      },
    };
  }
  return { success: true, data: result.data };
}
