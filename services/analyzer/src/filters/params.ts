import { z } from 'zod';
import { ValidationError } from '../errors';
import type { FilterSpec } from '../types';

const countParam = z
  .string()
  .regex(/^\d+$/, 'must be a non-negative integer')
  .transform((v) => Number(v));

export const filterQuerySchema = z
  .object({
    is_palindrome: z
      .enum(['true', 'false'])
      .transform((v) => v === 'true')
      .optional(),
    min_length: countParam.optional(),
    max_length: countParam.optional(),
    word_count: countParam.optional(),
    contains_character: z
      .string()
      .refine((v) => [...v].length === 1, 'must be a single character')
      .optional(),
  })
  .strict();

/** Parses `GET /strings` query parameters; unknown or malformed ones are rejected. */
export function parseFilterQuery(query: unknown): FilterSpec {
  const parsed = filterQuerySchema.safeParse(query ?? {});
  if (!parsed.success) {
    throw new ValidationError('Invalid query parameters', { issues: parsed.error.flatten() });
  }
  return parsed.data;
}
