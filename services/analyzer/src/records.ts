import { z } from 'zod';
import { computeProperties } from './analysis/properties';
import type { StringRecord } from './types';

export const stringRecordSchema: z.ZodType<StringRecord> = z.object({
  id: z.string().min(1),
  value: z.string(),
  properties: z.object({
    length: z.number().int().nonnegative(),
    is_palindrome: z.boolean(),
    unique_characters: z.number().int().nonnegative(),
    word_count: z.number().int().nonnegative(),
    sha256_hash: z.string(),
    character_frequency_map: z.record(z.number().int().positive()),
  }),
  created_at: z.string(),
  updated_at: z.string(),
  version: z.number().int().positive(),
});

/** Shape of the persisted document: content hash to record. */
export const recordDocumentSchema = z.record(stringRecordSchema);

/**
 * Builds the record stored for `value`. When a previous record exists its
 * creation time is kept and the version bumped; `updated_at` is forced past
 * `created_at` so overwrites are always observable.
 */
export function buildRecord(value: string, previous: StringRecord | null, now = Date.now()): StringRecord {
  const properties = computeProperties(value);
  if (!previous) {
    const stamp = new Date(now).toISOString();
    return {
      id: properties.sha256_hash,
      value,
      properties,
      created_at: stamp,
      updated_at: stamp,
      version: 1,
    };
  }

  const createdMs = Date.parse(previous.created_at);
  const updatedMs = now <= createdMs ? createdMs + 1 : now;
  return {
    id: properties.sha256_hash,
    value,
    properties,
    created_at: previous.created_at,
    updated_at: new Date(updatedMs).toISOString(),
    version: previous.version + 1,
  };
}
