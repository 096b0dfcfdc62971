import type { FilterSpec, StringRecord } from '../types';

export function matchesFilters(record: StringRecord, spec: FilterSpec): boolean {
  const { properties } = record;
  if (spec.is_palindrome !== undefined && properties.is_palindrome !== spec.is_palindrome) return false;
  if (spec.min_length !== undefined && properties.length < spec.min_length) return false;
  if (spec.max_length !== undefined && properties.length > spec.max_length) return false;
  if (spec.word_count !== undefined && properties.word_count !== spec.word_count) return false;
  if (spec.contains_character !== undefined && !record.value.includes(spec.contains_character)) return false;
  return true;
}

/** Keeps the records satisfying every present predicate, in input order. */
export function applyFilters(spec: FilterSpec, records: readonly StringRecord[]): StringRecord[] {
  return records.filter((record) => matchesFilters(record, spec));
}

/** Drops absent fields so the spec serializes to exactly what was applied. */
export function compactFilters(spec: FilterSpec): FilterSpec {
  const out: FilterSpec = {};
  if (spec.is_palindrome !== undefined) out.is_palindrome = spec.is_palindrome;
  if (spec.min_length !== undefined) out.min_length = spec.min_length;
  if (spec.max_length !== undefined) out.max_length = spec.max_length;
  if (spec.word_count !== undefined) out.word_count = spec.word_count;
  if (spec.contains_character !== undefined) out.contains_character = spec.contains_character;
  return out;
}
