import { describe, expect, it } from 'vitest';
import { ValidationError } from '../src/errors';
import { applyFilters, compactFilters, matchesFilters } from '../src/filters/evaluate';
import { parseFilterQuery } from '../src/filters/params';
import { buildRecord } from '../src/records';

const NOW = Date.parse('2024-05-01T12:00:00.000Z');
const records = ['racecar', 'hello world', 'noon', 'zebra crossing', 'Madam'].map((v) => buildRecord(v, null, NOW));
const values = (list: { value: string }[]) => list.map((r) => r.value);

describe('applyFilters', () => {
  it('is the identity for an empty spec', () => {
    expect(applyFilters({}, records)).toEqual(records);
  });

  it('keeps input order', () => {
    expect(values(applyFilters({ is_palindrome: true }, records))).toEqual(['racecar', 'noon', 'Madam']);
  });

  it('treats length bounds as inclusive', () => {
    expect(values(applyFilters({ min_length: 11 }, records))).toEqual(['hello world', 'zebra crossing']);
    expect(values(applyFilters({ max_length: 5 }, records))).toEqual(['noon', 'Madam']);
    expect(values(applyFilters({ min_length: 5, max_length: 7 }, records))).toEqual(['racecar', 'Madam']);
  });

  it('matches word_count exactly', () => {
    expect(values(applyFilters({ word_count: 2 }, records))).toEqual(['hello world', 'zebra crossing']);
  });

  it('checks contains_character case-sensitively', () => {
    expect(values(applyFilters({ contains_character: 'M' }, records))).toEqual(['Madam']);
    expect(values(applyFilters({ contains_character: 'z' }, records))).toEqual(['zebra crossing']);
  });

  it('combines predicates with AND', () => {
    expect(values(applyFilters({ is_palindrome: true, word_count: 1, min_length: 6 }, records))).toEqual(['racecar']);
    expect(applyFilters({ is_palindrome: false, contains_character: 'q' }, records)).toEqual([]);
  });

  it('matchesFilters rejects on a single failing predicate', () => {
    const [racecar] = records;
    expect(matchesFilters(racecar, { is_palindrome: true })).toBe(true);
    expect(matchesFilters(racecar, { is_palindrome: true, max_length: 6 })).toBe(false);
  });
});

describe('compactFilters', () => {
  it('drops absent fields', () => {
    expect(compactFilters({ min_length: 3, max_length: undefined, is_palindrome: false })).toEqual({
      min_length: 3,
      is_palindrome: false,
    });
    expect(Object.keys(compactFilters({ word_count: undefined }))).toEqual([]);
  });
});

describe('parseFilterQuery', () => {
  it('coerces query-string values', () => {
    expect(
      parseFilterQuery({
        is_palindrome: 'true',
        min_length: '3',
        max_length: '10',
        word_count: '1',
        contains_character: 'a',
      }),
    ).toEqual({ is_palindrome: true, min_length: 3, max_length: 10, word_count: 1, contains_character: 'a' });
    expect(parseFilterQuery({ is_palindrome: 'false' })).toEqual({ is_palindrome: false });
  });

  it('accepts an empty query', () => {
    expect(parseFilterQuery({})).toEqual({});
    expect(parseFilterQuery(undefined)).toEqual({});
  });

  it('accepts a single multi-byte character', () => {
    expect(parseFilterQuery({ contains_character: '😀' })).toEqual({ contains_character: '😀' });
  });

  it.each([
    [{ min_length: 'abc' }],
    [{ max_length: '-1' }],
    [{ word_count: '1.5' }],
    [{ is_palindrome: 'yes' }],
    [{ contains_character: 'ab' }],
    [{ contains_character: '' }],
    [{ sort: 'asc' }],
  ])('rejects %o', (query) => {
    expect(() => parseFilterQuery(query)).toThrow(ValidationError);
  });
});
