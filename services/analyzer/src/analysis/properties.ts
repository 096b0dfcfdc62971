import crypto from 'crypto';
import type { StringProperties } from '../types';

// Characters are Unicode code points throughout: spreading a string iterates
// code points, so surrogate pairs count once.

export function contentHash(value: string): string {
  return crypto.createHash('sha256').update(value, 'utf8').digest('hex');
}

export function isPalindrome(value: string): boolean {
  const chars = [...value.toLowerCase()];
  for (let i = 0, j = chars.length - 1; i < j; i += 1, j -= 1) {
    if (chars[i] !== chars[j]) return false;
  }
  return true;
}

export function countWords(value: string): number {
  return value.split(/\s+/).filter((word) => word.length > 0).length;
}

/**
 * Counts per character. Keys follow first-seen order, except that
 * integer-like keys (the digits) enumerate first, as on any plain object.
 */
export function characterFrequency(value: string): Record<string, number> {
  const freq: Record<string, number> = {};
  for (const char of value) {
    freq[char] = (freq[char] ?? 0) + 1;
  }
  return freq;
}

export function computeProperties(value: string): StringProperties {
  const chars = [...value];
  return {
    length: chars.length,
    is_palindrome: isPalindrome(value),
    unique_characters: new Set(chars).size, // case-sensitive
    word_count: countWords(value),
    sha256_hash: contentHash(value),
    character_frequency_map: characterFrequency(value),
  };
}
