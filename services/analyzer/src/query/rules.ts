import { COUNT_TOKEN, TENS_WORDS, parseCount } from './numbers';
import type { FilterField, FilterSpec } from '../types';

interface RuleFor<F extends FilterField> {
  name: string;
  field: F;
  /** Tried in order; the first one that matches decides the value. */
  patterns: RegExp[];
  /** `undefined` means the phrase matched but carried no usable value. */
  value(match: RegExpExecArray): FilterSpec[F];
}

export type Rule = RuleFor<FilterField>;

/** Checks the value type against the field before widening into the table. */
function defineRule<F extends FilterField>(rule: RuleFor<F>): Rule {
  return rule;
}

const UNIT = '(?:characters?|chars?|letters?)';

const count = (match: RegExpExecArray) => parseCount(match[1]);

function pattern(source: string): RegExp {
  return new RegExp(`\\b${source}\\b`);
}

/**
 * Recognizers over normalized query text, in priority order. Each one scans
 * the whole text; when two set the same field the earlier entry wins.
 */
export const RULES: readonly Rule[] = [
  defineRule({
    name: 'not-palindrome',
    field: 'is_palindrome',
    patterns: [pattern('(?:not|non)[ -]?(?:an? )?palindrom(?:e|es|ic)')],
    value: () => false,
  }),
  defineRule({
    name: 'palindrome',
    field: 'is_palindrome',
    patterns: [pattern('palindrom(?:e|es|ic)')],
    value: () => true,
  }),
  defineRule({
    name: 'single-word',
    field: 'word_count',
    patterns: [pattern('(?:single|one)[ -]word')],
    value: () => 1,
  }),
  defineRule({
    name: 'word-count',
    field: 'word_count',
    // "more than 2 words" is a bound, not an exact count; "one" in "twenty one" is not a count of its own
    patterns: [pattern(`(?<!(?:than|least|most|${TENS_WORDS.join('|')})[ -])${COUNT_TOKEN} words?`)],
    value: count,
  }),
  defineRule({
    name: 'longer-than',
    field: 'min_length',
    patterns: [pattern(`longer than ${COUNT_TOKEN}`), pattern(`more than ${COUNT_TOKEN} ${UNIT}`)],
    value: (match) => {
      const n = count(match);
      return n === undefined ? undefined : n + 1;
    },
  }),
  defineRule({
    name: 'at-least',
    field: 'min_length',
    patterns: [pattern(`at least ${COUNT_TOKEN} ${UNIT}`)],
    value: count,
  }),
  defineRule({
    name: 'shorter-than',
    field: 'max_length',
    patterns: [pattern(`shorter than ${COUNT_TOKEN}`), pattern(`(?:less|fewer) than ${COUNT_TOKEN} ${UNIT}`)],
    value: (match) => {
      const n = count(match);
      return n === undefined ? undefined : n - 1;
    },
  }),
  defineRule({
    name: 'at-most',
    field: 'max_length',
    patterns: [pattern(`at most ${COUNT_TOKEN} ${UNIT}`)],
    value: count,
  }),
  defineRule({
    name: 'first-vowel',
    field: 'contains_character',
    patterns: [pattern('the first vowel')],
    value: () => 'a',
  }),
  defineRule({
    name: 'contains',
    field: 'contains_character',
    // an article is only skipped when something follows it, so "contains a" still means 'a'
    patterns: [pattern('contain(?:s|ing)?(?: (?:the|an?))?(?: (?:letter|character|char|digit|number))? ([a-z0-9])')],
    value: (match) => match[1],
  }),
];
