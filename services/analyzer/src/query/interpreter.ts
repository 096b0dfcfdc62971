import { RULES, type Rule } from './rules';
import type { FilterField, FilterSpec, RuleMatch } from '../types';

export interface Interpretation {
  original: string;
  normalized: string;
  filters: FilterSpec;
  matches: RuleMatch[];
}

export function normalizeQuery(text: string): string {
  return text.toLowerCase().trim().replace(/\s+/g, ' ');
}

function assign<F extends FilterField>(spec: FilterSpec, field: F, value: FilterSpec[F]): void {
  spec[field] = value;
}

function firstMatch(rule: Rule, text: string): RegExpExecArray | null {
  for (const re of rule.patterns) {
    const match = re.exec(text);
    if (match) return match;
  }
  return null;
}

/**
 * Translates free text into a FilterSpec. Unrecognized text yields an empty
 * spec; this never throws on string input.
 */
export function interpretQuery(text: string, rules: readonly Rule[] = RULES): Interpretation {
  const normalized = normalizeQuery(text);
  const filters: FilterSpec = {};
  const matches: RuleMatch[] = [];

  for (const rule of rules) {
    const match = firstMatch(rule, normalized);
    if (!match) continue;
    const value = rule.value(match);
    if (value === undefined) continue;

    const applied = filters[rule.field] === undefined;
    if (applied) assign(filters, rule.field, value);
    matches.push({ rule: rule.name, field: rule.field, value, phrase: match[0], applied });
  }

  return { original: text, normalized, filters, matches };
}
