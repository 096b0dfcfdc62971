const NUMBER_WORDS: Record<string, number> = {
  zero: 0,
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
  eleven: 11,
  twelve: 12,
  thirteen: 13,
  fourteen: 14,
  fifteen: 15,
  sixteen: 16,
  seventeen: 17,
  eighteen: 18,
  nineteen: 19,
  twenty: 20,
};

const UNIT_WORDS = ['one', 'two', 'three', 'four', 'five', 'six', 'seven', 'eight', 'nine'];

/** Tens words that combine with a unit word: "twenty one", "twenty-one". */
export const TENS_WORDS = ['twenty'];

/**
 * Regex source for a count token: a digit literal, a compound like
 * "twenty-one", or a single number word. Longest words first.
 */
export const COUNT_TOKEN = `(\\d+|(?:${TENS_WORDS.join('|')})[ -](?:${UNIT_WORDS.join('|')})|${Object.keys(NUMBER_WORDS)
  .sort((a, b) => b.length - a.length)
  .join('|')})`;

export function parseCount(token: string | undefined): number | undefined {
  if (token === undefined) return undefined;
  if (/^\d+$/.test(token)) {
    const n = Number(token);
    return Number.isSafeInteger(n) ? n : undefined;
  }
  const [tens, unit, ...rest] = token.split(/[ -]/);
  if (unit === undefined) return NUMBER_WORDS[tens];
  if (rest.length > 0 || !TENS_WORDS.includes(tens) || !UNIT_WORDS.includes(unit)) return undefined;
  return NUMBER_WORDS[tens] + NUMBER_WORDS[unit];
}
