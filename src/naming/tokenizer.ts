/**
 * Word tokenizer: splits an identifier-like string into lowercase words
 * and records the convention it was written in.
 *
 * @example
 * tokenize('hello-world')  // { words: ['hello', 'world'], convention: 'kebab' }
 * tokenize('HELLO_WORLD')  // { words: ['hello', 'world'], convention: 'screamingSnake' }
 * tokenize('XMLParser')    // { words: ['xml', 'parser'], convention: 'pascal' }
 * tokenize('hello')        // { words: ['hello'], convention: 'unknown' }
 */

import type { CaseConvention, TokenizedName } from './types.js';

const UPPER = /\p{Lu}/u;
const LOWER = /\p{Ll}/u;
const DIGIT = /\p{Nd}/u;

export function isUpper(ch: string | undefined): boolean {
  return ch !== undefined && UPPER.test(ch);
}

export function isLower(ch: string | undefined): boolean {
  return ch !== undefined && LOWER.test(ch);
}

/**
 * True when the string has letters and none of them is lowercase
 */
export function isAllUppercase(str: string): boolean {
  return UPPER.test(str) && !LOWER.test(str);
}

function splitOn(str: string, separator: string): string[] {
  return str
    .split(separator)
    .filter((part) => part.length > 0)
    .map((part) => part.toLowerCase());
}

/**
 * Split a separator-less name at its case boundaries.
 *
 * A word starts at an uppercase letter that follows a lowercase letter or
 * digit, and at the last uppercase letter of a run that is followed by a
 * lowercase one ("XMLParser" -> "XML" | "Parser").
 */
export function splitCaseBoundaries(str: string): string[] {
  const chars = Array.from(str);
  const words: string[] = [];
  let current = '';

  for (let i = 0; i < chars.length; i++) {
    const ch = chars[i] ?? '';
    const prev = chars[i - 1];
    const next = chars[i + 1];

    const startsWord =
      current.length > 0 &&
      isUpper(ch) &&
      (isLower(prev) || (prev !== undefined && DIGIT.test(prev)) || (isUpper(prev) && isLower(next)));

    if (startsWord) {
      words.push(current);
      current = '';
    }
    current += ch;
  }

  if (current.length > 0) {
    words.push(current);
  }

  return words.map((word) => word.toLowerCase());
}

export function tokenize(str: string): TokenizedName {
  let words: string[];
  let convention: CaseConvention;

  if (str.includes('-')) {
    words = splitOn(str, '-');
    convention = 'kebab';
  } else if (str.includes('_')) {
    words = splitOn(str, '_');
    convention = isAllUppercase(str) ? 'screamingSnake' : 'snake';
  } else {
    words = splitCaseBoundaries(str);
    convention = isUpper(Array.from(str)[0]) ? 'pascal' : 'camel';
  }

  // Nothing to tell conventions apart by
  if (words.length < 2) {
    convention = 'unknown';
  }

  return Object.freeze({
    source: str,
    words: Object.freeze(words),
    convention,
  });
}
