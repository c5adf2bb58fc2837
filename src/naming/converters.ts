/**
 * Case styler: renders a word sequence in a given convention.
 *
 * The `toXxxCase` helpers tokenize first, so they accept input in any
 * convention.
 */

import { tokenize } from './tokenizer.js';
import type { CaseConvention } from './types.js';

function capitalize(word: string): string {
  const [first = '', ...rest] = Array.from(word);
  return first.toUpperCase() + rest.join('').toLowerCase();
}

/**
 * Render words in a convention
 *
 * @example
 * render(['hello', 'world'], 'pascal')          // 'HelloWorld'
 * render(['hello', 'world'], 'camel')           // 'helloWorld'
 * render(['hello', 'world'], 'kebab')           // 'hello-world'
 * render(['hello', 'world'], 'snake')           // 'hello_world'
 * render(['hello', 'world'], 'screamingSnake')  // 'HELLO_WORLD'
 * render(['hello', 'world'], 'unknown')         // 'helloworld'
 */
export function render(words: readonly string[], convention: CaseConvention): string {
  const lower = words.map((word) => word.toLowerCase());

  switch (convention) {
    case 'pascal':
      return lower.map(capitalize).join('');
    case 'camel':
      return lower.map((word, i) => (i === 0 ? word : capitalize(word))).join('');
    case 'kebab':
      return lower.join('-');
    case 'snake':
      return lower.join('_');
    case 'screamingSnake':
      return lower.join('_').toUpperCase();
    case 'unknown':
      return lower.join('');
  }
}

/**
 * Re-case a name into another convention
 *
 * @example
 * convertCase('hello-world', 'pascal')  // 'HelloWorld'
 * convertCase('HELLO_WORLD', 'camel')   // 'helloWorld'
 */
export function convertCase(str: string, convention: CaseConvention): string {
  if (!str) return str;
  return render(tokenize(str).words, convention);
}

export function toPascalCase(str: string): string {
  return convertCase(str, 'pascal');
}

export function toCamelCase(str: string): string {
  return convertCase(str, 'camel');
}

export function toKebabCase(str: string): string {
  return convertCase(str, 'kebab');
}

export function toSnakeCase(str: string): string {
  return convertCase(str, 'snake');
}

export function toScreamingSnakeCase(str: string): string {
  return convertCase(str, 'screamingSnake');
}
