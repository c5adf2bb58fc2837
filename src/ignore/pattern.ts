/**
 * Compiles one gitignore-syntax line into a matching rule.
 *
 * Supported syntax:
 * - `#` comments and blank lines (skipped), `\#` / `\!` escapes
 * - `!` negation, trailing `/` for directories only, leading `/` anchor
 * - `*`, `?`, `[...]` (with `!`/`^` negation), `**` across directories
 */

import { InvalidIgnorePatternError } from '../errors.js';

export interface IgnoreRule {
  /** Line as written in the ignore file */
  readonly source: string;
  /** `!pattern`: re-include on match */
  readonly negate: boolean;
  /** `pattern/`: only directories match */
  readonly directoryOnly: boolean;
  /** Pattern contains a `/`: matched from the anchor dir, not at any depth */
  readonly anchored: boolean;
  readonly regex: RegExp;
}

function escapeRegExp(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

function trimTrailingSpaces(line: string): string {
  let end = line.length;
  while (end > 0 && line[end - 1] === ' ' && line[end - 2] !== '\\') {
    end--;
  }
  return line.slice(0, end);
}

/**
 * Translate a `[...]` class starting at `start`. Returns the regex source and
 * the index just past the closing bracket.
 */
function translateClass(pattern: string, body: string, start: number): [string, number] {
  let i = start + 1;
  let negated = false;
  if (body[i] === '!' || body[i] === '^') {
    negated = true;
    i++;
  }

  const contentStart = i;
  // A `]` right after the opening bracket is literal
  if (body[i] === ']') i++;
  while (i < body.length && body[i] !== ']') i++;

  if (i >= body.length) {
    throw new InvalidIgnorePatternError(pattern, 'unterminated character class');
  }

  const content = Array.from(body.slice(contentStart, i))
    .map((ch) => (ch === '\\' || ch === ']' || ch === '[' || ch === '^' ? `\\${ch}` : ch))
    .join('');

  return [negated ? `[^/${content}]` : `[${content}]`, i + 1];
}

function globToRegExpSource(pattern: string, body: string): string {
  let out = '';
  let i = 0;

  while (i < body.length) {
    const ch = body[i] ?? '';

    if (ch === '*' && body[i + 1] === '*') {
      const atStart = i === 0;
      const afterSlash = body[i - 1] === '/';
      const next = body[i + 2];

      if (atStart && next === '/') {
        // "**/foo": in all directories
        out += '(?:.*/)?';
        i += 3;
        continue;
      }
      if ((atStart || afterSlash) && next === undefined) {
        // "foo/**" or a bare "**": everything inside
        out += '.*';
        i += 2;
        continue;
      }
      if (afterSlash && next === '/') {
        // "a/**/b": zero or more directories
        out += '(?:.*/)?';
        i += 3;
        continue;
      }
      // Any other run of stars is an ordinary star
      while (body[i] === '*') i++;
      out += '[^/]*';
      continue;
    }

    if (ch === '*') {
      out += '[^/]*';
      i++;
      continue;
    }

    if (ch === '?') {
      out += '[^/]';
      i++;
      continue;
    }

    if (ch === '[') {
      const [cls, nextIndex] = translateClass(pattern, body, i);
      out += cls;
      i = nextIndex;
      continue;
    }

    if (ch === '\\') {
      const escaped = body[i + 1];
      if (escaped === undefined) {
        throw new InvalidIgnorePatternError(pattern, 'trailing backslash');
      }
      out += escapeRegExp(escaped);
      i += 2;
      continue;
    }

    out += escapeRegExp(ch);
    i++;
  }

  return out;
}

/**
 * Parse one ignore-file line.
 *
 * @returns the compiled rule, or null for blank lines and comments
 * @throws InvalidIgnorePatternError for malformed globs
 */
export function parseIgnorePattern(line: string): IgnoreRule | null {
  const source = line.replace(/\r$/, '');
  let body = trimTrailingSpaces(source);

  if (body.length === 0 || body.startsWith('#')) {
    return null;
  }

  let negate = false;
  if (body.startsWith('!')) {
    negate = true;
    body = body.slice(1);
  } else if (body.startsWith('\\!') || body.startsWith('\\#')) {
    body = body.slice(1);
  }

  let directoryOnly = false;
  if (body.endsWith('/') && !body.endsWith('\\/')) {
    directoryOnly = true;
    body = body.replace(/\/+$/, '');
  }

  const anchored = body.includes('/');
  body = body.replace(/^\/+/, '');

  if (body.length === 0) {
    return null;
  }

  const prefix = anchored ? '' : '(?:.*/)?';
  const regex = new RegExp(`^${prefix}${globToRegExpSource(source, body)}$`);

  return Object.freeze({ source, negate, directoryOnly, anchored, regex });
}
