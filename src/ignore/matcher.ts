/**
 * Ignore matchers.
 *
 * `IgnoreMatcher` answers for paths relative to a single ignore root.
 * `IgnoreStack` layers matchers from several ignore files, each anchored at
 * its own directory, and answers for absolute paths; later layers win.
 */

import { isAbsolute, relative, resolve, sep } from 'node:path';
import { type IgnoreRule, parseIgnorePattern } from './pattern.js';

export type MatchOutcome = 'excluded' | 'included' | undefined;

/**
 * Patterns read from one ignore file, anchored at the file's directory
 */
export interface IgnoreSource {
  readonly patterns: readonly string[];
  readonly anchorDir: string;
  /** Where the patterns came from, for diagnostics */
  readonly origin?: string;
}

/**
 * Normalize a relative path to forward slashes without leading "./" or "/"
 */
export function normalizeRelativePath(relativePath: string): string {
  return relativePath
    .replace(/\\/g, '/')
    .replace(/^(?:\.\/)+/, '')
    .replace(/^\/+/, '')
    .replace(/\/+$/, '');
}

/**
 * True when a `path.relative` result leaves its base directory
 */
function isOutside(rel: string): boolean {
  return rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel);
}

export class IgnoreMatcher {
  readonly rules: readonly IgnoreRule[];

  constructor(rules: readonly IgnoreRule[]) {
    this.rules = Object.freeze([...rules]);
  }

  /**
   * @throws InvalidIgnorePatternError for a malformed pattern
   */
  static compile(patterns: readonly string[]): IgnoreMatcher {
    const rules: IgnoreRule[] = [];
    for (const line of patterns) {
      const rule = parseIgnorePattern(line);
      if (rule) rules.push(rule);
    }
    return new IgnoreMatcher(rules);
  }

  /**
   * Outcome of the last rule matching this exact path (ancestors not considered)
   */
  match(relativePath: string, isDirectory: boolean): MatchOutcome {
    const path = normalizeRelativePath(relativePath);
    if (path.length === 0) return undefined;

    for (let i = this.rules.length - 1; i >= 0; i--) {
      const rule = this.rules[i];
      if (!rule) continue;
      if (rule.directoryOnly && !isDirectory) continue;
      if (rule.regex.test(path)) {
        return rule.negate ? 'included' : 'excluded';
      }
    }

    return undefined;
  }

  /**
   * A path is excluded when its last matching rule excludes it, or when any
   * directory above it is excluded.
   */
  isExcluded(relativePath: string, isDirectory: boolean): boolean {
    const parts = normalizeRelativePath(relativePath).split('/');

    for (let depth = 1; depth < parts.length; depth++) {
      if (this.match(parts.slice(0, depth).join('/'), true) === 'excluded') {
        return true;
      }
    }

    return this.match(parts.join('/'), isDirectory) === 'excluded';
  }
}

/**
 * Compile gitignore patterns into a matcher
 */
export function compile(patterns: readonly string[]): IgnoreMatcher {
  return IgnoreMatcher.compile(patterns);
}

interface IgnoreLayer {
  readonly anchorDir: string;
  readonly matcher: IgnoreMatcher;
  readonly origin?: string;
}

export class IgnoreStack {
  private readonly layers: readonly IgnoreLayer[];
  readonly enabled: boolean;

  private constructor(layers: readonly IgnoreLayer[], enabled: boolean) {
    this.layers = Object.freeze([...layers]);
    this.enabled = enabled;
  }

  /**
   * Matcher that never excludes anything (`--include-git-ignore`)
   */
  static disabled(): IgnoreStack {
    return new IgnoreStack([], false);
  }

  static fromSources(sources: readonly IgnoreSource[]): IgnoreStack {
    return new IgnoreStack([], true).pushAll(sources);
  }

  get size(): number {
    return this.layers.length;
  }

  get origins(): string[] {
    return this.layers.map((layer) => layer.origin ?? layer.anchorDir);
  }

  /**
   * New stack with one more layer on top; a disabled stack stays empty
   */
  push(source: IgnoreSource): IgnoreStack {
    return this.pushAll([source]);
  }

  pushAll(sources: readonly IgnoreSource[]): IgnoreStack {
    if (!this.enabled || sources.length === 0) return this;

    const added = sources.map((source) => ({
      anchorDir: resolve(source.anchorDir),
      matcher: IgnoreMatcher.compile(source.patterns),
      origin: source.origin,
    }));
    return new IgnoreStack([...this.layers, ...added], true);
  }

  /**
   * Outcome for one absolute path, ancestors not considered
   */
  match(absolutePath: string, isDirectory: boolean): MatchOutcome {
    let outcome: MatchOutcome;

    for (const layer of this.layers) {
      const rel = relative(layer.anchorDir, absolutePath);
      if (rel === '' || isOutside(rel)) continue;

      outcome = layer.matcher.match(rel.split(sep).join('/'), isDirectory) ?? outcome;
    }

    return outcome;
  }

  /**
   * Whether an absolute path is excluded.
   *
   * @param within - when given, directories strictly between `within` and the
   *   path are checked too; `within` itself never is (a source root named on
   *   the command line is always walked)
   */
  isExcluded(absolutePath: string, isDirectory: boolean, within?: string): boolean {
    if (!this.enabled || this.layers.length === 0) return false;

    const target = resolve(absolutePath);
    if (this.match(target, isDirectory) === 'excluded') return true;
    if (within === undefined) return false;

    const stop = resolve(within);
    const rel = relative(stop, target);
    if (rel === '' || isOutside(rel)) return false;

    const parts = rel.split(sep);
    for (let depth = 1; depth < parts.length; depth++) {
      if (this.match(resolve(stop, ...parts.slice(0, depth)), true) === 'excluded') {
        return true;
      }
    }

    return false;
  }
}
