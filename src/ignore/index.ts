/**
 * Gitignore-style path exclusion
 *
 * @example
 * import { compile } from './ignore/index.js';
 *
 * const matcher = compile(['*.log', '!keep.log']);
 * matcher.isExcluded('app.log', false);   // true
 * matcher.isExcluded('keep.log', false);  // false
 */

import { resolve } from 'node:path';
import { type IgnoreLocator, locateIgnoreFiles } from './locator.js';
import { type IgnoreSource, IgnoreStack } from './matcher.js';

export {
  IGNORE_FILE_NAME,
  type IgnoreLocator,
  locateIgnoreFiles,
  readDirectoryIgnoreFile,
  readIgnoreFile,
} from './locator.js';
export {
  compile,
  type IgnoreSource,
  IgnoreMatcher,
  IgnoreStack,
  type MatchOutcome,
  normalizeRelativePath,
} from './matcher.js';
export { type IgnoreRule, parseIgnorePattern } from './pattern.js';

export interface IgnoreStackOptions {
  /** `--include-git-ignore`: exclude nothing */
  includeIgnored?: boolean;
  /** Extra patterns, evaluated below every discovered ignore file */
  extraPatterns?: readonly string[];
  /** Anchor for `extraPatterns` (default: process.cwd()) */
  cwd?: string;
  locate?: IgnoreLocator;
}

/**
 * Build the ignore stack for one walk root
 */
export async function buildIgnoreStack(
  root: string,
  options: IgnoreStackOptions = {},
): Promise<IgnoreStack> {
  if (options.includeIgnored) {
    return IgnoreStack.disabled();
  }

  const sources: IgnoreSource[] = [];
  if (options.extraPatterns && options.extraPatterns.length > 0) {
    sources.push({
      patterns: options.extraPatterns,
      anchorDir: resolve(options.cwd ?? process.cwd()),
      origin: 'config',
    });
  }

  const locate = options.locate ?? locateIgnoreFiles;
  sources.push(...(await locate(root)));

  return IgnoreStack.fromSources(sources);
}
