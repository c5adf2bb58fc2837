/**
 * Name rewriting for copied and scanned entries.
 */

import { validateFileName } from '../naming/index.js';
import type { ReplacementRuleSet } from '../replace/index.js';

export interface RenameOptions {
  /** Rewrite names at all (`-i`) */
  readonly enabled: boolean;
  /** Rewrite file names (default: true) */
  readonly renameFiles?: boolean;
  /** Rewrite directory names (default: true) */
  readonly renameDirectories?: boolean;
}

export type RenameResult =
  | { readonly ok: true; readonly name: string }
  | { readonly ok: false; readonly name: string; readonly errors: readonly string[] };

/**
 * New name for one path component
 */
export function rewriteName(
  name: string,
  isDirectory: boolean,
  rules: ReplacementRuleSet,
  options: RenameOptions,
): RenameResult {
  const applies = isDirectory
    ? (options.renameDirectories ?? true)
    : (options.renameFiles ?? true);

  if (!options.enabled || !applies) {
    return { ok: true, name };
  }

  const rewritten = rules.applyToName(name);
  const validation = validateFileName(rewritten);
  if (!validation.valid) {
    return { ok: false, name: rewritten, errors: validation.errors };
  }

  return { ok: true, name: rewritten };
}
