import { UsageError } from '../errors.js';

/**
 * - copy: `-c SOURCE... TARGET`
 * - inPlace: `-i` without `-c`; rewrite and rename where files are
 * - files: print rewritten files to stdout
 * - stdin: rewrite stdin to stdout
 */
export type Mode = 'copy' | 'inPlace' | 'files' | 'stdin';

export interface ModeInput {
  copy?: readonly string[];
  files: readonly string[];
  inPlace: boolean;
  stdinPiped: boolean;
  ruleCount: number;
}

/**
 * Pick the execution mode and check it has what it needs
 *
 * @throws UsageError when no mode applies or rules are missing
 */
export function resolveMode(input: ModeInput): Mode {
  let mode: Mode | undefined;

  if (input.copy !== undefined) {
    if (input.copy.length < 2) {
      throw new UsageError('The -c/--copy option requires at least one SOURCE and one TARGET argument');
    }
    mode = 'copy';
  } else if (input.inPlace) {
    mode = 'inPlace';
  } else if (input.files.length > 0) {
    mode = 'files';
  } else if (input.stdinPiped) {
    mode = 'stdin';
  }

  if (mode === undefined) {
    if (input.ruleCount > 0) {
      throw new UsageError('No replacement target specified. Provide files or standard input.');
    }
    throw new UsageError('No action specified. Use --help for more information.');
  }

  // Copy works without rules; every other mode would be a no-op
  if (mode !== 'copy' && input.ruleCount === 0) {
    throw new UsageError('No replacement rules specified. Use -r/--replace FROM TO');
  }

  return mode;
}
