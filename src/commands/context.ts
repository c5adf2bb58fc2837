import type { CaseCopyConfig } from '../config/index.js';
import type { IgnoreStackOptions } from '../ignore/index.js';
import type { ReplacementRuleSet } from '../replace/index.js';

/**
 * Process I/O seams, replaced in tests
 */
export interface CliIO {
  writeStdout(text: string): void;
  writeStderr(text: string): void;
  readStdin(): Promise<Buffer>;
  stdinPiped(): boolean;
}

export interface CommandContext {
  readonly rules: ReplacementRuleSet;
  readonly config: CaseCopyConfig;
  readonly ignore: IgnoreStackOptions;
  readonly io: CliIO;
}
