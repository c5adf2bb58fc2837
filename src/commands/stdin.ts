import { isBinaryContent } from '../copier/index.js';
import { UsageError } from '../errors.js';
import { output } from '../utils/output.js';
import type { CommandContext } from './context.js';

/**
 * No `-c` and no files: rewrite stdin to stdout
 *
 * @returns exit code
 */
export async function runStdin(ctx: CommandContext): Promise<number> {
  output.useStderr();

  const bytes = await ctx.io.readStdin();
  if (bytes.length === 0) {
    throw new UsageError('No input provided for replacement');
  }
  if (isBinaryContent(bytes)) {
    throw new UsageError('Standard input is not UTF-8 text');
  }

  const input = bytes.toString('utf-8');

  const replaced = ctx.rules.apply(input);
  ctx.io.writeStdout(replaced);

  if (replaced === input) {
    output.warn('Warning: No replacements were made. Check if the pattern exists in the input.');
  }

  return 0;
}
