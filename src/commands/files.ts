import { existsSync } from 'node:fs';
import { readFile, stat } from 'node:fs/promises';
import { isBinaryContent } from '../copier/index.js';
import { errorMessage } from '../errors.js';
import { output } from '../utils/output.js';
import type { CommandContext } from './context.js';

/**
 * `FILE...` without `-i`: print each rewritten file to stdout
 *
 * @returns exit code
 */
export async function runFiles(files: readonly string[], ctx: CommandContext): Promise<number> {
  // Rewritten content owns stdout
  output.useStderr();

  let failed = false;
  let anyReplaced = false;

  for (const file of files) {
    if (!existsSync(file)) {
      output.error(`Error: File not found: ${file}`);
      failed = true;
      continue;
    }

    try {
      if ((await stat(file)).isDirectory()) {
        output.warn(`Warning: Skipping directory: ${file}`);
        continue;
      }

      const buffer = await readFile(file);
      if (isBinaryContent(buffer)) {
        output.warn(`Warning: Skipping binary file: ${file}`);
        continue;
      }

      const content = buffer.toString('utf-8');
      const replaced = ctx.rules.apply(content);
      if (replaced !== content) {
        anyReplaced = true;
      } else {
        output.verbose(`No replacements made in file: ${file}`);
      }
      ctx.io.writeStdout(replaced);
    } catch (error) {
      output.error(`Error: Failed to read ${file}: ${errorMessage(error)}`);
      failed = true;
    }
  }

  if (!anyReplaced) {
    output.warn('Warning: No replacements were made in any files. Check if the pattern exists in the files.');
  }

  return failed ? 1 : 0;
}
