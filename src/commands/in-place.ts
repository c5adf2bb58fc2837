import { formatIssue, scanInPlace } from '../copier/index.js';
import { output } from '../utils/output.js';
import type { CommandContext } from './context.js';

/**
 * `-i [PATH...]` without `-c`: rewrite contents, then rename, where files are
 *
 * @returns exit code
 */
export async function runInPlace(paths: readonly string[], ctx: CommandContext): Promise<number> {
  const report = await scanInPlace({
    paths,
    rules: ctx.rules,
    renameFiles: ctx.config.renameFiles,
    renameDirectories: ctx.config.renameDirectories,
    ignore: ctx.ignore,
  });

  for (const issue of report.errors) {
    output.error(formatIssue(issue));
  }

  if (report.modifiedCount === 0 && report.renamedCount === 0) {
    output.warn('Warning: No replacements were made. Check if the pattern exists in the files.');
  } else {
    output.success(
      `✓ Modified ${report.modifiedCount} file(s), renamed ${report.renamedCount} entr${report.renamedCount === 1 ? 'y' : 'ies'}`,
    );
  }

  return report.errors.length > 0 ? 1 : 0;
}
