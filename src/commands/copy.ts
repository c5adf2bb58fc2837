import { executeCopy, formatIssue } from '../copier/index.js';
import { output } from '../utils/output.js';
import type { CommandContext } from './context.js';

/**
 * `-c SOURCE... TARGET`
 *
 * @returns exit code
 */
export async function runCopy(
  paths: readonly string[],
  inPlace: boolean,
  ctx: CommandContext,
): Promise<number> {
  const target = paths[paths.length - 1] ?? '';
  const sources = paths.slice(0, -1);

  output.verbose(`Copying ${sources.join(', ')} -> ${target}`);

  const report = await executeCopy({
    sources,
    destination: target,
    rules: ctx.rules,
    inPlaceRenaming: inPlace,
    renameFiles: ctx.config.renameFiles,
    renameDirectories: ctx.config.renameDirectories,
    ignore: ctx.ignore,
  });

  for (const issue of report.errors) {
    output.error(formatIssue(issue));
  }

  output.success(`✓ Copied ${report.copiedCount} file(s) to ${target}`);
  if (report.skippedCount > 0) {
    output.info(`  Skipped ${report.skippedCount} ignored entr${report.skippedCount === 1 ? 'y' : 'ies'}`);
  }

  if (report.errors.length > 0) {
    output.error(`\n${report.errors.length} error(s) occurred during copy`);
    return 1;
  }
  return 0;
}
