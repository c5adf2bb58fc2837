import { Command, CommanderError } from 'commander';
import type { CliIO, CommandContext } from './commands/context.js';
import { runCopy } from './commands/copy.js';
import { runFiles } from './commands/files.js';
import { runInPlace } from './commands/in-place.js';
import { resolveMode } from './commands/mode.js';
import { extractReplaceRules } from './commands/replace-args.js';
import { runStdin } from './commands/stdin.js';
import { loadConfig, mergeRules } from './config/index.js';
import { errorMessage } from './errors.js';
import type { ReplacementRule } from './replace/index.js';
import { ReplacementRuleSet } from './replace/index.js';
import { debugError } from './utils/debug.js';
import { output } from './utils/output.js';
import { hasPipedStdin, readStdin } from './utils/stdin.js';
import { VERSION } from './version.js';

export interface CliOptions {
  copy?: string[];
  inPlace?: boolean;
  includeGitIgnore?: boolean;
  config?: string;
  quiet?: boolean;
  verbose?: boolean;
}

export const processIO: CliIO = {
  writeStdout: (text) => {
    process.stdout.write(text);
  },
  writeStderr: (text) => {
    process.stderr.write(text);
  },
  readStdin,
  stdinPiped: hasPipedStdin,
};

/**
 * Build the commander program.
 *
 * `-r FROM TO` pairs are taken out of argv beforehand (see
 * extractReplaceRules) and handed in as `rules`; the option is declared here
 * for the help text only.
 */
export function createProgram(
  rules: readonly ReplacementRule[],
  io: CliIO,
  onExit: (code: number) => void,
): Command {
  const program = new Command();

  program
    .name('casecopy')
    .description(
      'Copy files and directories while replacing names and contents, keeping each occurrence in its case style',
    )
    .version(VERSION)
    .argument('[files...]', 'Files to rewrite (printed to stdout, or rewritten in place with -i)')
    .option('-c, --copy <paths...>', 'Copy SOURCE... into TARGET (the last path is the target)')
    .option('-r, --replace <pair...>', 'Replace FROM with TO, given as -r FROM TO; repeatable, applied in order')
    .option('-i, --in-place', 'Replace in file and directory names as well')
    .option('--include-git-ignore', 'Include files that match .gitignore patterns')
    .option('--config <path>', 'Config file (default: ./.casecopy.json when present)')
    .option('-q, --quiet', 'Suppress non-critical output')
    .option('-v, --verbose', 'Show detailed output')
    .configureOutput({
      writeOut: (text) => io.writeStdout(text),
      writeErr: (text) => io.writeStderr(text),
    })
    .exitOverride()
    .addHelpText(
      'after',
      `
Examples:
  $ casecopy -c Awesome/foo Cool/ -r foo bar -i     # Copy, renaming foo -> bar everywhere
  $ echo "Hello, World" | casecopy -r Hello Hi -r World Japan
  $ casecopy -r HelloWorld GoodMorning src/app.ts  # Print the rewritten file
  $ casecopy -i -r foo bar src/                    # Rewrite and rename in place

Case styles:
  One rule covers HelloWorld, helloWorld, hello-world, hello_world and
  HELLO_WORLD; each occurrence is replaced in its own style.
`,
    )
    .action(async (files: string[], options: CliOptions) => {
      if (options.quiet) {
        output.setLevel('quiet');
      } else if (options.verbose) {
        output.setLevel('verbose');
      }

      try {
        const config = await loadConfig(options.config);
        const ruleSet = new ReplacementRuleSet(mergeRules(config.rules, rules), {
          caseAware: config.caseAware,
        });

        const mode = resolveMode({
          copy: options.copy,
          files,
          inPlace: options.inPlace ?? false,
          stdinPiped: io.stdinPiped(),
          ruleCount: ruleSet.size,
        });

        const ctx: CommandContext = {
          rules: ruleSet,
          config,
          ignore: {
            includeIgnored: options.includeGitIgnore ?? false,
            extraPatterns: config.ignore,
          },
          io,
        };

        switch (mode) {
          case 'copy':
            onExit(await runCopy(options.copy ?? [], options.inPlace ?? false, ctx));
            break;
          case 'inPlace':
            onExit(await runInPlace(files, ctx));
            break;
          case 'files':
            onExit(await runFiles(files, ctx));
            break;
          case 'stdin':
            onExit(await runStdin(ctx));
            break;
        }
      } catch (error) {
        debugError('Command failed', error);
        output.error(`Error: ${errorMessage(error)}`);
        onExit(1);
      }
    });

  return program;
}

/**
 * Parse user arguments (argv without node and script) and run
 *
 * @returns process exit code
 */
export async function run(args: readonly string[], io: CliIO = processIO): Promise<number> {
  let exitCode = 0;

  let extracted: ReturnType<typeof extractReplaceRules>;
  try {
    extracted = extractReplaceRules(args);
  } catch (error) {
    output.error(`Error: ${errorMessage(error)}`);
    return 1;
  }

  const program = createProgram(extracted.rules, io, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(extracted.rest, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version end up here too, with exit code 0
      return error.exitCode;
    }
    throw error;
  }

  return exitCode;
}
