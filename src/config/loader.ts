/**
 * Config file loading and rule merging.
 *
 * The config file is optional. An explicit path (`--config` or
 * CASECOPY_CONFIG_PATH) must exist; the default `.casecopy.json` in the
 * working directory is read only when present.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { errorMessage, InvalidConfigError } from '../errors.js';
import type { ReplacementRule } from '../replace/index.js';
import { debugLog } from '../utils/debug.js';
import { validateConfig } from './validator.js';

export const DEFAULT_CONFIG_FILE = '.casecopy.json';

export interface CaseCopyConfig {
  readonly rules: readonly ReplacementRule[];
  readonly caseAware: boolean;
  readonly renameFiles: boolean;
  readonly renameDirectories: boolean;
  readonly ignore: readonly string[];
  /** File the values were read from, if any */
  readonly path?: string;
}

export const DEFAULT_CONFIG: CaseCopyConfig = Object.freeze({
  rules: [],
  caseAware: true,
  renameFiles: true,
  renameDirectories: true,
  ignore: [],
});

/**
 * Load config
 *
 * @param configPath - explicit path; falls back to CASECOPY_CONFIG_PATH, then
 *   `<cwd>/.casecopy.json` if it exists
 * @throws InvalidConfigError when the file is missing, unparsable or invalid
 */
export async function loadConfig(
  configPath?: string,
  cwd: string = process.cwd(),
): Promise<CaseCopyConfig> {
  const explicit = configPath ?? process.env.CASECOPY_CONFIG_PATH;
  const path = explicit ?? join(cwd, DEFAULT_CONFIG_FILE);

  if (!existsSync(path)) {
    if (explicit !== undefined) {
      throw new InvalidConfigError(path, ['file not found']);
    }
    return DEFAULT_CONFIG;
  }

  let data: unknown;
  try {
    data = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    throw new InvalidConfigError(path, [errorMessage(error)]);
  }

  const result = validateConfig(data);
  if (!result.valid) {
    throw new InvalidConfigError(path, result.errors);
  }

  debugLog(`Loaded config from ${path}`);
  const { config } = result;
  return Object.freeze({
    rules: config.rules ?? [],
    caseAware: config.caseAware ?? DEFAULT_CONFIG.caseAware,
    renameFiles: config.renameFiles ?? DEFAULT_CONFIG.renameFiles,
    renameDirectories: config.renameDirectories ?? DEFAULT_CONFIG.renameDirectories,
    ignore: config.ignore ?? [],
    path,
  });
}

/**
 * Config rules first; a command-line rule replaces any config rule with the
 * same FROM and is appended in command-line order
 */
export function mergeRules(
  configRules: readonly ReplacementRule[],
  cliRules: readonly ReplacementRule[],
): ReplacementRule[] {
  let merged = [...configRules];
  for (const rule of cliRules) {
    merged = merged.filter((existing) => existing.from !== rule.from);
    merged.push(rule);
  }
  return merged;
}
