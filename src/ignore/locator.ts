/**
 * Ignore-file discovery.
 *
 * Walks from a start path up through its ancestors to the enclosing git
 * repository root and returns every ignore file found, outermost first, so
 * that deeper files take precedence when layered.
 */

import { existsSync } from 'node:fs';
import { readFile, stat } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { debugLog } from '../utils/debug.js';
import type { IgnoreSource } from './matcher.js';

export const IGNORE_FILE_NAME = '.gitignore';

export type IgnoreLocator = (startPath: string) => Promise<IgnoreSource[]>;

/**
 * Read an ignore file into its lines
 */
export async function readIgnoreFile(filePath: string): Promise<string[]> {
  const content = await readFile(filePath, 'utf-8');
  return content.split(/\r?\n/);
}

/**
 * Read `<dir>/.gitignore` as a source anchored at `dir`, if present
 */
export async function readDirectoryIgnoreFile(dir: string): Promise<IgnoreSource | null> {
  const filePath = join(dir, IGNORE_FILE_NAME);
  if (!existsSync(filePath)) return null;

  return {
    patterns: await readIgnoreFile(filePath),
    anchorDir: dir,
    origin: filePath,
  };
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

export const locateIgnoreFiles: IgnoreLocator = async (startPath) => {
  const start = resolve(startPath);
  let dir = (await isDirectory(start)) ? start : dirname(start);

  // Innermost first while walking; reversed on return
  const found: IgnoreSource[] = [];

  for (;;) {
    const source = await readDirectoryIgnoreFile(dir);
    if (source) found.push(source);

    const gitDir = join(dir, '.git');
    if (existsSync(gitDir)) {
      const excludeFile = join(gitDir, 'info', 'exclude');
      if ((await isDirectory(gitDir)) && existsSync(excludeFile)) {
        found.push({
          patterns: await readIgnoreFile(excludeFile),
          anchorDir: dir,
          origin: excludeFile,
        });
      }
      break;
    }

    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  debugLog(`Ignore files for ${start}: ${found.map((s) => s.origin).join(', ') || '(none)'}`);
  return found.reverse();
};
