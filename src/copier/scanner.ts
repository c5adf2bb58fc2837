/**
 * In-place scanner: rewrites file contents where they are, then renames
 * files and directories deepest first so parents move after their children.
 */

import { existsSync } from 'node:fs';
import { lstat, readdir, readFile, rename, stat, writeFile } from 'node:fs/promises';
import { basename, dirname, join, resolve, sep } from 'node:path';
import { type EntryIssue, errorMessage, SourceNotFoundError } from '../errors.js';
import {
  buildIgnoreStack,
  type IgnoreStack,
  type IgnoreStackOptions,
  readDirectoryIgnoreFile,
} from '../ignore/index.js';
import type { ReplacementRuleSet } from '../replace/index.js';
import { debugVerbose } from '../utils/debug.js';
import { output } from '../utils/output.js';
import { rewriteContent } from './content.js';
import { rewriteName } from './paths.js';
import type { ScanReport } from './report.js';

export interface ScanJob {
  /** Files or directories to rewrite (default: current directory) */
  paths: readonly string[];
  rules: ReplacementRuleSet;
  renameFiles?: boolean;
  renameDirectories?: boolean;
  ignore?: IgnoreStackOptions;
}

interface ScannedEntry {
  readonly path: string;
  readonly isDirectory: boolean;
}

function depth(path: string): number {
  return path.split(sep).length;
}

export class InPlaceScanner {
  private readonly job: ScanJob;
  private errors: EntryIssue[] = [];

  constructor(job: ScanJob) {
    this.job = job;
  }

  /**
   * @throws SourceNotFoundError when a path does not exist
   */
  async execute(): Promise<ScanReport> {
    this.errors = [];

    const inputs = this.job.paths.length > 0 ? this.job.paths : ['.'];
    for (const input of inputs) {
      if (!existsSync(input)) throw new SourceNotFoundError(input);
    }

    const entries: ScannedEntry[] = [];
    for (const input of inputs) {
      const root = resolve(input);
      const isDirectory = (await stat(root)).isDirectory();
      // "." and other unnamed roots are never renamed themselves
      if (basename(input) !== '.' && basename(input) !== '..') {
        entries.push({ path: root, isDirectory });
      }
      if (isDirectory) {
        const ignore = await buildIgnoreStack(root, this.job.ignore);
        await this.collect(root, ignore, root, entries);
      }
    }

    let modifiedCount = 0;
    for (const entry of entries) {
      if (!entry.isDirectory && (await this.rewriteFile(entry.path))) {
        modifiedCount++;
      }
    }

    let renamedCount = 0;
    const deepestFirst = [...entries].sort(
      (a, b) => depth(b.path) - depth(a.path) || b.path.length - a.path.length,
    );
    for (const entry of deepestFirst) {
      if (await this.renameEntry(entry)) {
        renamedCount++;
      }
    }

    return { modifiedCount, renamedCount, errors: [...this.errors] };
  }

  private record(kind: EntryIssue['kind'], path: string, message: string): void {
    this.errors.push({ kind, path, message });
  }

  private async collect(
    dir: string,
    ignore: IgnoreStack,
    rootDir: string,
    entries: ScannedEntry[],
  ): Promise<void> {
    let names: string[];
    try {
      names = (await readdir(dir)).sort();
    } catch (error) {
      this.record('IOFailure', dir, `Failed to read directory: ${errorMessage(error)}`);
      return;
    }

    for (const name of names) {
      const path = join(dir, name);

      let isDirectory: boolean;
      try {
        const info = await lstat(path);
        // Links are renamed but never followed
        isDirectory = info.isDirectory();
        if (info.isSymbolicLink()) {
          entries.push({ path, isDirectory: false });
          continue;
        }
      } catch (error) {
        this.record('IOFailure', path, `Unreadable entry: ${errorMessage(error)}`);
        continue;
      }

      if (isDirectory && name === '.git') continue;
      if (ignore.isExcluded(path, isDirectory, rootDir)) {
        debugVerbose(`Ignored: ${path}`);
        continue;
      }

      entries.push({ path, isDirectory });

      if (isDirectory) {
        let childIgnore = ignore;
        if (ignore.enabled) {
          try {
            const nested = await readDirectoryIgnoreFile(path);
            if (nested) childIgnore = ignore.push(nested);
          } catch (error) {
            this.record('InvalidIgnorePattern', path, `${errorMessage(error)}; directory skipped`);
            continue;
          }
        }
        await this.collect(path, childIgnore, rootDir, entries);
      }
    }
  }

  private async rewriteFile(path: string): Promise<boolean> {
    try {
      if ((await lstat(path)).isSymbolicLink()) return false;

      const buffer = await readFile(path);
      const { content, changed } = rewriteContent(buffer, this.job.rules);
      if (!changed) return false;

      await writeFile(path, content);
      output.info(`Modified content: ${path}`);
      return true;
    } catch (error) {
      this.record('IOFailure', path, errorMessage(error));
      return false;
    }
  }

  private async renameEntry(entry: ScannedEntry): Promise<boolean> {
    const name = basename(entry.path);
    const renamed = rewriteName(name, entry.isDirectory, this.job.rules, {
      enabled: true,
      renameFiles: this.job.renameFiles,
      renameDirectories: this.job.renameDirectories,
    });

    if (!renamed.ok) {
      this.record('IOFailure', entry.path, `Invalid name '${renamed.name}': ${renamed.errors.join(', ')}`);
      return false;
    }
    if (renamed.name === name) return false;

    const target = join(dirname(entry.path), renamed.name);
    if (existsSync(target)) {
      this.record('DestinationCollision', entry.path, `Cannot rename to ${target}: target already exists`);
      return false;
    }

    try {
      await rename(entry.path, target);
      output.info(`Renamed: ${entry.path} -> ${target}`);
      return true;
    } catch (error) {
      this.record('IOFailure', entry.path, `Failed to rename: ${errorMessage(error)}`);
      return false;
    }
  }
}

export async function scanInPlace(job: ScanJob): Promise<ScanReport> {
  return new InPlaceScanner(job).execute();
}
