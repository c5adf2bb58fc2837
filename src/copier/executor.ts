/**
 * Copy executor: walks source trees and writes a renamed, rewritten copy.
 *
 * Planning (source checks, root targets, ignore discovery) happens before
 * anything is written and throws on failure. After that every entry is
 * independent: a failure is recorded in the report and the walk goes on.
 */

import { existsSync } from 'node:fs';
import { chmod, lstat, mkdir, readdir, readFile, stat, writeFile } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';
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
import { type RenameOptions, rewriteName } from './paths.js';
import type { CopiedEntry, CopyReport } from './report.js';

export interface CopyJob {
  /** Files or directories, each walked independently */
  sources: readonly string[];
  destination: string;
  rules: ReplacementRuleSet;
  /** Rewrite file and directory names too (`-i`) */
  inPlaceRenaming?: boolean;
  renameFiles?: boolean;
  renameDirectories?: boolean;
  ignore?: IgnoreStackOptions;
}

interface PlannedRoot {
  readonly source: string;
  readonly target: string;
  readonly isDirectory: boolean;
  readonly ignore: IgnoreStack;
}

const VCS_DIRECTORY = '.git';

export class CopyExecutor {
  private readonly job: CopyJob;
  private readonly rename: RenameOptions;

  private entries: CopiedEntry[] = [];
  private errors: EntryIssue[] = [];
  /** Files and directories this run has created */
  private written = new Set<string>();
  private reservedTargets = new Set<string>();
  private directoryCount = 0;
  private skippedCount = 0;

  constructor(job: CopyJob) {
    this.job = job;
    this.rename = {
      enabled: job.inPlaceRenaming ?? false,
      renameFiles: job.renameFiles,
      renameDirectories: job.renameDirectories,
    };
  }

  /**
   * Run the copy
   *
   * @throws SourceNotFoundError when a source does not exist
   * @throws InvalidIgnorePatternError when a discovered ignore file is malformed
   */
  async execute(): Promise<CopyReport> {
    this.reset();

    const roots = await this.plan();
    for (const root of roots) {
      if (root.isDirectory) {
        await this.copyRootDirectory(root);
      } else {
        await this.copyFile(root.source, root.target);
      }
    }

    return {
      copiedCount: this.entries.length,
      directoryCount: this.directoryCount,
      skippedCount: this.skippedCount,
      entries: [...this.entries],
      errors: [...this.errors],
    };
  }

  private reset(): void {
    this.entries = [];
    this.errors = [];
    this.written = new Set();
    this.reservedTargets = new Set();
    this.directoryCount = 0;
    this.skippedCount = 0;
  }

  private record(kind: EntryIssue['kind'], path: string, message: string): void {
    this.errors.push({ kind, path, message });
    output.verbose(`  ! ${path}: ${message}`);
  }

  private async plan(): Promise<PlannedRoot[]> {
    const sources = this.job.sources.map((source) => resolve(source));
    for (const [i, source] of sources.entries()) {
      if (!existsSync(source)) {
        throw new SourceNotFoundError(this.job.sources[i] ?? source);
      }
    }

    const destination = resolve(this.job.destination);
    const intoDirectory =
      sources.length > 1 ||
      /[/\\]$/.test(this.job.destination) ||
      (await isDirectoryPath(destination));

    const planned: Omit<PlannedRoot, 'ignore'>[] = [];
    for (const source of sources) {
      const isDirectory = (await stat(source)).isDirectory();
      let target = destination;

      if (intoDirectory) {
        const renamed = rewriteName(basename(source), isDirectory, this.job.rules, this.rename);
        if (!renamed.ok) {
          this.record('IOFailure', source, `Invalid name '${renamed.name}': ${renamed.errors.join(', ')}`);
          continue;
        }
        target = join(destination, renamed.name);
      }

      planned.push({ source, target, isDirectory });
    }

    // Sources whose rewritten basenames collide are all left out
    const byTarget = new Map<string, string[]>();
    for (const root of planned) {
      byTarget.set(root.target, [...(byTarget.get(root.target) ?? []), root.source]);
    }

    const roots: PlannedRoot[] = [];
    for (const root of planned) {
      const sharing = byTarget.get(root.target) ?? [];
      if (sharing.length > 1) {
        const others = sharing.filter((source) => source !== root.source);
        this.record(
          'DestinationCollision',
          root.source,
          `Destination ${root.target} is also the target of ${others.join(', ')}`,
        );
        continue;
      }

      const ignore = await buildIgnoreStack(root.source, this.job.ignore);
      roots.push({ ...root, ignore });
    }

    this.reservedTargets = new Set([destination, ...planned.map((root) => root.target)]);
    return roots;
  }

  private async copyRootDirectory(root: PlannedRoot): Promise<void> {
    if (existsSync(root.target) && !(await isDirectoryPath(root.target))) {
      this.record('IOFailure', root.source, `Cannot copy directory to file ${root.target}`);
      return;
    }

    try {
      await mkdir(root.target, { recursive: true });
    } catch (error) {
      this.record('IOFailure', root.target, `Failed to create directory: ${errorMessage(error)}`);
      return;
    }

    this.written.add(root.target);
    output.verbose(`${root.source} -> ${root.target}`);
    await this.walk(root.source, root.target, root.ignore, root.source);
  }

  private async walk(
    sourceDir: string,
    targetDir: string,
    ignore: IgnoreStack,
    rootDir: string,
  ): Promise<void> {
    let names: string[];
    try {
      names = (await readdir(sourceDir)).sort();
    } catch (error) {
      this.record('IOFailure', sourceDir, `Failed to read directory: ${errorMessage(error)}`);
      return;
    }

    for (const name of names) {
      const sourcePath = join(sourceDir, name);

      // Never walk into our own output
      if (this.reservedTargets.has(sourcePath)) {
        debugVerbose(`Skipping destination inside source: ${sourcePath}`);
        continue;
      }

      let isDirectory: boolean;
      try {
        const linkInfo = await lstat(sourcePath);
        const info = linkInfo.isSymbolicLink() ? await stat(sourcePath) : linkInfo;
        if (linkInfo.isSymbolicLink() && info.isDirectory()) {
          output.warn(`Warning: Not following directory symlink: ${sourcePath}`);
          continue;
        }
        isDirectory = info.isDirectory();
      } catch (error) {
        this.record('IOFailure', sourcePath, `Unreadable entry: ${errorMessage(error)}`);
        continue;
      }

      if (isDirectory && name === VCS_DIRECTORY) continue;

      if (ignore.isExcluded(sourcePath, isDirectory, rootDir)) {
        this.skippedCount++;
        debugVerbose(`Ignored: ${sourcePath}`);
        continue;
      }

      const renamed = rewriteName(name, isDirectory, this.job.rules, this.rename);
      if (!renamed.ok) {
        this.record('IOFailure', sourcePath, `Invalid name '${renamed.name}': ${renamed.errors.join(', ')}`);
        continue;
      }
      const targetPath = join(targetDir, renamed.name);

      if (isDirectory) {
        await this.copyDirectory(sourcePath, targetPath, ignore, rootDir);
      } else {
        await this.copyFile(sourcePath, targetPath);
      }
    }
  }

  private async copyDirectory(
    sourcePath: string,
    targetPath: string,
    ignore: IgnoreStack,
    rootDir: string,
  ): Promise<void> {
    if (this.written.has(targetPath)) {
      this.record(
        'DestinationCollision',
        sourcePath,
        `${targetPath} was already created by this copy; directory skipped`,
      );
      return;
    }

    let childIgnore = ignore;
    if (ignore.enabled) {
      try {
        const nested = await readDirectoryIgnoreFile(sourcePath);
        if (nested) childIgnore = ignore.push(nested);
      } catch (error) {
        this.record('InvalidIgnorePattern', sourcePath, `${errorMessage(error)}; directory skipped`);
        return;
      }
    }

    try {
      await mkdir(targetPath, { recursive: true });
    } catch (error) {
      this.record('IOFailure', targetPath, `Failed to create directory: ${errorMessage(error)}`);
      return;
    }

    this.written.add(targetPath);
    this.directoryCount++;
    output.verbose(`${sourcePath} -> ${targetPath}`);
    await this.walk(sourcePath, targetPath, childIgnore, rootDir);
  }

  private async copyFile(sourcePath: string, targetPath: string): Promise<void> {
    if (this.written.has(targetPath)) {
      this.record('DestinationCollision', sourcePath, `${targetPath} was already written by this copy`);
      return;
    }

    try {
      const buffer = await readFile(sourcePath);
      const { content, binary } = rewriteContent(buffer, this.job.rules);

      await mkdir(dirname(targetPath), { recursive: true });
      await writeFile(targetPath, content);

      this.written.add(targetPath);
      this.entries.push({ source: sourcePath, target: targetPath, binary });
      output.verbose(`${sourcePath} -> ${targetPath}`);
    } catch (error) {
      this.record('IOFailure', sourcePath, errorMessage(error));
      return;
    }

    // The content is in place either way; a mode failure is its own issue
    try {
      await chmod(targetPath, (await stat(sourcePath)).mode & 0o777);
    } catch (error) {
      this.record('IOFailure', targetPath, `Failed to copy permissions: ${errorMessage(error)}`);
    }
  }
}

async function isDirectoryPath(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Copy sources into a destination, rewriting contents (and names when
 * `inPlaceRenaming` is set)
 */
export async function executeCopy(job: CopyJob): Promise<CopyReport> {
  return new CopyExecutor(job).execute();
}
