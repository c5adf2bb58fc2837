import type { EntryIssue } from '../errors.js';

export interface CopiedEntry {
  readonly source: string;
  readonly target: string;
  /** Copied byte-for-byte, rules not applied */
  readonly binary: boolean;
}

export interface CopyReport {
  /** Files written */
  readonly copiedCount: number;
  readonly directoryCount: number;
  /** Entries left out by ignore rules */
  readonly skippedCount: number;
  readonly entries: readonly CopiedEntry[];
  readonly errors: readonly EntryIssue[];
}

export interface ScanReport {
  /** Files whose content was rewritten */
  readonly modifiedCount: number;
  /** Files and directories renamed */
  readonly renamedCount: number;
  readonly errors: readonly EntryIssue[];
}

/**
 * One line per issue: "[Kind] path: message"
 */
export function formatIssue(issue: EntryIssue): string {
  return `[${issue.kind}] ${issue.path}: ${issue.message}`;
}
