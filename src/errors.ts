/**
 * Error types for casecopy.
 *
 * Fatal errors are thrown as `CaseCopyError` subclasses before anything
 * touches the filesystem. Per-entry failures during a copy or scan are
 * recorded as `EntryIssue` values instead, so one bad entry never stops
 * the rest of the walk.
 */

export type ErrorKind =
  | 'InvalidRule'
  | 'InvalidIgnorePattern'
  | 'SourceNotFound'
  | 'DestinationCollision'
  | 'IOFailure'
  | 'InvalidConfig'
  | 'UsageError';

/**
 * Per-entry failure recorded in a copy or scan report
 */
export interface EntryIssue {
  readonly kind: Extract<ErrorKind, 'DestinationCollision' | 'IOFailure' | 'InvalidIgnorePattern'>;
  readonly path: string;
  readonly message: string;
}

/**
 * Base class for all fatal casecopy errors
 */
export class CaseCopyError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string) {
    super(message);
    this.name = 'CaseCopyError';
    this.kind = kind;
  }
}

export class InvalidRuleError extends CaseCopyError {
  constructor(message: string) {
    super('InvalidRule', message);
    this.name = 'InvalidRuleError';
  }
}

export class InvalidIgnorePatternError extends CaseCopyError {
  readonly pattern: string;

  constructor(pattern: string, reason: string) {
    super('InvalidIgnorePattern', `Invalid ignore pattern '${pattern}': ${reason}`);
    this.name = 'InvalidIgnorePatternError';
    this.pattern = pattern;
  }
}

export class SourceNotFoundError extends CaseCopyError {
  readonly source: string;

  constructor(source: string) {
    super('SourceNotFound', `Source path does not exist: ${source}`);
    this.name = 'SourceNotFoundError';
    this.source = source;
  }
}

export class InvalidConfigError extends CaseCopyError {
  readonly errors: readonly string[];

  constructor(configPath: string, errors: readonly string[]) {
    super('InvalidConfig', `Invalid config '${configPath}': ${errors.join(', ')}`);
    this.name = 'InvalidConfigError';
    this.errors = errors;
  }
}

export class UsageError extends CaseCopyError {
  constructor(message: string) {
    super('UsageError', message);
    this.name = 'UsageError';
  }
}

/**
 * Describe an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
