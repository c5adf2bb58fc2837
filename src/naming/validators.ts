/**
 * Validation functions for replacement rules and rewritten names.
 */

import type { ValidationResult } from './types.js';

/**
 * Validate a replacement rule
 *
 * Rules:
 * - FROM must not be empty
 * - TO may be empty (the match is deleted)
 * - FROM equal to TO is allowed and acts as a no-op
 *
 * @example
 * validateRule('foo', 'bar')  // { valid: true, errors: [] }
 * validateRule('', 'bar')     // { valid: false, errors: [...] }
 */
export function validateRule(from: string, _to: string): ValidationResult {
  const errors: string[] = [];

  if (from.length === 0) {
    errors.push('Empty FROM string is not allowed in replacement rules');
  }

  return Object.freeze({
    valid: errors.length === 0,
    errors: Object.freeze(errors),
  });
}

/**
 * Validate a single path component produced by renaming
 *
 * @example
 * validateFileName('bar-item.tsx')  // { valid: true, errors: [] }
 * validateFileName('a/b')           // { valid: false, errors: [...] }
 */
export function validateFileName(name: string): ValidationResult {
  const errors: string[] = [];

  if (name.length === 0) {
    errors.push('Name cannot be empty');
  }

  if (name.includes('/') || name.includes('\\')) {
    errors.push('Name must not contain path separators');
  }

  if (name === '.' || name === '..') {
    errors.push(`'${name}' is not a valid name`);
  }

  if (name.includes('\0')) {
    errors.push('Name must not contain NUL characters');
  }

  return Object.freeze({
    valid: errors.length === 0,
    errors: Object.freeze(errors),
  });
}
