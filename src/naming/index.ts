/**
 * Case-convention handling for casecopy
 *
 * Tokenizes names into words, renders words in a convention and exposes
 * the memoized variant sets that replacement rules match against.
 *
 * @example
 * import { tokenize, render } from './naming/index.js';
 *
 * const { words } = tokenize('helloWorld');
 * render(words, 'screamingSnake');  // 'HELLO_WORLD'
 */

// Conversion utilities
export {
  convertCase,
  render,
  toCamelCase,
  toKebabCase,
  toPascalCase,
  toScreamingSnakeCase,
  toSnakeCase,
} from './converters.js';
// Core manager
export { getNamingManager, NamingManager, resetNamingManager } from './manager.js';
export { isAllUppercase, splitCaseBoundaries, tokenize } from './tokenizer.js';
// Type definitions
export type {
  CaseConvention,
  NameVariants,
  StyledConvention,
  TokenizedName,
  ValidationResult,
} from './types.js';
export { CASE_CONVENTIONS } from './types.js';

// Validation functions
export { validateFileName, validateRule } from './validators.js';
