/**
 * casecopy: case-aware copy-and-replace
 *
 * @example
 * import { ReplacementRuleSet, executeCopy } from 'casecopy';
 *
 * const rules = new ReplacementRuleSet([{ from: 'foo', to: 'bar' }]);
 * const report = await executeCopy({
 *   sources: ['Awesome/foo'],
 *   destination: 'Cool/',
 *   rules,
 *   inPlaceRenaming: true,
 * });
 */

export * from './config/index.js';
export * from './copier/index.js';
export * from './errors.js';
export * from './ignore/index.js';
export * from './naming/index.js';
export * from './replace/index.js';
export { createProgram, run } from './program.js';
