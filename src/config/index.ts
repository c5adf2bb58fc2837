export {
  type CaseCopyConfig,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE,
  loadConfig,
  mergeRules,
} from './loader.js';
export { CONFIG_SCHEMA, type ConfigFile } from './schema.js';
export { type ConfigValidationResult, formatValidationErrors, validateConfig } from './validator.js';
