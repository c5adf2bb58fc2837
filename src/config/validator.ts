/**
 * Config validator
 * Uses Ajv for validation with helpful error messages
 */

import { Ajv, type ErrorObject } from 'ajv';
import { CONFIG_SCHEMA, type ConfigFile } from './schema.js';

export type ConfigValidationResult =
  | { valid: true; config: ConfigFile }
  | { valid: false; errors: string[] };

const ajv = new Ajv({
  allErrors: true,
  strict: false,
});

const validate = ajv.compile<ConfigFile>(CONFIG_SCHEMA);

/**
 * Validate parsed JSON against the config schema
 */
export function validateConfig(data: unknown): ConfigValidationResult {
  if (validate(data)) {
    return { valid: true, config: data };
  }

  return {
    valid: false,
    errors: formatValidationErrors(validate.errors || []),
  };
}

/**
 * Format Ajv validation errors into human-readable messages
 */
export function formatValidationErrors(errors: ErrorObject[]): string[] {
  return errors.map((error) => {
    const path = error.instancePath || '(root)';

    switch (error.keyword) {
      case 'required':
        return `Missing required property: '${error.params.missingProperty}'`;

      case 'type':
        return `Property '${path}' must be of type ${error.params.type}`;

      case 'minLength':
        return `Property '${path}' must be at least ${error.params.limit} characters`;

      case 'additionalProperties':
        return `Unknown property: '${error.params.additionalProperty}'`;

      default:
        return `${path}: ${error.message || 'Validation failed'}`;
    }
  });
}
