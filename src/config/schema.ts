/**
 * JSON Schema for `.casecopy.json`
 */

export interface ConfigFile {
  rules?: { from: string; to: string }[];
  caseAware?: boolean;
  renameFiles?: boolean;
  renameDirectories?: boolean;
  ignore?: string[];
}

export const CONFIG_SCHEMA = {
  type: 'object',
  additionalProperties: false,
  properties: {
    $schema: { type: 'string' },
    rules: {
      type: 'array',
      items: {
        type: 'object',
        additionalProperties: false,
        required: ['from', 'to'],
        properties: {
          from: { type: 'string', minLength: 1 },
          to: { type: 'string' },
        },
      },
    },
    caseAware: { type: 'boolean' },
    renameFiles: { type: 'boolean' },
    renameDirectories: { type: 'boolean' },
    ignore: { type: 'array', items: { type: 'string' } },
  },
} as const;
