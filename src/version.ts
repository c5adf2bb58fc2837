import { readFileSync } from 'node:fs';
import { debugError } from './utils/debug.js';

function readPackageVersion(): string {
  try {
    const pkg: unknown = JSON.parse(
      readFileSync(new URL('../package.json', import.meta.url), 'utf-8'),
    );
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (error) {
    debugError('Could not read package.json', error);
  }
  return '0.0.0';
}

export const VERSION = readPackageVersion();
