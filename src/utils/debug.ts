/**
 * Debug utility for casecopy
 * Controlled by CASECOPY_DEBUG environment variable:
 * - 0 or undefined: No debug output (default)
 * - 1: Basic debug information
 * - 2: Detailed debug information including per-entry decisions
 */

function debugLevel(): number {
  return parseInt(process.env.CASECOPY_DEBUG || '0', 10) || 0;
}

export function debugLog(message: string, ...args: unknown[]): void {
  if (debugLevel() > 0) {
    console.error(`[CASECOPY] ${message}`, ...args);
  }
}

export function debugVerbose(message: string, ...args: unknown[]): void {
  if (debugLevel() >= 2) {
    console.error(`[CASECOPY:VERBOSE] ${message}`, ...args);
  }
}

export function debugError(message: string, error: unknown): void {
  const level = debugLevel();
  if (level > 0) {
    console.error(`[CASECOPY:ERROR] ${message}`);
    if (error instanceof Error) {
      console.error(`  Message: ${error.message}`);
      if (level >= 2 && error.stack) {
        console.error(`  Stack: ${error.stack}`);
      }
    } else {
      console.error(`  Error: ${String(error)}`);
    }
  }
}
