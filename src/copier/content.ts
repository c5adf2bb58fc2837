/**
 * File content handling: text/binary detection and rewriting.
 */

import type { ReplacementRuleSet } from '../replace/index.js';

/** Bytes inspected for NUL when sniffing for binary content */
export const BINARY_SNIFF_LENGTH = 8000;

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Best-effort binary check: a NUL byte near the start, or bytes that are not
 * valid UTF-8.
 */
export function isBinaryContent(buffer: Uint8Array): boolean {
  const sniffed = buffer.subarray(0, BINARY_SNIFF_LENGTH);
  if (sniffed.includes(0)) return true;

  try {
    utf8.decode(buffer);
    return false;
  } catch {
    return true;
  }
}

export interface RewrittenContent {
  readonly content: Buffer;
  readonly binary: boolean;
  readonly changed: boolean;
}

/**
 * Apply the rules to text content; binary content passes through untouched
 */
export function rewriteContent(buffer: Buffer, rules: ReplacementRuleSet): RewrittenContent {
  if (isBinaryContent(buffer)) {
    return { content: buffer, binary: true, changed: false };
  }

  const text = buffer.toString('utf-8');
  const replaced = rules.apply(text);
  if (replaced === text) {
    return { content: buffer, binary: false, changed: false };
  }

  return { content: Buffer.from(replaced, 'utf-8'), binary: false, changed: true };
}
