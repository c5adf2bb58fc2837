/**
 * Pre-parser for `-r/--replace FROM TO`.
 *
 * Commander options take a single value (or a greedy list), so the pairs are
 * lifted out of the raw argument array before commander sees it.
 * Handles: ['-r', 'foo', 'bar', 'file.txt'] -> rules [foo -> bar], rest ['file.txt']
 */

import { UsageError } from '../errors.js';
import type { ReplacementRule } from '../replace/index.js';

export interface ExtractedRules {
  rules: ReplacementRule[];
  /** Arguments left for commander */
  rest: string[];
}

const REPLACE_FLAGS = new Set(['-r', '--replace']);

export function extractReplaceRules(args: readonly string[]): ExtractedRules {
  const rules: ReplacementRule[] = [];
  const rest: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    // Everything after "--" is positional
    if (arg === '--') {
      rest.push(...args.slice(i));
      break;
    }

    if (arg.startsWith('--replace=')) {
      throw new UsageError('Use -r/--replace FROM TO (two separate arguments)');
    }

    if (!REPLACE_FLAGS.has(arg)) {
      rest.push(arg);
      continue;
    }

    const from = args[i + 1];
    const to = args[i + 2];
    if (from === undefined || to === undefined) {
      throw new UsageError('Each -r/--replace option requires both FROM and TO arguments');
    }

    rules.push({ from, to });
    i += 2;
  }

  return { rules, rest };
}
