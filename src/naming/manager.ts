/**
 * Naming manager: computes and memoizes every spelling of a literal.
 *
 * A replacement rule asks for the variants of its FROM and TO literals
 * once per run; the manager caches them as frozen objects.
 *
 * @example
 * const naming = getNamingManager();
 * const variants = naming.getVariants('HelloWorld');
 * variants.renderings.kebab           // 'hello-world'
 * variants.renderings.screamingSnake  // 'HELLO_WORLD'
 */

import { render } from './converters.js';
import { tokenize } from './tokenizer.js';
import { CASE_CONVENTIONS, type NameVariants, type StyledConvention } from './types.js';

export class NamingManager {
  private variantsCache = new Map<string, NameVariants>();

  /**
   * Tokenize a literal and render it in every styled convention
   */
  getVariants(literal: string): NameVariants {
    const cached = this.variantsCache.get(literal);
    if (cached) return cached;

    const tokens = tokenize(literal);
    const renderings: Record<StyledConvention, string> = {
      pascal: render(tokens.words, 'pascal'),
      camel: render(tokens.words, 'camel'),
      kebab: render(tokens.words, 'kebab'),
      snake: render(tokens.words, 'snake'),
      screamingSnake: render(tokens.words, 'screamingSnake'),
    };

    const result: NameVariants = Object.freeze({
      literal,
      tokens,
      renderings: Object.freeze(renderings),
    });

    this.variantsCache.set(literal, result);
    return result;
  }

  /**
   * Conventions whose rendering of `literal` is exactly `text`, in priority order
   */
  conventionsOf(literal: string, text: string): StyledConvention[] {
    const { renderings } = this.getVariants(literal);
    return CASE_CONVENTIONS.filter((convention) => renderings[convention] === text);
  }

  /**
   * Clear all caches (useful for testing)
   */
  clearCache(): void {
    this.variantsCache.clear();
  }
}

/**
 * Global singleton instance
 */
let globalInstance: NamingManager | undefined;

export function getNamingManager(): NamingManager {
  if (!globalInstance) {
    globalInstance = new NamingManager();
  }
  return globalInstance;
}

/**
 * Reset global instance (for testing)
 */
export function resetNamingManager(): void {
  globalInstance = undefined;
}
