/**
 * Replacement rule set: an ordered fold of case-aware literal substitutions.
 *
 * Each rule matches every convention rendering of its FROM literal (plus
 * the literal itself) and writes TO back in the convention of the
 * occurrence it replaced. Rules run in order, each over the output of the
 * previous one.
 *
 * @example
 * const rules = new ReplacementRuleSet([{ from: 'HelloWorld', to: 'GoodMorning' }]);
 * rules.apply('hello-world HELLO_WORLD helloWorld');
 * // 'good-morning GOOD_MORNING goodMorning'
 */

import { InvalidRuleError } from '../errors.js';
import {
  CASE_CONVENTIONS,
  getNamingManager,
  type NamingManager,
  render,
  validateRule,
} from '../naming/index.js';

export interface ReplacementRule {
  readonly from: string;
  readonly to: string;
}

export interface RuleSetOptions {
  /** Match convention renderings of FROM, not just the literal (default: true) */
  caseAware?: boolean;
  naming?: NamingManager;
}

interface CompiledRule {
  readonly rule: ReplacementRule;
  /** null for rules that cannot change anything (FROM === TO) */
  readonly pattern: RegExp | null;
  /** Candidate spelling -> replacement text */
  readonly replacements: ReadonlyMap<string, string>;
}

const PATH_SEPARATOR = /([/\\])/;

function escapeRegExp(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class ReplacementRuleSet {
  private readonly compiled: readonly CompiledRule[];
  private readonly naming: NamingManager;
  readonly caseAware: boolean;

  /**
   * @throws InvalidRuleError if any rule has an empty FROM
   */
  constructor(rules: readonly ReplacementRule[], options: RuleSetOptions = {}) {
    this.caseAware = options.caseAware ?? true;
    this.naming = options.naming ?? getNamingManager();

    for (const rule of rules) {
      const validation = validateRule(rule.from, rule.to);
      if (!validation.valid) {
        throw new InvalidRuleError(
          `Invalid rule '${rule.from}' -> '${rule.to}': ${validation.errors.join(', ')}`,
        );
      }
    }

    this.compiled = Object.freeze(rules.map((rule) => this.compile(rule)));
  }

  get rules(): readonly ReplacementRule[] {
    return this.compiled.map((compiled) => compiled.rule);
  }

  get size(): number {
    return this.compiled.length;
  }

  isEmpty(): boolean {
    return this.compiled.length === 0;
  }

  /**
   * Apply every rule, in order, to arbitrary text
   */
  apply(text: string): string {
    return this.compiled.reduce((current, rule) => this.applyRule(current, rule), text);
  }

  /**
   * Apply every rule to a file or directory name.
   * Separators are left alone; each component is rewritten on its own.
   */
  applyToName(name: string): string {
    return name
      .split(PATH_SEPARATOR)
      .map((part) => (part === '/' || part === '\\' || part === '' ? part : this.apply(part)))
      .join('');
  }

  private applyRule(text: string, compiled: CompiledRule): string {
    const { pattern, replacements } = compiled;
    if (!pattern) return text;

    pattern.lastIndex = 0;
    return text.replace(pattern, (match) => replacements.get(match) ?? match);
  }

  private compile(rule: ReplacementRule): CompiledRule {
    if (rule.from === rule.to) {
      return Object.freeze({ rule, pattern: null, replacements: new Map<string, string>() });
    }

    const fromVariants = this.naming.getVariants(rule.from);
    const candidates = new Set<string>([rule.from]);
    if (this.caseAware) {
      for (const convention of CASE_CONVENTIONS) {
        const rendering = fromVariants.renderings[convention];
        if (rendering.length > 0) {
          candidates.add(rendering);
        }
      }
    }

    const replacements = new Map<string, string>();
    for (const candidate of candidates) {
      replacements.set(candidate, this.resolveReplacement(rule, candidate));
    }

    // Longest first, so a short spelling never shadows a longer one at the same offset
    const alternatives = [...candidates]
      .sort((a, b) => b.length - a.length)
      .map(escapeRegExp)
      .join('|');

    return Object.freeze({
      rule,
      pattern: new RegExp(alternatives, 'g'),
      replacements,
    });
  }

  /**
   * Spell TO the way the matched occurrence of FROM was spelled
   */
  private resolveReplacement(rule: ReplacementRule, matched: string): string {
    if (!this.caseAware) return rule.to;

    const conventions = this.naming.conventionsOf(rule.from, matched);
    const toWords = this.naming.getVariants(rule.to).tokens.words;

    const [only] = conventions;
    if (only === undefined) {
      // Literal FROM that is no convention rendering, e.g. "XMLParser"
      return rule.to;
    }
    if (conventions.length === 1) {
      return render(toWords, only);
    }

    // Single-word FROM: "foo" is camel, kebab and snake at once
    if (matched === rule.from) {
      return rule.to;
    }
    const toConvention = this.naming.getVariants(rule.to).tokens.convention;
    const preferred = conventions.find((convention) => convention === toConvention) ?? only;
    return render(toWords, preferred);
  }
}
