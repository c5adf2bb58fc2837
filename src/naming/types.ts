/**
 * Type definitions for case-convention handling.
 *
 * A name is broken into lowercase words plus the convention it was
 * written in; rendering the words back in any convention yields every
 * spelling a replacement rule has to recognise.
 */

/**
 * Conventions a multi-word name can be rendered in, in match priority order
 */
export const CASE_CONVENTIONS = ['pascal', 'camel', 'kebab', 'snake', 'screamingSnake'] as const;

export type StyledConvention = (typeof CASE_CONVENTIONS)[number];

/**
 * `unknown` marks single-word or separator-less input with no convention to detect
 */
export type CaseConvention = StyledConvention | 'unknown';

/**
 * Result of tokenizing a name
 */
export interface TokenizedName {
  /** Input as given: "XMLParser" */
  readonly source: string;

  /** Lowercase words: ["xml", "parser"] */
  readonly words: readonly string[];

  /** Detected convention: "pascal" */
  readonly convention: CaseConvention;
}

/**
 * All spellings of one literal, as used for matching
 */
export interface NameVariants {
  readonly literal: string;
  readonly tokens: TokenizedName;

  /** One rendering per styled convention: { pascal: "HelloWorld", kebab: "hello-world", ... } */
  readonly renderings: Readonly<Record<StyledConvention, string>>;
}

/**
 * Validation result
 */
export interface ValidationResult {
  readonly valid: boolean;
  readonly errors: readonly string[];
}
