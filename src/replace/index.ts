export { type ReplacementRule, ReplacementRuleSet, type RuleSetOptions } from './rule-set.js';
