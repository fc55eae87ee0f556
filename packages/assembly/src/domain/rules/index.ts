export {
  compilePathPattern,
  InvalidPatternError,
  matchPathPattern,
  splitPath,
  type PathPattern,
} from './path-pattern.js';
export {
  OrderedRuleList,
  type CompiledRule,
  type RuleEvaluation,
  type RuleMatch,
  type RulePrecedence,
} from './ordered-rules.js';
