import { compilePathPattern, matchPathPattern, type PathPattern } from './path-pattern.js';

/**
 * `last-match` lets later rules override earlier ones (staging); `first-match` stops at the first
 * rule that applies (organizing).
 */
export type RulePrecedence = 'first-match' | 'last-match';

export interface CompiledRule<TRule> {
  readonly rule: TRule;
  readonly index: number;
  readonly pattern: PathPattern;
}

export interface RuleMatch<TRule> {
  readonly rule: TRule;
  readonly index: number;
  /** Leading path segments covered by the pattern. */
  readonly matchedSegments: number;
}

export interface RuleEvaluation<TRule> {
  readonly selected: RuleMatch<TRule> | undefined;
  /** Indexes of every evaluated rule whose pattern matched the path. */
  readonly matchedIndexes: readonly number[];
}

/**
 * Ordered list of rules compiled once and folded over each path with the requested precedence.
 * Shared by stage and organize evaluation.
 */
export class OrderedRuleList<TRule> {
  readonly rules: readonly CompiledRule<TRule>[];

  constructor(
    rules: readonly TRule[],
    patternOf: (rule: TRule) => string,
    describeInvalid?: (error: unknown, rule: TRule, index: number) => Error,
  ) {
    this.rules = Object.freeze(
      rules.map((rule, index) => {
        try {
          return { rule, index, pattern: compilePathPattern(patternOf(rule)) };
        } catch (error) {
          throw describeInvalid ? describeInvalid(error, rule, index) : error;
        }
      }),
    );
  }

  get size(): number {
    return this.rules.length;
  }

  evaluate(pathSegments: readonly string[], precedence: RulePrecedence): RuleEvaluation<TRule> {
    const matchedIndexes: number[] = [];
    const selected = this.rules.reduce<RuleMatch<TRule> | undefined>((current, compiled) => {
      if (precedence === 'first-match' && current !== undefined) {
        return current;
      }
      const matchedSegments = matchPathPattern(compiled.pattern, pathSegments);
      if (matchedSegments === undefined) {
        return current;
      }
      matchedIndexes.push(compiled.index);
      return { rule: compiled.rule, index: compiled.index, matchedSegments };
    }, undefined);

    return { selected, matchedIndexes };
  }
}
