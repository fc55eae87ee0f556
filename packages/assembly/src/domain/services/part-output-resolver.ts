import { posix } from 'node:path';

import type {
  OrganizeRule,
  PartDeclaration,
  StageDefaultPolicy,
  StageRule,
} from '../../config/index.js';
import { RuleError, type RuleReference } from '../errors.js';
import { comparePaths, type OutputTree, type StagedFile } from '../model/index.js';
import {
  OrderedRuleList,
  splitPath,
  type CompiledRule,
  type RuleMatch,
} from '../rules/index.js';
import { ancestorPaths, normaliseRelativePath } from './relative-path.js';

export interface UnmatchedRule {
  readonly type: 'stage' | 'organize';
  readonly index: number;
  readonly pattern: string;
}

export interface ResolvedPartOutput {
  readonly part: string;
  /** Staged files sorted by destination path. */
  readonly files: readonly StagedFile[];
  readonly excludedCount: number;
  readonly organizedCount: number;
  readonly unmatchedRules: readonly UnmatchedRule[];
}

/**
 * Resolves the policy applied to paths no stage rule matches.
 */
export function resolveStageDefault(
  part: Pick<PartDeclaration, 'stage' | 'stageDefault'>,
): StageDefaultPolicy {
  if (part.stageDefault !== undefined) {
    return part.stageDefault;
  }
  return part.stage.some((rule) => rule.kind === 'include') ? 'exclude' : 'include';
}

/**
 * Compiles a part's stage and organize rules without applying them.
 *
 * @throws {RuleError} When a pattern is empty or malformed.
 */
export function compilePartRules(part: PartDeclaration): {
  readonly stage: OrderedRuleList<StageRule>;
  readonly organize: OrderedRuleList<OrganizeRule>;
} {
  const stage = new OrderedRuleList(
    part.stage,
    (rule) => rule.pattern,
    (error, rule, index) => invalidPattern(part.name, { type: 'stage', index, rule }, error),
  );
  const organize = new OrderedRuleList(
    part.organize,
    (rule) => rule.source,
    (error, rule, index) => invalidPattern(part.name, { type: 'organize', index, rule }, error),
  );
  return { stage, organize };
}

/**
 * Reduces a part's output tree to the files it stages and moves them to their organized
 * destinations. Stage rules are folded with last-match precedence, organize rules with
 * first-match precedence, and a rewritten path is never matched again.
 *
 * @param part - Part declaration carrying the ordered rules.
 * @param outputTree - Files the part's build produced.
 * @throws {RuleError} On malformed patterns, paths leaving the root, two source files of the
 *   part landing on the same destination, or a staged file sitting where another needs a directory.
 */
export function resolvePartOutput(
  part: PartDeclaration,
  outputTree: OutputTree,
): ResolvedPartOutput {
  const rules = compilePartRules(part);
  const defaultPolicy = resolveStageDefault(part);
  const stageHits = new Set<number>();
  const organizeHits = new Set<number>();

  const sourcePaths = [...outputTree.keys()].sort(comparePaths);
  const staged: { readonly sourcePath: string; readonly segments: readonly string[] }[] = [];
  let excludedCount = 0;

  for (const rawPath of sourcePaths) {
    const sourcePath = normaliseRelativePath(rawPath);
    if (sourcePath === undefined) {
      throw new RuleError(
        `Part "${part.name}" produced "${rawPath}", which is outside its install root.`,
        { part: part.name, paths: [rawPath] },
      );
    }
    const segments = splitPath(sourcePath);
    const evaluation = rules.stage.evaluate(segments, 'last-match');
    for (const index of evaluation.matchedIndexes) {
      stageHits.add(index);
    }
    const decision = evaluation.selected?.rule.kind ?? defaultPolicy;
    if (decision === 'include') {
      staged.push({ sourcePath: rawPath, segments });
    } else {
      excludedCount += 1;
    }
  }

  const byDestination = new Map<string, StagedFile>();
  const ruleByDestination = new Map<string, RuleMatch<OrganizeRule>>();
  let organizedCount = 0;

  for (const { sourcePath, segments } of staged) {
    const evaluation = rules.organize.evaluate(segments, 'first-match');
    const match = evaluation.selected;
    for (const index of evaluation.matchedIndexes) {
      organizeHits.add(index);
    }

    const destination = match ? organizePath(part.name, segments, match) : segments.join('/');
    if (match) {
      organizedCount += 1;
    }

    const content = outputTree.get(sourcePath);
    if (content === undefined) {
      continue;
    }

    const existing = byDestination.get(destination);
    if (existing) {
      const ruleMatch = match ?? ruleByDestination.get(destination);
      throw new RuleError(
        `Part "${part.name}" stages both "${existing.sourcePath}" and "${sourcePath}" at "${destination}".`,
        {
          part: part.name,
          ...(ruleMatch ? { rule: organizeReference(ruleMatch) } : {}),
          paths: [existing.sourcePath, sourcePath, destination],
        },
      );
    }

    byDestination.set(
      destination,
      Object.freeze({ path: destination, content, part: part.name, sourcePath }),
    );
    if (match) {
      ruleByDestination.set(destination, match);
    }
  }

  const files = [...byDestination.values()].sort((left, right) =>
    comparePaths(left.path, right.path),
  );
  for (const file of files) {
    const shadowing = ancestorPaths(file.path)
      .map((ancestor) => byDestination.get(ancestor))
      .find((candidate) => candidate !== undefined);
    if (shadowing) {
      throw new RuleError(
        `Part "${part.name}" stages "${shadowing.sourcePath}" as the file "${shadowing.path}" and "${file.sourcePath}" beneath it at "${file.path}".`,
        {
          part: part.name,
          paths: [shadowing.sourcePath, file.sourcePath, shadowing.path, file.path],
        },
      );
    }
  }

  return Object.freeze({
    part: part.name,
    files: Object.freeze(files),
    excludedCount,
    organizedCount,
    unmatchedRules: Object.freeze([
      ...collectUnmatched('stage', rules.stage.rules, stageHits),
      ...collectUnmatched('organize', rules.organize.rules, organizeHits),
    ]),
  }) satisfies ResolvedPartOutput;
}

function organizePath(
  part: string,
  segments: readonly string[],
  match: RuleMatch<OrganizeRule>,
): string {
  const { destination } = match.rule;
  const matchedName = segments[match.matchedSegments - 1] ?? '';
  const remainder = segments.slice(match.matchedSegments);
  const base = destination.endsWith('/') ? posix.join(destination, matchedName) : destination;
  const candidate = posix.join(base, ...remainder);

  const normalised = normaliseRelativePath(destination.startsWith('/') ? destination : candidate);
  if (normalised === undefined) {
    throw new RuleError(
      `Organize rule "${match.rule.source}" of part "${part}" moves "${segments.join('/')}" outside the bundle root.`,
      { part, rule: organizeReference(match), paths: [segments.join('/'), candidate] },
    );
  }
  return normalised;
}

function organizeReference(match: RuleMatch<OrganizeRule>): RuleReference {
  return { type: 'organize', index: match.index, rule: match.rule };
}

function collectUnmatched<TRule>(
  type: UnmatchedRule['type'],
  rules: readonly CompiledRule<TRule>[],
  hits: ReadonlySet<number>,
): UnmatchedRule[] {
  return rules
    .filter((compiled) => !hits.has(compiled.index))
    .map((compiled) => ({ type, index: compiled.index, pattern: compiled.pattern.source }));
}

function invalidPattern(part: string, rule: RuleReference, error: unknown): RuleError {
  const reason = error instanceof Error ? error.message : String(error);
  return new RuleError(`Part "${part}" has an invalid ${rule.type} rule: ${reason}`, {
    part,
    rule,
    paths: [],
  });
}
