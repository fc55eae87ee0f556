import type { OrganizeRule, StageRule } from '../config/index.js';

export type AssemblyErrorCode =
  | 'rule-error'
  | 'conflict-error'
  | 'missing-command'
  | 'environment-order'
  | 'daemon-policy'
  | 'manifest-error'
  | 'part-output-not-found';

/**
 * Base class of every failure raised while assembling a manifest. The `code` is stable and the
 * `details` record names the part, app or path involved so reporters and logs can surface it.
 */
export abstract class AssemblyError extends Error {
  abstract readonly code: AssemblyErrorCode;
  abstract readonly details: Readonly<Record<string, unknown>>;
}

export type RuleReference =
  | { readonly type: 'stage'; readonly index: number; readonly rule: StageRule }
  | { readonly type: 'organize'; readonly index: number; readonly rule: OrganizeRule };

export class RuleError extends AssemblyError {
  readonly code = 'rule-error';
  readonly part: string;
  readonly rule: RuleReference | undefined;
  readonly paths: readonly string[];

  constructor(
    message: string,
    options: {
      readonly part: string;
      readonly rule?: RuleReference;
      readonly paths?: readonly string[];
    },
  ) {
    super(message);
    this.name = 'RuleError';
    this.part = options.part;
    this.rule = options.rule;
    this.paths = Object.freeze([...(options.paths ?? [])]);
  }

  get details(): Readonly<Record<string, unknown>> {
    return {
      part: this.part,
      ...(this.rule === undefined ? {} : { rule: describeRule(this.rule) }),
      paths: this.paths,
    };
  }
}

export class ConflictError extends AssemblyError {
  readonly code = 'conflict-error';

  /** Path the winning part stages, when it differs from `path`. */
  readonly clashingPath: string | undefined;

  constructor(
    readonly path: string,
    readonly parts: readonly [loser: string, winner: string],
    winnerPath: string = path,
  ) {
    super(
      winnerPath === path
        ? `Path "${path}" is staged by both "${parts[0]}" and "${parts[1]}".`
        : `Path "${path}" of "${parts[0]}" clashes with "${winnerPath}" of "${parts[1]}": ` +
            'a path cannot be both a file and a directory.',
    );
    this.name = 'ConflictError';
    this.clashingPath = winnerPath === path ? undefined : winnerPath;
  }

  get details(): Readonly<Record<string, unknown>> {
    return {
      path: this.path,
      parts: [...this.parts],
      ...(this.clashingPath === undefined ? {} : { clashingPath: this.clashingPath }),
    };
  }
}

export class MissingCommandError extends AssemblyError {
  readonly code = 'missing-command';

  constructor(
    readonly app: string,
    readonly command: string,
  ) {
    super(`App "${app}" runs "${command}", which is not present in the assembled tree.`);
    this.name = 'MissingCommandError';
  }

  get details(): Readonly<Record<string, unknown>> {
    return { app: this.app, command: this.command };
  }
}

export type EnvironmentOrderReason = 'duplicate-variable' | 'overwritten-before-save';

export interface EnvironmentOrderErrorOptions {
  readonly app: string;
  readonly reason: EnvironmentOrderReason;
  readonly variable: string;
  readonly position: number;
  readonly savedAs?: string;
  readonly savePosition?: number;
}

export class EnvironmentOrderError extends AssemblyError {
  readonly code = 'environment-order';
  readonly app: string;
  readonly reason: EnvironmentOrderReason;
  readonly variable: string;
  readonly position: number;
  readonly savedAs: string | undefined;
  readonly savePosition: number | undefined;

  constructor(options: EnvironmentOrderErrorOptions) {
    super(describeEnvironmentOrder(options));
    this.name = 'EnvironmentOrderError';
    this.app = options.app;
    this.reason = options.reason;
    this.variable = options.variable;
    this.position = options.position;
    this.savedAs = options.savedAs;
    this.savePosition = options.savePosition;
  }

  get details(): Readonly<Record<string, unknown>> {
    return {
      app: this.app,
      reason: this.reason,
      variable: this.variable,
      position: this.position,
      ...(this.savedAs === undefined ? {} : { savedAs: this.savedAs }),
      ...(this.savePosition === undefined ? {} : { savePosition: this.savePosition }),
    };
  }
}

export class DaemonPolicyError extends AssemblyError {
  readonly code = 'daemon-policy';

  constructor(
    readonly app: string,
    readonly daemonType: string,
  ) {
    super(`Daemon app "${app}" (${daemonType}) does not declare a restart policy.`);
    this.name = 'DaemonPolicyError';
  }

  get details(): Readonly<Record<string, unknown>> {
    return { app: this.app, daemonType: this.daemonType };
  }
}

export interface ManifestIssue {
  readonly path: string;
  readonly message: string;
}

export class ManifestError extends AssemblyError {
  readonly code = 'manifest-error';
  readonly issues: readonly ManifestIssue[];

  constructor(message: string, issues: readonly ManifestIssue[] = []) {
    super(message);
    this.name = 'ManifestError';
    this.issues = Object.freeze([...issues]);
  }

  get details(): Readonly<Record<string, unknown>> {
    return { issues: this.issues.map((issue) => ({ ...issue })) };
  }
}

export class PartOutputNotFoundError extends AssemblyError {
  readonly code = 'part-output-not-found';

  constructor(
    readonly part: string,
    readonly location: string,
  ) {
    super(`No build output found for part "${part}" at ${location}.`);
    this.name = 'PartOutputNotFoundError';
  }

  get details(): Readonly<Record<string, unknown>> {
    return { part: this.part, location: this.location };
  }
}

export function isAssemblyError(error: unknown): error is AssemblyError {
  return error instanceof AssemblyError;
}

function describeRule(reference: RuleReference): Readonly<Record<string, unknown>> {
  if (reference.type === 'stage') {
    return {
      type: 'stage',
      index: reference.index,
      pattern: reference.rule.pattern,
      kind: reference.rule.kind,
    };
  }
  return {
    type: 'organize',
    index: reference.index,
    source: reference.rule.source,
    destination: reference.rule.destination,
  };
}

function describeEnvironmentOrder(options: EnvironmentOrderErrorOptions): string {
  if (options.reason === 'duplicate-variable') {
    return `App "${options.app}" declares environment variable "${options.variable}" more than once (position ${options.position.toString(10)}).`;
  }
  const savedAs = options.savedAs ?? `${options.variable}_ORIG`;
  const savePosition = options.savePosition ?? options.position;
  return `App "${options.app}" overwrites "${options.variable}" at position ${options.position.toString(10)} before saving it as "${savedAs}" at position ${savePosition.toString(10)}.`;
}
