export type StageRuleKind = 'include' | 'exclude';

export type StageDefaultPolicy = 'include' | 'exclude';

export interface StageRule {
  readonly kind: StageRuleKind;
  readonly pattern: string;
}

export interface OrganizeRule {
  readonly source: string;
  readonly destination: string;
}

/**
 * A part as declared in the manifest, with its staging and organize rules in declaration order.
 */
export interface PartDeclaration {
  readonly name: string;
  readonly stage: readonly StageRule[];
  readonly organize: readonly OrganizeRule[];
  /** Policy applied to paths no stage rule matches; derived from the rules when omitted. */
  readonly stageDefault?: StageDefaultPolicy;
  /** Plugin, source, package and any other keys carried untouched. */
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface EnvironmentEntry {
  readonly name: string;
  readonly value: string;
}

export interface AppDeclaration {
  readonly name: string;
  readonly command: string;
  readonly args: readonly string[];
  readonly daemon?: string;
  readonly restartPolicy?: string;
  readonly environment: readonly EnvironmentEntry[];
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface AssemblyManifest {
  readonly name: string;
  readonly version?: string;
  readonly summary?: string;
  readonly parts: readonly PartDeclaration[];
  readonly apps: readonly AppDeclaration[];
}

type ScalarValue = string | number | boolean;

/**
 * Mapping whose declaration order matters. A `Map` keeps integer-like keys such as `2024` in
 * place, where a plain object would move them first.
 */
export type OrderedMapping<TValue> =
  | Readonly<Record<string, TValue>>
  | ReadonlyMap<string, TValue>;

/**
 * Authoring shape of a part in a manifest file.
 */
export interface PartDocument {
  readonly stage?: readonly string[];
  readonly 'stage-default'?: StageDefaultPolicy;
  readonly organize?: OrderedMapping<string>;
  readonly [key: string]: unknown;
}

/**
 * Authoring shape of an app in a manifest file.
 */
export interface AppDocument {
  readonly command: string;
  readonly daemon?: string;
  readonly 'restart-condition'?: string;
  readonly environment?: OrderedMapping<ScalarValue>;
  readonly [key: string]: unknown;
}

/**
 * Authoring shape of a whole manifest, as written in YAML, JSON or a JS module.
 */
export interface ManifestDocument {
  readonly name: string;
  readonly version?: ScalarValue;
  readonly summary?: string;
  readonly parts: OrderedMapping<PartDocument | null>;
  readonly apps?: OrderedMapping<AppDocument>;
  readonly [key: string]: unknown;
}

/**
 * Identity helper that types manifests written as JavaScript modules.
 *
 * @example
 * ```ts
 * export default defineManifest({
 *   name: 'installer',
 *   parts: { tools: { stage: ['bin/*'] } },
 * });
 * ```
 */
export function defineManifest<T extends ManifestDocument>(manifest: T): T {
  return manifest;
}
