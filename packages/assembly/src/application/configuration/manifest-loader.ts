import {
  loadConfigModule,
  resolveConfigPath,
  type ResolveConfigPathOptions,
} from '@partkit/core/config';
import { z } from 'zod';

import type {
  AppDeclaration,
  AssemblyManifest,
  EnvironmentEntry,
  OrganizeRule,
  PartDeclaration,
  StageRule,
} from '../../config/index.js';
import { ManifestError, type ManifestIssue } from '../../domain/errors.js';

export type ResolveManifestPathOptions = ResolveConfigPathOptions;

/**
 * Result object returned when a manifest has been loaded and normalised from disk.
 */
export interface LoadedManifest {
  readonly path: string;
  readonly directory: string;
  readonly manifest: AssemblyManifest;
}

/**
 * Resolves the manifest path, either from an explicit path or by searching the working directory.
 */
export async function resolveManifestPath(
  options: ResolveManifestPathOptions = {},
): Promise<string> {
  return resolveConfigPath(options);
}

/**
 * Loads a manifest file, resolves asynchronous exports, and validates its structure.
 *
 * @param manifestPath - Path to the manifest, as given by the caller or found by
 *   {@link resolveManifestPath}.
 * @throws {ManifestError} When the manifest does not have the expected shape.
 */
export async function loadManifest(manifestPath: string): Promise<LoadedManifest> {
  const loaded = await loadConfigModule<unknown>({ path: manifestPath });
  return {
    path: loaded.path,
    directory: loaded.directory,
    manifest: parseManifest(loaded.config),
  };
}

/**
 * Validates a manifest document and normalises it into declarations: `-` prefixed stage entries
 * become exclusions, commands are split into a path and arguments, and environment values are
 * kept as strings in declaration order.
 *
 * @throws {ManifestError} Listing every structural issue with its key path.
 */
export function parseManifest(document: unknown): AssemblyManifest {
  const result = manifestSchema.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue): ManifestIssue => ({
        path: issue.path.length === 0 ? '(root)' : issue.path.join('.'),
        message: issue.message,
      }),
    );
    const summary = issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
    throw new ManifestError(`Invalid manifest: ${summary}`, issues);
  }
  return result.data;
}

const nonEmptyString = z
  .string()
  .refine((value) => value.trim().length > 0, { message: 'String must not be empty.' });

const scalarSchema = z.union([z.string(), z.number(), z.boolean()]);

/** Ordered key/value pairs of a mapping given as a `Map` or a plain object. */
function mappingEntries(value: unknown): readonly (readonly [unknown, unknown])[] | undefined {
  if (value instanceof Map) {
    return [...value.entries()];
  }
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return Object.entries(value);
  }
  return undefined;
}

function mappingKey(key: unknown): string | undefined {
  if (typeof key === 'number' || typeof key === 'boolean') {
    return String(key);
  }
  return typeof key === 'string' && key.trim().length > 0 ? key : undefined;
}

/** Object view of a mapping whose key order carries no meaning. */
function toRecord(value: unknown): unknown {
  const entries = value instanceof Map ? mappingEntries(value) : undefined;
  return entries ? Object.fromEntries(entries.map(([key, entry]) => [String(key), entry])) : value;
}

function toPlainValue(value: unknown): unknown {
  if (value instanceof Map) {
    return Object.fromEntries(
      [...value.entries()].map(([key, entry]) => [String(key), toPlainValue(entry)]),
    );
  }
  return Array.isArray(value) ? value.map((entry) => toPlainValue(entry)) : value;
}

/**
 * Validates a mapping whose declaration order matters and returns its pairs in that order. Issues
 * raised by the value schema keep the mapping key in their path.
 */
function orderedMapping<TOutput>(valueSchema: z.ZodType<TOutput, z.ZodTypeDef, unknown>) {
  return z.unknown().transform((input, context): readonly (readonly [string, TOutput])[] => {
    const entries = mappingEntries(input);
    if (entries === undefined) {
      context.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a mapping.' });
      return z.NEVER;
    }
    const pairs: (readonly [string, TOutput])[] = [];
    for (const [rawKey, rawValue] of entries) {
      const key = mappingKey(rawKey);
      if (key === undefined) {
        context.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'Mapping keys must be non-empty strings.',
          path: [String(rawKey)],
        });
        continue;
      }
      const result = valueSchema.safeParse(rawValue);
      if (!result.success) {
        for (const issue of result.error.issues) {
          context.addIssue({
            code: z.ZodIssueCode.custom,
            message: issue.message,
            path: [key, ...issue.path],
          });
        }
        continue;
      }
      pairs.push([key, result.data]);
    }
    return pairs;
  });
}

const stageEntrySchema = z.string().transform((entry): StageRule => {
  const trimmed = entry.trim();
  return trimmed.startsWith('-')
    ? { kind: 'exclude', pattern: trimmed.slice(1).trim() }
    : { kind: 'include', pattern: trimmed };
});

const partSchema = z.preprocess(
  toRecord,
  z
    .object({
      stage: z.array(stageEntrySchema).optional(),
      'stage-default': z.enum(['include', 'exclude']).optional(),
      organize: orderedMapping(nonEmptyString).optional(),
    })
    .passthrough(),
);

const environmentSchema = orderedMapping(
  scalarSchema.nullable().transform((value) => (value === null ? '' : String(value))),
);

const appSchema = z.preprocess(
  toRecord,
  z
    .object({
      command: nonEmptyString,
      daemon: nonEmptyString.optional(),
      'restart-condition': nonEmptyString.optional(),
      environment: environmentSchema.optional(),
    })
    .passthrough(),
);

const manifestSchema = z.preprocess(
  toRecord,
  z
    .object({
      name: nonEmptyString,
      version: scalarSchema.optional(),
      summary: z.string().optional(),
      parts: orderedMapping(partSchema.nullable()),
      apps: orderedMapping(appSchema).optional(),
    })
    .passthrough()
    .transform(
      (document): AssemblyManifest => ({
        name: document.name,
        ...(document.version === undefined ? {} : { version: String(document.version) }),
        ...(document.summary === undefined ? {} : { summary: document.summary }),
        parts: document.parts.map(([name, part]) => toPartDeclaration(name, part ?? {})),
        apps: (document.apps ?? []).map(([name, app]) => toAppDeclaration(name, app)),
      }),
    ),
);

type PartOutput = z.output<typeof partSchema>;
type AppOutput = z.output<typeof appSchema>;

function toPartDeclaration(name: string, part: Partial<PartOutput>): PartDeclaration {
  const { stage, 'stage-default': stageDefault, organize, ...metadata } = part;
  const organizeRules = (organize ?? []).map(
    ([source, destination]): OrganizeRule => ({ source, destination }),
  );
  return {
    name,
    stage: stage ?? [],
    organize: organizeRules,
    ...(stageDefault === undefined ? {} : { stageDefault }),
    metadata: toMetadata(metadata),
  };
}

function toAppDeclaration(name: string, app: AppOutput): AppDeclaration {
  const { command, daemon, 'restart-condition': restartPolicy, environment, ...metadata } = app;
  const [commandPath = '', ...args] = command.trim().split(/\s+/);
  const entries = (environment ?? []).map(
    ([variable, value]): EnvironmentEntry => ({ name: variable, value }),
  );
  return {
    name,
    command: commandPath,
    args,
    ...(daemon === undefined ? {} : { daemon }),
    ...(restartPolicy === undefined ? {} : { restartPolicy }),
    environment: entries,
    metadata: toMetadata(metadata),
  };
}

function toMetadata(fields: Readonly<Record<string, unknown>>): Readonly<Record<string, unknown>> {
  return Object.fromEntries(
    Object.entries(fields).map(([key, value]) => [key, toPlainValue(value)]),
  );
}
