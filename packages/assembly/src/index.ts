import { createPlaceholderManifest, type PackageManifest } from '@partkit/core';

export * from './config/index.js';
export * from './domain/errors.js';
export * from './domain/model/index.js';
export * from './domain/rules/index.js';
export * from './domain/services/index.js';
export type * from './domain/ports/index.js';
export {
  loadManifest,
  parseManifest,
  resolveManifestPath,
  type LoadedManifest,
  type ResolveManifestPathOptions,
} from './application/configuration/manifest-loader.js';
export {
  AssemblyRuntime,
  type AssembleOptions,
  type AssemblyResult,
  type AssemblyRuntimeOptions,
  type AssemblyTimings,
  type PartResolution,
} from './application/assembly-runtime.js';
export {
  validateManifest,
  type ManifestValidationSummary,
} from './application/manifest-validation.js';
export * from './infrastructure/repositories/index.js';
export * from './infrastructure/materialization/index.js';
export { createAssemblyStageLoggingSubscriber } from './logging/index.js';
export { createAssemblyStageTelemetrySubscriber } from './telemetry/index.js';
export {
  createReporter,
  type Reporter,
  type ReporterFormat,
  type ReportedOperation,
  type ValidateReportContext,
} from './cli/reporters.js';

const manifestDefinition = {
  name: '@partkit/assembly',
  summary:
    'Manifest resolution and file-assembly engine that stages, organizes, merges, and links part outputs.',
} as const satisfies PackageManifest;

export const manifest = createPlaceholderManifest(manifestDefinition);

export const describe = (): PackageManifest => ({ ...manifest });
