export type PackageName = `@partkit/${string}`;

export interface PackageManifest {
  readonly name: PackageName;
  readonly summary: string;
}

export type FrozenManifest<T extends PackageManifest = PackageManifest> = Readonly<T>;

export const createPlaceholderManifest = <T extends PackageManifest>(
  manifest: T,
): FrozenManifest<T> => Object.freeze({ ...manifest });

export {
  JsonLineLogger,
  noopLogger,
  withMinimumLevel,
  type JsonLineLoggerOptions,
  type LogLevel,
  type StructuredLogEvent,
  type StructuredLogger,
} from './logging/index.js';

export {
  detectParallelism,
  normaliseConcurrency,
  runTaskQueue,
  type TaskDefinition,
  type TaskQueueMetrics,
  type TaskQueueOptions,
  type TaskQueueOutcome,
  type TaskResult,
} from './concurrency/index.js';

export {
  escapeMarkdown,
  formatCount,
  formatDurationMs,
  formatUnknownError,
  serialiseError,
  writeJson,
  writeLine,
  type WritableTarget,
} from './reporting/index.js';

export {
  createTelemetryRuntime,
  createTelemetryTracer,
  JsonLineSpanExporter,
  noopTelemetryTracer,
} from './telemetry/index.js';
export type {
  TelemetryAttributeValue,
  TelemetryAttributes,
  TelemetryMode,
  TelemetryRuntime,
  TelemetryRuntimeOptions,
  TelemetrySpan,
  TelemetrySpanEndOptions,
  TelemetrySpanOptions,
  TelemetrySpanStatus,
  TelemetryTracer,
  TelemetryTracerOptions,
} from './telemetry/index.js';

export * from './runtime/index.js';

export {
  DEFAULT_MANIFEST_FILES,
  loadConfigModule,
  resolveConfigPath,
  type LoadConfigModuleOptions,
  type LoadedConfigModule,
  type ResolveConfigPathOptions,
} from './config/index.js';

const manifestDefinition = {
  name: '@partkit/core',
  summary:
    'Shared logging, configuration, concurrency, and lifecycle utilities for partkit assembly tooling.',
} as const satisfies PackageManifest;

export const manifest = createPlaceholderManifest(manifestDefinition);

export const describe = (): PackageManifest => ({ ...manifest });
