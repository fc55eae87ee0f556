import path from 'node:path';

import type { AssemblyRuntime, LoadedManifest, Reporter } from '@partkit/assembly';
import {
  JsonLineLogger,
  noopLogger,
  withMinimumLevel,
  type StructuredLogger,
} from '@partkit/core/logging';
import { formatDurationMs } from '@partkit/core/reporting';
import { InMemoryDomainEventBus, type DomainEventSubscription } from '@partkit/core/runtime';
import { createTelemetryRuntime, type TelemetryRuntime } from '@partkit/core/telemetry';

import type { CliIo } from '../../io/cli-io.js';
import { isInteractiveStream } from '../../utils/streams.js';
import type { LoadedAssemblyModule } from './assembly-module.js';
import type { AssemblyCommandOptions } from './options.js';

export interface PreparedAssemblyEnvironment {
  readonly logger: StructuredLogger;
  readonly telemetry: TelemetryRuntime;
  readonly eventBus: InMemoryDomainEventBus;
  readonly reporter: Reporter;
  loadManifest(): Promise<LoadedManifest>;
  /** Runtime reading part outputs from `--parts-dir`, materializing to `--out-dir` when given. */
  createRuntime(): AssemblyRuntime;
  dispose(): void;
}

/**
 * Wires the logger, telemetry runtime, event bus and reporter a manifest command runs with.
 */
export const prepareAssemblyEnvironment = (
  options: AssemblyCommandOptions,
  io: CliIo,
  assembly: LoadedAssemblyModule,
): PreparedAssemblyEnvironment => {
  const logger = createLogger(options, io);
  const telemetry = createTelemetryRuntime(options.telemetry, {
    logger,
    output: { write: (line: string) => io.writeOut(line) },
  });
  const eventBus = new InMemoryDomainEventBus();
  const reporter = assembly.createReporter({
    format: options.reporter,
    logger,
    includeTimings: options.timings,
    stdout: { write: (line: string) => io.writeOut(line) },
    stderr: { write: (line: string) => io.writeErr(line) },
    cwd: io.cwd(),
  });

  const subscriptions: DomainEventSubscription[] = [
    eventBus.subscribe(assembly.createAssemblyStageLoggingSubscriber(logger)),
  ];

  let disposed = false;
  const dispose = () => {
    if (disposed) {
      return;
    }
    disposed = true;
    for (const subscription of subscriptions) {
      subscription.unsubscribe();
    }
  };

  const loadManifest = async (): Promise<LoadedManifest> => {
    const manifestPath = await assembly.resolveManifestPath({
      cwd: io.cwd(),
      ...(options.config === undefined ? {} : { configPath: options.config }),
    });
    return assembly.loadManifest(manifestPath);
  };

  const createRuntime = (): AssemblyRuntime => {
    const concurrency =
      options.concurrency === undefined ? {} : { concurrency: options.concurrency };
    return new assembly.AssemblyRuntime({
      repository: new assembly.FileSystemPartOutputRepository({
        partsDir: options.partsDir,
        cwd: () => io.cwd(),
      }),
      eventBus,
      logger,
      merge: { policy: options.conflicts, acknowledgedConflicts: options.allowConflicts },
      ...concurrency,
      ...(options.outDir === undefined
        ? {}
        : {
            materializer: new assembly.FileSystemTreeMaterializer({
              outDir: path.resolve(io.cwd(), options.outDir),
              ...concurrency,
            }),
          }),
    });
  };

  return {
    logger,
    telemetry,
    eventBus,
    reporter,
    loadManifest,
    createRuntime,
    dispose,
  } satisfies PreparedAssemblyEnvironment;
};

const createLogger = (options: AssemblyCommandOptions, io: CliIo): StructuredLogger => {
  const level = options.verbose ? 'debug' : 'info';

  if (options.jsonLogs) {
    return new JsonLineLogger({ write: (line: string) => io.writeOut(line) }, { level });
  }

  if (isInteractiveStream(io.stderr)) {
    return withMinimumLevel(
      {
        log(entry) {
          const elapsed =
            entry.elapsedMs === undefined ? '' : ` (${formatDurationMs(entry.elapsedMs)})`;
          const data = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
          io.writeErr(`[${entry.level}] ${entry.event}${elapsed}${data}\n`);
        },
      },
      level,
    );
  }

  return noopLogger;
};
