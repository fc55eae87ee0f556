import process from 'node:process';

import { loadAssemblyModule } from './assembly-module.js';
import { prepareAssemblyEnvironment } from './environment.js';
import { resolveAssemblyCommandOptions, type ExecuteAssemblyCommandOptions } from './options.js';

/**
 * Loads the manifest and part outputs, assembles the bundle and reports the outcome. Failures are
 * reported through the selected reporter and recorded on `process.exitCode`.
 */
export const executeAssembleCommand = async ({
  command,
  io,
}: ExecuteAssemblyCommandOptions): Promise<void> => {
  const options = resolveAssemblyCommandOptions(command);
  const assembly = await loadAssemblyModule(io);
  if (!assembly) {
    process.exitCode = 1;
    return;
  }

  const environment = prepareAssemblyEnvironment(options, io, assembly);
  const { reporter } = environment;
  const span = environment.telemetry.tracer.startSpan('partkit.cli.assemble', {
    attributes: { reporter: reporter.format, conflicts: options.conflicts },
  });
  const telemetrySubscription = environment.eventBus.subscribe(
    assembly.createAssemblyStageTelemetrySubscriber({ getSpan: () => span }),
  );

  try {
    const loaded = await environment.loadManifest();
    const result = await environment.createRuntime().assemble(loaded.manifest, { span });
    span.end({
      attributes: {
        fileCount: result.tree.size,
        conflictCount: result.conflicts.length,
        appCount: result.apps.length,
      },
    });
    reporter.assembleSuccess(result);
  } catch (error) {
    span.end({ status: 'error' });
    reporter.failure('assemble', error);
    process.exitCode = 1;
  } finally {
    telemetrySubscription.unsubscribe();
    environment.dispose();
    await environment.telemetry.exportSpans();
  }
};
