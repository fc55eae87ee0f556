import process from 'node:process';

import { loadAssemblyModule } from './assembly-module.js';
import { prepareAssemblyEnvironment } from './environment.js';
import { resolveAssemblyCommandOptions, type ExecuteAssemblyCommandOptions } from './options.js';

export const executeValidateCommand = async ({
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
  const span = environment.telemetry.tracer.startSpan('partkit.cli.validate', {
    attributes: { reporter: reporter.format },
  });

  try {
    const loaded = await environment.loadManifest();
    const summary = assembly.validateManifest(loaded.manifest);
    span.end({ attributes: { ...summary } });
    reporter.validateSuccess({ manifestPath: loaded.path, manifest: loaded.manifest, summary });
  } catch (error) {
    span.end({ status: 'error' });
    reporter.failure('validate', error);
    process.exitCode = 1;
  } finally {
    environment.dispose();
    await environment.telemetry.exportSpans();
  }
};
