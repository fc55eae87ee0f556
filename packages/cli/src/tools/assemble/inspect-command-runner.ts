import process from 'node:process';

import { loadAssemblyModule } from './assembly-module.js';
import { prepareAssemblyEnvironment } from './environment.js';
import { resolveAssemblyCommandOptions, type ExecuteAssemblyCommandOptions } from './options.js';

export const executeInspectCommand = async ({
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
  const span = environment.telemetry.tracer.startSpan('partkit.cli.inspect', {
    attributes: { reporter: reporter.format, parts: [...options.parts] },
  });

  try {
    const loaded = await environment.loadManifest();
    const parts = await environment.createRuntime().inspect(loaded.manifest, options.parts);
    span.end({ attributes: { partCount: parts.length } });
    reporter.inspectSuccess(parts);
  } catch (error) {
    span.end({ status: 'error' });
    reporter.failure('inspect', error);
    process.exitCode = 1;
  } finally {
    environment.dispose();
    await environment.telemetry.exportSpans();
  }
};
