import { createPlaceholderManifest, type PackageManifest } from '@partkit/core';

export { createCliKernel } from './kernel/cli-kernel.js';
export type {
  CliCommandModule,
  CliKernel,
  CliKernelContext,
  CliKernelOptions,
  CliGlobalOptions,
  CliLogFormat,
} from './kernel/types.js';
export { createProcessCliIo } from './io/process-cli-io.js';
export type { CliIo } from './io/cli-io.js';
export { assembleCommandModule } from './tools/assemble/assemble-command-module.js';
export { createAssembleCliKernel, runAssembleCli } from './tools/assemble/run-assemble-cli.js';
export type { AssemblyCommandOptions } from './tools/assemble/options.js';

const manifestDefinition = {
  name: '@partkit/cli',
  summary: 'Command-line interface for assembling, validating, and inspecting partkit manifests.',
} as const satisfies PackageManifest;

export const manifest = createPlaceholderManifest(manifestDefinition);

export const describe = (): PackageManifest => ({ ...manifest });
