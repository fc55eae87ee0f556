import process from 'node:process';

import { createCliKernel } from '../../kernel/cli-kernel.js';
import type { CliKernel } from '../../kernel/types.js';
import type { CliIo } from '../../io/cli-io.js';
import { assembleCommandModule } from './assemble-command-module.js';

export interface CreateAssembleCliKernelOptions {
  readonly programName: string;
  readonly version: string;
  readonly description?: string | undefined;
  readonly io?: CliIo | undefined;
}

export const createAssembleCliKernel = (options: CreateAssembleCliKernelOptions): CliKernel => {
  const kernel = createCliKernel(options);
  kernel.register(assembleCommandModule);
  return kernel;
};

export interface RunAssembleCliOptions extends CreateAssembleCliKernelOptions {
  readonly argv?: readonly string[] | undefined;
}

export const runAssembleCli = async ({
  argv = process.argv,
  programName,
  version,
  description,
  io,
}: RunAssembleCliOptions): Promise<number> => {
  const kernel = createAssembleCliKernel({ programName, version, description, io });
  return kernel.run(argv);
};
