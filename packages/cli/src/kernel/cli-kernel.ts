import process from 'node:process';

import { CommanderError } from 'commander';

import { createPartkitProgram } from '../framework/commander/program.js';
import {
  createDefaultGlobalOptions,
  readGlobalOptions,
} from '../framework/commander/global-options.js';
import { createProcessCliIo } from '../io/process-cli-io.js';
import { formatCliError } from '../utils/format-cli-error.js';
import type {
  CliCommandModule,
  CliGlobalOptions,
  CliKernel,
  CliKernelContext,
  CliKernelOptions,
} from './types.js';

/**
 * Runners record a failed assembly on `process.exitCode`, which wins over the code the run would
 * otherwise end with.
 */
const resolveExitCode = (fallback: number): number => {
  const { exitCode } = process;
  return typeof exitCode === 'number' && exitCode !== 0 ? exitCode : fallback;
};

/**
 * Builds the `partkit` kernel. Command modules attach their commands to one commander program,
 * and `run` turns every outcome (success, commander usage errors, failed runners and unexpected
 * exceptions) into an exit code without ending the process.
 */
export const createCliKernel = (options: CliKernelOptions): CliKernel => {
  const io = options.io ?? createProcessCliIo();
  const program = createPartkitProgram({
    name: options.programName,
    version: options.version,
    description: options.description,
    io,
  });
  const moduleIds = new Set<string>();
  let globalOptions: CliGlobalOptions = createDefaultGlobalOptions();

  const context: CliKernelContext = {
    io,
    getGlobalOptions: () => globalOptions,
  };

  program.hook('preAction', (_program, actionCommand) => {
    globalOptions = readGlobalOptions(program, actionCommand);
  });

  const reportUnexpectedError = (error: unknown): void => {
    const message = formatCliError(error, { includeStack: globalOptions.verbose });
    io.writeErr(message.endsWith('\n') ? message : `${message}\n`);
  };

  const kernel: CliKernel = {
    register(module: CliCommandModule): CliKernel {
      if (moduleIds.has(module.id)) {
        throw new Error(`Command module "${module.id}" is already registered.`);
      }
      moduleIds.add(module.id);
      module.register(program, context);
      return kernel;
    },
    async run(argv: readonly string[] = process.argv): Promise<number> {
      const previousExitCode = process.exitCode;
      globalOptions = createDefaultGlobalOptions();

      try {
        await program.parseAsync([...argv], { from: 'node' });
        return resolveExitCode(0);
      } catch (error) {
        if (error instanceof CommanderError) {
          return resolveExitCode(error.exitCode);
        }
        reportUnexpectedError(error);
        return resolveExitCode(1);
      } finally {
        process.exitCode = previousExitCode;
      }
    },
  };

  return kernel;
};
