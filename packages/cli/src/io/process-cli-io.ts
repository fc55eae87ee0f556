import process from 'node:process';

import type { CliIo } from './cli-io.js';

export interface ProcessCliIoOptions {
  readonly process?: NodeJS.Process;
}

export const createProcessCliIo = (options: ProcessCliIoOptions = {}): CliIo => {
  const target = options.process ?? process;

  return {
    stdin: target.stdin,
    stdout: target.stdout,
    stderr: target.stderr,
    cwd: () => target.cwd(),
    writeOut: (chunk: string) => {
      target.stdout.write(chunk);
    },
    writeErr: (chunk: string) => {
      target.stderr.write(chunk);
    },
    exit: (code: number): never => {
      // A runner may already have recorded a failure on process.exitCode.
      const recorded = target.exitCode;
      const pending = typeof recorded === 'number' && recorded !== 0 ? recorded : undefined;
      return target.exit(code === 0 ? (pending ?? code) : code);
    },
  };
};
