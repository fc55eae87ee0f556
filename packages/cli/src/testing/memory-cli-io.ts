import { PassThrough } from 'node:stream';

import type { CliIo } from '../io/cli-io.js';

export interface MemoryCliIoOptions {
  readonly cwd?: string;
  /** Marks stderr as a terminal so interactive log output is enabled. */
  readonly interactive?: boolean;
}

export interface MemoryCliIo extends CliIo {
  readonly stdoutBuffer: string;
  readonly stderrBuffer: string;
  /** Non-empty stdout lines, in write order. */
  readonly stdoutLines: readonly string[];
  readonly exitCodes: readonly number[];
}

export const createMemoryCliIo = (options: MemoryCliIoOptions = {}): MemoryCliIo => {
  const stdout = new PassThrough();
  const stderr = options.interactive
    ? Object.assign(new PassThrough(), { isTTY: true })
    : new PassThrough();
  const stdin = new PassThrough();
  const stdoutChunks: string[] = [];
  const stderrChunks: string[] = [];
  const recordedExitCodes: number[] = [];
  const workingDirectory = options.cwd ?? process.cwd();

  return {
    stdin,
    stdout,
    stderr,
    cwd: () => workingDirectory,
    writeOut: (chunk: string) => {
      stdoutChunks.push(chunk);
      stdout.write(chunk);
    },
    writeErr: (chunk: string) => {
      stderrChunks.push(chunk);
      stderr.write(chunk);
    },
    exit: (code: number): never => {
      recordedExitCodes.push(code);
      throw new Error(`process exit called with code ${code}`);
    },
    get stdoutBuffer(): string {
      return stdoutChunks.join('');
    },
    get stderrBuffer(): string {
      return stderrChunks.join('');
    },
    get stdoutLines(): readonly string[] {
      return stdoutChunks
        .join('')
        .split('\n')
        .filter((line) => line.length > 0);
    },
    get exitCodes(): readonly number[] {
      return recordedExitCodes;
    },
  };
};
