import { Command } from 'commander';
import { describe, expect, it } from 'vitest';

import {
  registerAssembleOptions,
  registerInspectOptions,
  registerManifestOptions,
  registerPartOutputOptions,
  resolveAssemblyCommandOptions,
  type AssemblyCommandOptions,
} from './options.js';

const parseCommand = (args: readonly string[]): AssemblyCommandOptions => {
  let resolved: AssemblyCommandOptions | undefined;
  const program = new Command('partkit')
    .exitOverride()
    .enablePositionalOptions()
    .configureOutput({ writeErr: () => undefined, outputError: () => undefined });
  program.option('--json-logs').option('--verbose');

  const assemble = program.command('assemble').exitOverride();
  registerManifestOptions(assemble);
  registerPartOutputOptions(assemble);
  registerAssembleOptions(assemble);
  registerInspectOptions(assemble);
  assemble.action((_options: unknown, command: Command) => {
    resolved = resolveAssemblyCommandOptions(command);
  });

  program.parse(['node', 'partkit', ...args]);
  if (!resolved) {
    throw new Error('assemble action did not run');
  }
  return resolved;
};

describe('resolveAssemblyCommandOptions', () => {
  it('applies defaults', () => {
    expect(parseCommand(['assemble'])).toEqual({
      partsDir: 'parts',
      reporter: 'human',
      telemetry: 'none',
      jsonLogs: false,
      verbose: false,
      timings: false,
      conflicts: 'last-writer-wins',
      allowConflicts: [],
      parts: [],
    });
  });

  it('reads every command option', () => {
    expect(
      parseCommand([
        'assemble',
        '-c',
        'config/partkit.yaml',
        '--parts-dir',
        'build/parts',
        '--out-dir',
        'prime',
        '--reporter',
        'markdown',
        '--telemetry',
        'stdout',
        '--conflicts',
        'strict',
        '--allow-conflict',
        'usr/bin/python3',
        'lib/libz.so',
        '--concurrency',
        '3',
        '--timings',
        '--part',
        'curtin',
      ]),
    ).toEqual({
      config: 'config/partkit.yaml',
      partsDir: 'build/parts',
      outDir: 'prime',
      reporter: 'markdown',
      telemetry: 'stdout',
      jsonLogs: false,
      verbose: false,
      timings: true,
      conflicts: 'strict',
      allowConflicts: ['usr/bin/python3', 'lib/libz.so'],
      concurrency: 3,
      parts: ['curtin'],
    });
  });

  it('inherits logging flags given before the command name', () => {
    const options = parseCommand(['--json-logs', '--verbose', 'assemble']);

    expect(options.jsonLogs).toBe(true);
    expect(options.verbose).toBe(true);
  });

  it('rejects unknown reporter formats', () => {
    expect(() => parseCommand(['assemble', '--reporter', 'html'])).toThrow(
      /argument 'html' is invalid/,
    );
  });

  it('rejects fractional concurrency', () => {
    expect(() => parseCommand(['assemble', '--concurrency', '1.5'])).toThrow(
      'Invalid concurrency "1.5". Expected a positive integer.',
    );
  });
});
