import { InvalidOptionArgumentError, Option, type Command } from 'commander';

import type { ConflictPolicy, ReporterFormat } from '@partkit/assembly';
import type { TelemetryMode } from '@partkit/core/telemetry';

import type { CliIo } from '../../io/cli-io.js';

export interface AssemblyCommandOptions {
  readonly config?: string;
  readonly partsDir: string;
  readonly reporter: ReporterFormat;
  readonly telemetry: TelemetryMode;
  readonly jsonLogs: boolean;
  readonly verbose: boolean;
  readonly timings: boolean;
  readonly concurrency?: number;
  readonly outDir?: string;
  readonly conflicts: ConflictPolicy;
  readonly allowConflicts: readonly string[];
  readonly parts: readonly string[];
}

const DEFAULT_PARTS_DIRECTORY = 'parts';

/**
 * Options shared by every manifest command: manifest location, output format and logging.
 */
export const registerManifestOptions = (command: Command): void => {
  const reporterOption = new Option('--reporter <format>', 'Output reporter format')
    .choices(['human', 'json', 'markdown'])
    .default('human');

  const telemetryOption = new Option('--telemetry <mode>', 'Telemetry exporter to use')
    .choices(['none', 'stdout'])
    .default('none');

  command
    .option('-c, --config <path>', 'Path to the partkit manifest')
    .option('--json-logs', 'Emit NDJSON structured logs')
    .option('--verbose', 'Include debug-level log entries')
    .addOption(reporterOption)
    .addOption(telemetryOption);
};

/**
 * Options for commands that read part outputs from disk.
 */
export const registerPartOutputOptions = (command: Command): void => {
  command
    .option(
      '--parts-dir <path>',
      'Directory holding one <part>/install output tree per part',
      DEFAULT_PARTS_DIRECTORY,
    )
    .option(
      '--concurrency <count>',
      'Parts loaded and resolved at the same time',
      parseConcurrency,
    );
};

export const registerAssembleOptions = (command: Command): void => {
  const conflictsOption = new Option(
    '--conflicts <policy>',
    'How cross-part path conflicts are handled',
  )
    .choices(['last-writer-wins', 'strict'])
    .default('last-writer-wins');

  command
    .option('--out-dir <path>', 'Write the assembled bundle to this directory')
    .option('--allow-conflict <path...>', 'Paths that may be provided by more than one part')
    .option('--timings', 'Print stage timing breakdowns', false)
    .addOption(conflictsOption);
};

export const registerInspectOptions = (command: Command): void => {
  command.option('--part <name...>', 'Only inspect the named parts');
};

const parseConcurrency = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidOptionArgumentError(
      `Invalid concurrency "${value}". Expected a positive integer.`,
    );
  }
  return parsed;
};

const isReporterFormat = (value: unknown): value is ReporterFormat =>
  value === 'human' || value === 'json' || value === 'markdown';

const isTelemetryMode = (value: unknown): value is TelemetryMode =>
  value === 'none' || value === 'stdout';

const isConflictPolicy = (value: unknown): value is ConflictPolicy =>
  value === 'last-writer-wins' || value === 'strict';

const readStrings = (value: unknown): readonly string[] =>
  Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];

/**
 * Reads the options of a manifest command, falling back to the program's global flags.
 */
export const resolveAssemblyCommandOptions = (command: Command): AssemblyCommandOptions => {
  const localOptions = command.opts<Record<string, unknown>>();
  const parentOptions = command.parent?.optsWithGlobals<Record<string, unknown>>() ?? {};
  const readOption = (key: string): unknown => localOptions[key] ?? parentOptions[key];
  const readFlag = (key: string): boolean =>
    localOptions[key] === true || parentOptions[key] === true;

  const config = readOption('config');
  const partsDir = readOption('partsDir');
  const reporter = readOption('reporter');
  const telemetry = readOption('telemetry');
  const concurrency = readOption('concurrency');
  const outDir = readOption('outDir');
  const conflicts = readOption('conflicts');

  return {
    partsDir: typeof partsDir === 'string' ? partsDir : DEFAULT_PARTS_DIRECTORY,
    reporter: isReporterFormat(reporter) ? reporter : 'human',
    telemetry: isTelemetryMode(telemetry) ? telemetry : 'none',
    jsonLogs: readFlag('jsonLogs'),
    verbose: readFlag('verbose'),
    timings: readFlag('timings'),
    conflicts: isConflictPolicy(conflicts) ? conflicts : 'last-writer-wins',
    allowConflicts: readStrings(readOption('allowConflict')),
    parts: readStrings(readOption('part')),
    ...(typeof config === 'string' ? { config } : {}),
    ...(typeof concurrency === 'number' ? { concurrency } : {}),
    ...(typeof outDir === 'string' ? { outDir } : {}),
  } satisfies AssemblyCommandOptions;
};

export interface ExecuteAssemblyCommandOptions {
  readonly command: Command;
  readonly io: CliIo;
}
