import type { Command } from 'commander';

import type { CliGlobalOptions } from '../../kernel/types.js';

const JSON_LOGS_HELP = 'Emit machine-readable JSON logs.';
const VERBOSE_HELP = 'Include debug-level log entries.';

export const defaultGlobalOptions: CliGlobalOptions = Object.freeze({
  logFormat: 'pretty',
  verbose: false,
} as const);

export const createDefaultGlobalOptions = (): CliGlobalOptions => ({
  logFormat: defaultGlobalOptions.logFormat,
  verbose: defaultGlobalOptions.verbose,
});

export const registerGlobalOptions = (program: Command): void => {
  program
    .option('--json-logs', JSON_LOGS_HELP, false)
    .option('--verbose', VERBOSE_HELP, false);
};

/**
 * Reads `--json-logs` and `--verbose`, which count whether they precede the subcommand or are
 * repeated after it.
 */
export const readGlobalOptions = (
  program: Command,
  actionCommand: Command = program,
): CliGlobalOptions => {
  const programOptions = program.opts<Record<string, unknown>>();
  const commandOptions = actionCommand.opts<Record<string, unknown>>();
  const isSet = (name: string): boolean =>
    programOptions[name] === true || commandOptions[name] === true;

  return {
    logFormat: isSet('jsonLogs') ? 'json' : 'pretty',
    verbose: isSet('verbose'),
  };
};
