import { Command } from 'commander';

import { DEFAULT_MANIFEST_FILES } from '@partkit/core/config';

import type { CliIo } from '../../io/cli-io.js';
import { registerGlobalOptions } from './global-options.js';

export interface PartkitProgramOptions {
  readonly name: string;
  readonly version: string;
  readonly description?: string | undefined;
  readonly io: CliIo;
}

const MANIFEST_DISCOVERY_HELP = [
  '',
  'Manifests are looked up in the working directory as:',
  ...DEFAULT_MANIFEST_FILES.map((file) => `  ${file}`),
  'Pass -c, --config <path> to a command to read another file.',
  '',
].join('\n');

/**
 * Creates the root `partkit` command. Help and errors go through `io`, commander reports exits as
 * `CommanderError`s instead of ending the process, and options given before a subcommand belong
 * to the program.
 */
export const createPartkitProgram = (options: PartkitProgramOptions): Command => {
  const program = new Command(options.name)
    .description(options.description ?? '')
    .version(options.version, '-V, --version', 'Print the partkit version.')
    .configureHelp({ sortOptions: true })
    .configureOutput({
      writeOut: (text: string) => options.io.writeOut(text),
      writeErr: (text: string) => options.io.writeErr(text),
    })
    .addHelpText('after', MANIFEST_DISCOVERY_HELP)
    .showHelpAfterError('(add --help for usage information)')
    .enablePositionalOptions()
    .exitOverride();

  registerGlobalOptions(program);
  return program;
};
