import type { Command } from 'commander';

import type { CliCommandModule } from '../../kernel/types.js';
import { executeAssembleCommand } from './assemble-command-runner.js';
import { executeInspectCommand } from './inspect-command-runner.js';
import {
  registerAssembleOptions,
  registerInspectOptions,
  registerManifestOptions,
  registerPartOutputOptions,
} from './options.js';
import { executeValidateCommand } from './validate-command-runner.js';

export const assembleCommandModule: CliCommandModule = {
  id: 'assembly.workflows',
  register(program, context) {
    const assembleCommand = program
      .command('assemble')
      .summary('Assemble part outputs into a bundle.')
      .description(
        'Stage and organize each part output, merge them in declaration order and link the apps.',
      );

    registerManifestOptions(assembleCommand);
    registerPartOutputOptions(assembleCommand);
    registerAssembleOptions(assembleCommand);
    assembleCommand.action(async (_options: unknown, command: Command) => {
      await executeAssembleCommand({ command, io: context.io });
    });

    const validateCommand = program
      .command('validate')
      .summary('Validate a manifest without part outputs.')
      .description('Check rule patterns, daemon restart policies and environment ordering.');

    registerManifestOptions(validateCommand);
    validateCommand.action(async (_options: unknown, command: Command) => {
      await executeValidateCommand({ command, io: context.io });
    });

    const inspectCommand = program
      .command('inspect')
      .summary('Show the files each part stages.')
      .description('Resolve part outputs through their stage and organize rules without merging.');

    registerManifestOptions(inspectCommand);
    registerPartOutputOptions(inspectCommand);
    registerInspectOptions(inspectCommand);
    inspectCommand.action(async (_options: unknown, command: Command) => {
      await executeInspectCommand({ command, io: context.io });
    });
  },
};
