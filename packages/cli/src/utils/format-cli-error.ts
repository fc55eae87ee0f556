import { inspect } from 'node:util';

export interface FormatCliErrorOptions {
  /** Prints the stack trace of `Error` instances instead of their name and message. */
  readonly includeStack?: boolean;
}

export const formatCliError = (error: unknown, options: FormatCliErrorOptions = {}): string => {
  if (error instanceof Error) {
    if (options.includeStack && error.stack) {
      return error.stack;
    }
    return error.name === 'Error' ? error.message : `${error.name}: ${error.message}`;
  }

  if (typeof error === 'string') {
    return error;
  }

  return inspect(error, { depth: 4, maxArrayLength: 10 });
};
