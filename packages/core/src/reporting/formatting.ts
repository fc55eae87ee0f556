/**
 * Minimal interface describing a writable target suitable for reporter output streams.
 */
export interface WritableTarget {
  write(line: string): void;
}

const LINE_TERMINATOR = '\n';

/**
 * Escapes characters that carry special meaning in Markdown documents.
 *
 * @param value - Raw text requiring Markdown escaping.
 * @returns Escaped Markdown-safe string.
 */
export function escapeMarkdown(value: string): string {
  return value.replaceAll(/([\\`*_{}\[\]()#+.!|-])/g, String.raw`\$1`);
}

/**
 * Formats a millisecond duration with a single decimal place suffix.
 */
export function formatDurationMs(value: number): string {
  return `${value.toFixed(1)}ms`;
}

/**
 * Formats a count with a naively pluralised noun, e.g. `1 part` or `3 parts`.
 *
 * @param count - Number of items.
 * @param noun - Singular noun describing the items.
 * @returns Human readable count.
 */
export function formatCount(count: number, noun: string): string {
  return `${count.toString(10)} ${count === 1 ? noun : `${noun}s`}`;
}

/**
 * Converts arbitrary error inputs into a stable string description.
 */
export function formatUnknownError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

/**
 * Serialises an unknown error into a structured payload for logging.
 *
 * Errors exposing a `code` and a `details` record keep both fields so that reporters can surface
 * the failing part, app, or path.
 *
 * @param error - Error-like value to serialise.
 * @returns Structured error payload describing the value.
 */
export function serialiseError(error: unknown): {
  readonly name: string;
  readonly message: string;
  readonly code?: string;
  readonly details?: Readonly<Record<string, unknown>>;
  readonly stack?: string;
} {
  if (error instanceof Error) {
    const code = readStringProperty(error, 'code');
    const details = readRecordProperty(error, 'details');
    return {
      name: error.name,
      message: error.message,
      ...(code === undefined ? {} : { code }),
      ...(details === undefined ? {} : { details }),
      ...(error.stack ? { stack: error.stack } : {}),
    };
  }

  return {
    name: 'UnknownError',
    message: String(error),
  };
}

function readStringProperty(target: object, key: string): string | undefined {
  const value: unknown = Reflect.get(target, key);
  return typeof value === 'string' ? value : undefined;
}

function readRecordProperty(
  target: object,
  key: string,
): Readonly<Record<string, unknown>> | undefined {
  const value: unknown = Reflect.get(target, key);
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return undefined;
  }
  return Object.fromEntries(Object.entries(value));
}

/**
 * Writes a JSON payload to the provided target followed by a newline terminator.
 */
export function writeJson(target: WritableTarget, payload: unknown): void {
  target.write(`${JSON.stringify(payload)}${LINE_TERMINATOR}`);
}

/**
 * Writes a plain-text line to the provided target followed by a newline terminator.
 */
export function writeLine(target: WritableTarget, line: string): void {
  target.write(`${line}${LINE_TERMINATOR}`);
}
