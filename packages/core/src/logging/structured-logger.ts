export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVEL_WEIGHT: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface StructuredLogEvent {
  readonly level: LogLevel;
  readonly name: string;
  readonly event: string;
  readonly elapsedMs?: number;
  readonly context?: Readonly<Record<string, unknown>>;
  readonly data?: Readonly<Record<string, unknown>>;
}

export interface StructuredLogger {
  log(entry: StructuredLogEvent): void;
}

export interface JsonLineLoggerOptions {
  /** Entries below this level are dropped. Defaults to `debug`. */
  readonly level?: LogLevel;
}

export class JsonLineLogger implements StructuredLogger {
  private readonly threshold: number;

  constructor(
    private readonly output: { write(line: string): void },
    options: JsonLineLoggerOptions = {},
  ) {
    this.threshold = LOG_LEVEL_WEIGHT[options.level ?? 'debug'];
  }

  log(entry: StructuredLogEvent): void {
    if (!isLevelEnabled(entry.level, this.threshold)) {
      return;
    }

    const payload = JSON.stringify({
      ...entry,
      timestamp: new Date().toISOString(),
    });
    this.output.write(`${payload}\n`);
  }
}

/**
 * Wraps a logger so that entries below the requested level never reach it.
 *
 * @param logger - Logger receiving the entries that pass the filter.
 * @param level - Lowest level forwarded to the wrapped logger.
 * @returns Logger applying the level filter.
 */
export function withMinimumLevel(logger: StructuredLogger, level: LogLevel): StructuredLogger {
  const threshold = LOG_LEVEL_WEIGHT[level];
  return {
    log(entry) {
      if (isLevelEnabled(entry.level, threshold)) {
        logger.log(entry);
      }
    },
  };
}

function isLevelEnabled(level: LogLevel, threshold: number): boolean {
  return LOG_LEVEL_WEIGHT[level] >= threshold;
}

export const noopLogger: StructuredLogger = {
  log() {
    // noop
  },
};
