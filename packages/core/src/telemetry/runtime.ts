import { ExportResultCode, hrTimeToMilliseconds, type ExportResult } from '@opentelemetry/core';
import {
  BasicTracerProvider,
  SimpleSpanProcessor,
  type ReadableSpan,
  type SpanExporter,
} from '@opentelemetry/sdk-trace-base';

import { noopLogger, type StructuredLogger } from '../logging/structured-logger.js';
import type { WritableTarget } from '../reporting/formatting.js';
import { createTelemetryTracer, noopTelemetryTracer, type TelemetryTracer } from './tracer.js';

/**
 * Modes supported by the telemetry runtime, describing how collected spans are exported.
 */
export type TelemetryMode = 'none' | 'stdout';

export interface TelemetryRuntime {
  readonly tracer: TelemetryTracer;
  exportSpans(): Promise<void>;
}

export interface TelemetryRuntimeOptions {
  readonly logger?: StructuredLogger;
  /** Exporter replacing the JSON line exporter in `stdout` mode. */
  readonly traceExporter?: SpanExporter;
  /** Destination of the JSON line exporter. Defaults to `process.stdout`. */
  readonly output?: WritableTarget;
}

const RUNTIME_INSTRUMENTATION = { name: 'partkit.runtime' } as const;

/**
 * Creates a telemetry runtime that records spans and exports them according to the mode.
 *
 * @param mode - `none` discards spans; `stdout` writes one JSON object per finished span.
 * @param options - Logger for export failures and exporter overrides.
 * @returns Runtime exposing the tracer and an export hook.
 */
export function createTelemetryRuntime(
  mode: TelemetryMode,
  options: TelemetryRuntimeOptions = {},
): TelemetryRuntime {
  if (mode === 'none') {
    return {
      tracer: noopTelemetryTracer,
      async exportSpans() {
        // noop
      },
    } satisfies TelemetryRuntime;
  }

  if (mode !== 'stdout') {
    throw new Error(`Unsupported telemetry mode "${String(mode)}".`);
  }

  const logger = options.logger ?? noopLogger;
  const exporter =
    options.traceExporter ?? new JsonLineSpanExporter(options.output ?? process.stdout);
  const provider = new BasicTracerProvider({
    spanProcessors: [new SimpleSpanProcessor(exporter)],
  });
  const tracer = createTelemetryTracer({
    instrumentation: RUNTIME_INSTRUMENTATION,
    tracer: provider.getTracer(RUNTIME_INSTRUMENTATION.name),
  });

  return {
    tracer,
    async exportSpans() {
      try {
        await provider.forceFlush();
      } catch (error) {
        logger.log({
          level: 'error',
          name: 'telemetry',
          event: 'telemetry.export_failed',
          data: { message: error instanceof Error ? error.message : String(error) },
        });
      }
    },
  } satisfies TelemetryRuntime;
}

/**
 * Span exporter writing each finished span as a single JSON line.
 */
export class JsonLineSpanExporter implements SpanExporter {
  constructor(private readonly output: WritableTarget) {}

  export(spans: ReadableSpan[], resultCallback: (result: ExportResult) => void): void {
    try {
      for (const span of spans) {
        this.output.write(`${JSON.stringify(serialiseSpan(span))}\n`);
      }
      resultCallback({ code: ExportResultCode.SUCCESS });
    } catch (error) {
      resultCallback({
        code: ExportResultCode.FAILED,
        error: error instanceof Error ? error : new Error(String(error)),
      });
    }
  }

  async shutdown(): Promise<void> {
    // noop
  }

  async forceFlush(): Promise<void> {
    // noop
  }
}

function serialiseSpan(span: ReadableSpan): Record<string, unknown> {
  const parentSpanId = span.parentSpanContext?.spanId;

  return {
    traceId: span.spanContext().traceId,
    spanId: span.spanContext().spanId,
    ...(parentSpanId ? { parentSpanId } : {}),
    name: span.name,
    durationMs: hrTimeToMilliseconds(span.duration),
    attributes: span.attributes,
    status: span.status,
    events: span.events.map((event) => ({
      name: event.name,
      attributes: event.attributes ?? {},
    })),
  };
}
