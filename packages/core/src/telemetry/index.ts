export { createTelemetryTracer, noopTelemetryTracer } from './tracer.js';
export type {
  TelemetryAttributeValue,
  TelemetryAttributes,
  TelemetrySpan,
  TelemetrySpanEndOptions,
  TelemetrySpanOptions,
  TelemetrySpanStatus,
  TelemetryTracer,
  TelemetryTracerOptions,
} from './tracer.js';
export { createTelemetryRuntime, JsonLineSpanExporter } from './runtime.js';
export type { TelemetryMode, TelemetryRuntime, TelemetryRuntimeOptions } from './runtime.js';
