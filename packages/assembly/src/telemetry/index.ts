export { createAssemblyStageTelemetrySubscriber } from './assembly-event-subscriber.js';
export { createTelemetryRuntime, noopTelemetryTracer } from '@partkit/core/telemetry';
export type {
  TelemetryMode,
  TelemetryRuntime,
  TelemetrySpan,
  TelemetryTracer,
} from '@partkit/core/telemetry';
