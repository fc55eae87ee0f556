import { createLifecycleTelemetrySubscriber } from '@partkit/core/runtime';
import type { TelemetrySpan } from '@partkit/core/telemetry';

import type { DomainEventSubscriber } from '../domain/ports/event-bus.js';

interface TelemetrySubscriberOptions {
  readonly getSpan: () => TelemetrySpan | undefined;
}

/**
 * Creates an assembly-scoped telemetry subscriber that mirrors stage events onto the active span.
 */
export function createAssemblyStageTelemetrySubscriber(
  options: TelemetrySubscriberOptions,
): DomainEventSubscriber {
  return createLifecycleTelemetrySubscriber({
    getSpan: options.getSpan,
    eventNamespace: 'partkit.stage',
  });
}
