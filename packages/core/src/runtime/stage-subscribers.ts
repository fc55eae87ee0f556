import type { StructuredLogger } from '../logging/index.js';
import type {
  TelemetryAttributeValue,
  TelemetryAttributes,
  TelemetrySpan,
} from '../telemetry/index.js';

import type { AssemblyEvent } from './assembly-events.js';
import type { DomainEventSubscriber } from './event-bus.js';

export interface LifecycleLoggingSubscriberOptions {
  readonly logger: StructuredLogger;
  readonly scope: string;
  readonly eventPrefix: string;
}

/**
 * Creates a subscriber that forwards assembly stage events to a structured logger.
 *
 * @param options - Logger and namespacing for emitted log events.
 * @returns Domain event subscriber that records lifecycle entries.
 */
export function createLifecycleLoggingSubscriber(
  options: LifecycleLoggingSubscriberOptions,
): DomainEventSubscriber {
  const { logger, scope, eventPrefix } = options;

  return (event: AssemblyEvent) => {
    switch (event.type) {
      case 'stage:start': {
        logger.log({
          level: 'info',
          name: scope,
          event: `${eventPrefix}.start`,
          data: { stage: event.payload.stage },
        });
        return;
      }
      case 'stage:complete': {
        const attributes = event.payload.attributes;
        const duration = readDuration(attributes?.['durationMs']);

        logger.log({
          level: 'info',
          name: scope,
          event: `${eventPrefix}.complete`,
          ...(duration === undefined ? {} : { elapsedMs: duration }),
          data: {
            stage: event.payload.stage,
            ...(attributes ? { attributes: { ...attributes } } : {}),
          },
        });
        return;
      }
      case 'stage:error': {
        const code = readErrorCode(event.payload.error);
        logger.log({
          level: 'error',
          name: scope,
          event: `${eventPrefix}.error`,
          data: {
            stage: event.payload.stage,
            message: toErrorMessage(event.payload.error),
            ...(code === undefined ? {} : { code }),
          },
        });
        return;
      }
      default: {
        throw new Error('Unsupported assembly event type');
      }
    }
  };
}

export interface LifecycleTelemetrySubscriberOptions {
  readonly getSpan: () => TelemetrySpan | undefined;
  readonly eventNamespace: string;
}

/**
 * Creates a subscriber that mirrors stage events onto the active telemetry span.
 *
 * @param options - Accessor for the active span and the namespace used for emitted events.
 * @returns Domain event subscriber emitting span events.
 */
export function createLifecycleTelemetrySubscriber(
  options: LifecycleTelemetrySubscriberOptions,
): DomainEventSubscriber {
  return (event: AssemblyEvent) => {
    const span = options.getSpan();
    if (!span) {
      return;
    }

    switch (event.type) {
      case 'stage:start': {
        span.addEvent(`${options.eventNamespace}.start`, { stage: event.payload.stage });
        return;
      }
      case 'stage:complete': {
        span.addEvent(
          `${options.eventNamespace}.complete`,
          toTelemetryAttributes(event.payload.stage, event.payload.attributes),
        );
        return;
      }
      case 'stage:error': {
        span.addEvent(`${options.eventNamespace}.error`, {
          stage: event.payload.stage,
          message: toErrorMessage(event.payload.error),
        });
        return;
      }
      default: {
        throw new Error('Unsupported assembly event type');
      }
    }
  };
}

function toTelemetryAttributes(
  stage: string,
  attributes: Readonly<Record<string, unknown>> | undefined,
): TelemetryAttributes {
  const record: Record<string, TelemetryAttributeValue> = { stage };

  for (const [key, value] of Object.entries(attributes ?? {})) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      record[key] = value;
    } else if (Array.isArray(value) && value.every((item) => typeof item === 'string')) {
      record[key] = Object.freeze(value.map((item) => String(item)));
    }
  }

  return Object.freeze(record);
}

function readDuration(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function readErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error === null || error === undefined) {
    return 'unknown error';
  }
  if (typeof error === 'object') {
    try {
      return JSON.stringify(error);
    } catch {
      return 'unknown error';
    }
  }
  return String(error);
}
