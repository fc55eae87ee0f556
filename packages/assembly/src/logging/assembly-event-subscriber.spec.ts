import { describe, expect, it } from 'vitest';

import type { StructuredLogEvent } from '@partkit/core/logging';
import type { AssemblyEvent } from '@partkit/core/runtime';
import { createTelemetryTracer } from '@partkit/core/telemetry';
import {
  BasicTracerProvider,
  InMemorySpanExporter,
  SimpleSpanProcessor,
} from '@opentelemetry/sdk-trace-base';

import { RuleError } from '../domain/errors.js';
import { createAssemblyStageTelemetrySubscriber } from '../telemetry/assembly-event-subscriber.js';
import { createAssemblyStageLoggingSubscriber } from './assembly-event-subscriber.js';

describe('assembly stage event subscribers', () => {
  it('records lifecycle events via structured logging', async () => {
    const entries: StructuredLogEvent[] = [];
    const logger = {
      log(entry: StructuredLogEvent) {
        entries.push(entry);
      },
    } satisfies { log(entry: StructuredLogEvent): void };

    const subscriber = createAssemblyStageLoggingSubscriber(logger);
    await subscriber(createStageEvent('stage:start'));
    await subscriber(createStageEvent('stage:complete'));
    await subscriber(createStageEvent('stage:error'));

    const [start, complete, error] = entries;
    expect(start).toEqual({
      level: 'info',
      name: 'partkit-assembly',
      event: 'assembly.stage.start',
      data: { stage: 'resolution' },
    });
    expect(complete?.event).toBe('assembly.stage.complete');
    expect(complete?.elapsedMs).toBe(12);
    expect(complete?.data).toEqual({
      stage: 'resolution',
      attributes: { durationMs: 12, partCount: 3 },
    });
    expect(error).toEqual({
      level: 'error',
      name: 'partkit-assembly',
      event: 'assembly.stage.error',
      data: {
        stage: 'resolution',
        message: 'Part "tools" has an invalid stage rule.',
        code: 'rule-error',
      },
    });
  });

  it('emits telemetry events on the provided span', async () => {
    const exporter = new InMemorySpanExporter();
    const provider = new BasicTracerProvider({
      spanProcessors: [new SimpleSpanProcessor(exporter)],
    });
    const tracer = createTelemetryTracer({ tracer: provider.getTracer('partkit.assembly.test') });
    const span = tracer.startSpan('assemble');
    const subscriber = createAssemblyStageTelemetrySubscriber({ getSpan: () => span });

    await subscriber(createStageEvent('stage:start'));
    await subscriber(createStageEvent('stage:complete'));
    span.end();
    await provider.forceFlush();

    const [finished] = exporter.getFinishedSpans();
    expect(finished?.events.map((event) => event.name)).toEqual([
      'partkit.stage.start',
      'partkit.stage.complete',
    ]);
    expect(finished?.events[1]?.attributes).toEqual({
      stage: 'resolution',
      durationMs: 12,
      partCount: 3,
    });
  });
});

function createStageEvent(type: AssemblyEvent['type']): AssemblyEvent {
  const timestamp = new Date('2026-01-01T00:00:00.000Z');
  switch (type) {
    case 'stage:start': {
      return { type, payload: { stage: 'resolution', timestamp } };
    }
    case 'stage:complete': {
      return {
        type,
        payload: { stage: 'resolution', timestamp, attributes: { durationMs: 12, partCount: 3 } },
      };
    }
    case 'stage:error': {
      return {
        type,
        payload: {
          stage: 'resolution',
          timestamp,
          error: new RuleError('Part "tools" has an invalid stage rule.', { part: 'tools' }),
        },
      };
    }
  }
}
