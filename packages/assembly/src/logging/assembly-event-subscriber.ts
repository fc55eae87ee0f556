import type { StructuredLogger } from '@partkit/core/logging';
import { createLifecycleLoggingSubscriber } from '@partkit/core/runtime';

import type { DomainEventSubscriber } from '../domain/ports/event-bus.js';

/**
 * Creates an assembly-scoped logging subscriber that records stage events through the shared
 * lifecycle adapter.
 *
 * @param logger - Structured logger that receives lifecycle log entries.
 * @returns Domain event subscriber recording assembly stage events.
 */
export function createAssemblyStageLoggingSubscriber(
  logger: StructuredLogger,
): DomainEventSubscriber {
  return createLifecycleLoggingSubscriber({
    logger,
    scope: 'partkit-assembly',
    eventPrefix: 'assembly.stage',
  });
}
