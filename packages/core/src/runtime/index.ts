export type {
  AssemblyErrorEvent,
  AssemblyEvent,
  AssemblyStage,
  AssemblyStageCompletedEvent,
  AssemblyStageErroredEvent,
  AssemblyStageEvent,
  AssemblyStageStartedEvent,
  DomainEvent,
} from './assembly-events.js';
export type {
  DomainEventBusPort,
  DomainEventSubscriber,
  DomainEventSubscription,
} from './event-bus.js';
export { InMemoryDomainEventBus } from './in-memory-event-bus.js';
export {
  createLifecycleLoggingSubscriber,
  createLifecycleTelemetrySubscriber,
  type LifecycleLoggingSubscriberOptions,
  type LifecycleTelemetrySubscriberOptions,
} from './stage-subscribers.js';
