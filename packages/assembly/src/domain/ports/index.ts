export type {
  DomainEventBusPort,
  DomainEventSubscriber,
  DomainEventSubscription,
} from './event-bus.js';
export type { PartOutputRepositoryPort } from './part-outputs.js';
export type { MaterializedBundle, TreeMaterializerPort } from './materializer.js';
