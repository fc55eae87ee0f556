export type {
  DomainEventBusPort,
  DomainEventSubscriber,
  DomainEventSubscription,
} from '@partkit/core/runtime';
