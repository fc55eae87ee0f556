import type { AssemblyEvent } from './assembly-events.js';

export type DomainEventSubscriber = (event: AssemblyEvent) => void | Promise<void>;

export interface DomainEventSubscription {
  unsubscribe(): void;
}

export interface DomainEventBusPort {
  publish(event: AssemblyEvent): Promise<void>;
  subscribe(subscriber: DomainEventSubscriber): DomainEventSubscription;
}
