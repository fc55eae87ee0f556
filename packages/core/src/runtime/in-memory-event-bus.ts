import type {
  DomainEventBusPort,
  DomainEventSubscriber,
  DomainEventSubscription,
} from './event-bus.js';
import type { AssemblyEvent } from './assembly-events.js';

export class InMemoryDomainEventBus implements DomainEventBusPort {
  private readonly subscribers = new Set<DomainEventSubscriber>();

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  subscribe(subscriber: DomainEventSubscriber): DomainEventSubscription {
    this.subscribers.add(subscriber);
    return {
      unsubscribe: () => {
        this.subscribers.delete(subscriber);
      },
    };
  }

  /**
   * Delivers the event to every subscriber registered at publication time and resolves once
   * all of them have settled. Subscriber failures reject the publication.
   */
  async publish(event: AssemblyEvent): Promise<void> {
    const snapshot = [...this.subscribers];
    await Promise.all(snapshot.map((subscriber) => Promise.resolve(subscriber(event))));
  }
}
