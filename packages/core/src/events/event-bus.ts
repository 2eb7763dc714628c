import { EventEmitter } from 'node:events';
import type {
  RegistryEvent,
  RegistryEventType,
  EventOf,
  EventHandler,
  EventSubscription,
} from './types.js';

const WILDCARD = '*';

let subscriptionSeq = 0;

function generateSubscriptionId(): string {
  subscriptionSeq += 1;
  return `subscription:${Date.now()}-${subscriptionSeq}`;
}

function isEventOf<K extends RegistryEventType>(event: RegistryEvent, type: K): event is EventOf<K> {
  return event.type === type;
}

/**
 * In-process notification bus over Node's EventEmitter.
 *
 * Delivery is synchronous and happens after the publishing operation has
 * committed. A throwing handler is reported on stderr; it does not reach
 * the publisher or the other handlers.
 */
export class EventBus {
  private emitter: EventEmitter;
  private subscriptions: Map<string, EventSubscription>;

  constructor() {
    this.emitter = new EventEmitter();
    this.subscriptions = new Map();
    this.emitter.setMaxListeners(100);
  }

  publish(event: RegistryEvent): void {
    this.emitter.emit(event.type, event);
    this.emitter.emit(WILDCARD, event);
  }

  subscribe<K extends RegistryEventType>(eventType: K, handler: EventHandler<EventOf<K>>): EventSubscription {
    return this.register(eventType, (event) => {
      if (isEventOf(event, eventType)) handler(event);
    });
  }

  /** Receive every event, e.g. for logging */
  subscribeToAll(handler: EventHandler): EventSubscription {
    return this.register(WILDCARD, handler);
  }

  /** @returns true if the subscription existed */
  unsubscribe(subscriptionId: string): boolean {
    const subscription = this.subscriptions.get(subscriptionId);
    if (!subscription) {
      return false;
    }
    this.emitter.removeListener(subscription.eventType, subscription.handler);
    this.subscriptions.delete(subscriptionId);
    return true;
  }

  getSubscriptions(): EventSubscription[] {
    return Array.from(this.subscriptions.values());
  }

  getSubscriptionCount(eventType: RegistryEventType | '*'): number {
    return this.emitter.listenerCount(eventType);
  }

  clearSubscriptions(): void {
    this.emitter.removeAllListeners();
    this.subscriptions.clear();
  }

  private register(eventType: RegistryEventType | '*', handler: EventHandler): EventSubscription {
    const wrappedHandler: EventHandler = (event) => {
      try {
        handler(event);
      } catch (error) {
        console.error(`Error in event handler for ${eventType}:`, error);
      }
    };

    const subscription: EventSubscription = {
      id: generateSubscriptionId(),
      eventType,
      handler: wrappedHandler,
      metadata: {
        createdAt: Date.now(),
      },
    };

    this.emitter.on(eventType, wrappedHandler);
    this.subscriptions.set(subscription.id, subscription);
    return subscription;
  }
}
