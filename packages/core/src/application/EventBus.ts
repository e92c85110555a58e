import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type WildcardHandler = (event: DomainEvent) => void;

export interface SubscribeOptions {
  /** Only deliver events published for this schema. Default: every schema. */
  readonly schemaName?: string;
}

interface Subscription {
  readonly type: EventType | '*';
  readonly handler: unknown;
  readonly schemaName: string | undefined;
  readonly deliver: (event: DomainEvent) => void;
}

function isEventOf<T extends EventType>(event: DomainEvent, type: T): event is EventPayload<T> {
  return event.type === type;
}

/**
 * Typed event bus for schema events, shareable between table schemas.
 *
 * Subscriptions may be scoped to one schema name. Handlers run in subscription
 * order; a throwing handler does not stop the others or the publisher.
 */
export class EventBus {
  private subscriptions: Subscription[] = [];

  on<T extends EventType>(type: T, handler: EventHandler<T>, options?: SubscribeOptions): void {
    this.subscriptions.push({
      type,
      handler,
      schemaName: options?.schemaName,
      deliver: (event) => {
        if (isEventOf(event, type)) handler(event);
      },
    });
  }

  /** Subscribe to every event type. */
  onAny(handler: WildcardHandler, options?: SubscribeOptions): void {
    this.subscriptions.push({ type: '*', handler, schemaName: options?.schemaName, deliver: handler });
  }

  /** Remove every subscription of `handler` to `type`, whatever its scope. */
  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.remove(type, handler);
  }

  offAny(handler: WildcardHandler): void {
    this.remove('*', handler);
  }

  emit(event: DomainEvent): void {
    // Snapshot, so handlers may subscribe or unsubscribe while an event is delivered.
    for (const subscription of [...this.subscriptions]) {
      if (!this.matches(subscription, event)) continue;
      try {
        subscription.deliver(event);
      } catch {
        // Subscriber failures must not change a validation outcome.
      }
    }
  }

  private matches(subscription: Subscription, event: DomainEvent): boolean {
    if (subscription.type !== '*' && subscription.type !== event.type) return false;
    return subscription.schemaName === undefined || subscription.schemaName === event.schemaName;
  }

  private remove(type: EventType | '*', handler: unknown): void {
    this.subscriptions = this.subscriptions.filter((s) => s.type !== type || s.handler !== handler);
  }
}
