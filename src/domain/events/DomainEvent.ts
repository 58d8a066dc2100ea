/**
 * Base interface for all domain events.
 */
export interface DomainEvent {
  /** Unique event type identifier */
  readonly type: string;
  /** When the event occurred */
  readonly timestamp: Date;
  /** Unique event ID */
  readonly eventId: string;
  /** Aggregate ID that raised the event (the task run) */
  readonly aggregateId: string;
}

/**
 * Base class for domain events with common properties.
 */
export abstract class BaseDomainEvent implements DomainEvent {
  readonly timestamp: Date;
  readonly eventId: string;

  constructor(
    public readonly type: string,
    public readonly aggregateId: string
  ) {
    this.timestamp = new Date();
    this.eventId = `${type}-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
  }
}

/**
 * Event handler function type.
 */
export type EventHandler<T extends DomainEvent = DomainEvent> = (event: T) => void | Promise<void>;

/**
 * A concrete event class, addressed by its static TYPE.
 */
export interface EventClass<T extends DomainEvent> {
  readonly TYPE: string;
  new (...args: never[]): T;
}

/**
 * Event bus interface for publishing and subscribing to domain events.
 */
export interface EventBus {
  /**
   * Publish an event to all subscribers of its type.
   */
  publish(event: DomainEvent): Promise<void>;

  subscribe(eventType: string, handler: EventHandler): void;

  unsubscribe(eventType: string, handler: EventHandler): void;

  /**
   * Clear all subscriptions.
   */
  clear(): void;
}

/**
 * Subscribes a handler typed by event class. Returns the registered
 * handler so it can be unsubscribed.
 */
export function onEvent<T extends DomainEvent>(
  bus: EventBus,
  eventClass: EventClass<T>,
  handler: EventHandler<T>
): EventHandler {
  const wrapped: EventHandler = event => {
    if (event instanceof eventClass) {
      return handler(event);
    }
  };
  bus.subscribe(eventClass.TYPE, wrapped);
  return wrapped;
}
