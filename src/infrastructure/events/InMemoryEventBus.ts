import { EventBus, DomainEvent, EventHandler } from '../../domain/events/DomainEvent';
import { loggers } from '../logging';

export interface EventBusOptions {
  /** Events kept for `getHistory` */
  maxHistorySize: number;
}

/**
 * Single-process event bus. Handlers of one event run concurrently and a
 * failing handler is logged, never rethrown to the publisher.
 */
export class InMemoryEventBus implements EventBus {
  private readonly subscribers = new Map<string, Set<EventHandler>>();
  private readonly history: DomainEvent[] = [];
  private readonly maxHistorySize: number;

  constructor(options: Partial<EventBusOptions> = {}) {
    this.maxHistorySize = options.maxHistorySize ?? 1000;
  }

  async publish(event: DomainEvent): Promise<void> {
    this.remember(event);
    const handlers = [...(this.subscribers.get(event.type) ?? [])];
    await Promise.all(handlers.map(handler => this.deliver(event, handler)));
  }

  subscribe(eventType: string, handler: EventHandler): void {
    let handlers = this.subscribers.get(eventType);
    if (!handlers) {
      handlers = new Set();
      this.subscribers.set(eventType, handlers);
    }
    handlers.add(handler);
  }

  unsubscribe(eventType: string, handler: EventHandler): void {
    this.subscribers.get(eventType)?.delete(handler);
  }

  clear(): void {
    this.subscribers.clear();
    this.history.length = 0;
  }

  /**
   * Published events, oldest first, optionally of one type.
   */
  getHistory(eventType?: string): ReadonlyArray<DomainEvent> {
    return eventType ? this.history.filter(e => e.type === eventType) : [...this.history];
  }

  private remember(event: DomainEvent): void {
    this.history.push(event);
    if (this.history.length > this.maxHistorySize) {
      this.history.splice(0, this.history.length - this.maxHistorySize);
    }
  }

  private async deliver(event: DomainEvent, handler: EventHandler): Promise<void> {
    try {
      await handler(event);
    } catch (error) {
      loggers.event.error(`Error in event handler for ${event.type}: ${String(error)}`);
    }
  }
}
