import { Injectable, Logger } from '@nestjs/common';
import type { IEventBus, EventHandler } from './event-bus.interface';
import type { DomainEvent } from './domain-event';

/**
 * In-memory implementation of EventBus.
 * Handlers run in the same process, on the same event loop as the poll loop.
 */
@Injectable()
export class InMemoryEventBus implements IEventBus {
  private readonly logger = new Logger(InMemoryEventBus.name);
  private readonly handlers = new Map<string, Set<EventHandler>>();

  async publish(event: DomainEvent): Promise<void> {
    const eventHandlers = this.handlers.get(event.eventType);

    if (!eventHandlers || eventHandlers.size === 0) {
      this.logger.debug(`No handlers registered for event: ${event.eventType}`);
      return;
    }

    this.logger.debug(
      `Publishing event ${event.eventType} for ${event.aggregateType}#${event.aggregateId}`,
    );

    const promises = Array.from(eventHandlers).map(async (handler) => {
      try {
        await handler(event);
      } catch (error) {
        this.logger.error(
          `Handler failed for event ${event.eventType}: ${error instanceof Error ? error.message : error}`,
        );
        throw error;
      }
    });

    await Promise.all(promises);
  }

  subscribe<T = unknown>(eventType: string, handler: EventHandler<T>): void {
    let eventHandlers = this.handlers.get(eventType);
    if (!eventHandlers) {
      eventHandlers = new Set();
      this.handlers.set(eventType, eventHandlers);
    }
    eventHandlers.add(handler as EventHandler);
    this.logger.debug(`Handler subscribed to: ${eventType}`);
  }

  unsubscribe<T = unknown>(eventType: string, handler: EventHandler<T>): void {
    const eventHandlers = this.handlers.get(eventType);
    if (eventHandlers) {
      eventHandlers.delete(handler as EventHandler);
      if (eventHandlers.size === 0) {
        this.handlers.delete(eventType);
      }
    }
  }

  hasHandlers(eventType: string): boolean {
    const eventHandlers = this.handlers.get(eventType);
    return !!eventHandlers && eventHandlers.size > 0;
  }

  /**
   * Get all registered event types (useful for debugging)
   */
  getRegisteredEventTypes(): string[] {
    return Array.from(this.handlers.keys());
  }
}
