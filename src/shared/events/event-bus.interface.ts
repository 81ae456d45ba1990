import type { DomainEvent } from './domain-event';

/**
 * Handler function type for processing domain events.
 */
export type EventHandler<T = unknown> = (
  event: DomainEvent<T>,
) => Promise<void>;

/**
 * Event Bus interface - the contract for publishing and subscribing to events.
 */
export interface IEventBus {
  /**
   * Publish an event to all registered handlers.
   * Resolves once every handler has finished.
   */
  publish(event: DomainEvent): Promise<void>;

  subscribe<T = unknown>(eventType: string, handler: EventHandler<T>): void;

  unsubscribe<T = unknown>(eventType: string, handler: EventHandler<T>): void;

  hasHandlers(eventType: string): boolean;
}

export const EVENT_BUS = Symbol('EVENT_BUS');
