/**
 * Base interface for everything the agenda announces while it runs.
 */
export interface DomainEvent<T = unknown> {
  /** Event type identifier (e.g. 'activity.reminded', 'activity.completed') */
  readonly eventType: string;

  /** The kind of entity that produced this event */
  readonly aggregateType: string;

  /** Identifies the entity instance; activities are identified by name */
  readonly aggregateId: string;

  readonly payload: T;

  /** Simulated time at which the event happened */
  readonly occurredAt: Date;
}

/**
 * Abstract base class for domain events.
 * Extend this to create concrete event types with type-safe payloads.
 */
export abstract class BaseDomainEvent<T = unknown> implements DomainEvent<T> {
  abstract readonly eventType: string;
  abstract readonly aggregateType: string;

  constructor(
    readonly aggregateId: string,
    readonly payload: T,
    readonly occurredAt: Date,
  ) {}

  toJSON(): Record<string, unknown> {
    return {
      eventType: this.eventType,
      aggregateType: this.aggregateType,
      aggregateId: this.aggregateId,
      payload: this.payload,
      occurredAt: this.occurredAt.toISOString(),
    };
  }
}
