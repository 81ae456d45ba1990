export { BaseDomainEvent } from './domain-event';
export type { DomainEvent } from './domain-event';
export { EVENT_BUS } from './event-bus.interface';
export type { IEventBus, EventHandler } from './event-bus.interface';
export { InMemoryEventBus } from './in-memory-event-bus';
export { EventsModule } from './events.module';
