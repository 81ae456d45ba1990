import { BaseDomainEvent } from '../../../../shared/events';

// ============ Event Payload Types ============

export type ReminderTrigger = 'start' | 'due-soon' | 'query';

export interface ActivityRemindedPayload {
  name: string;
  trigger: ReminderTrigger;
  /** Simulated time of day, "HH:MM" */
  at: string;
}

export interface ActivityCompletedPayload {
  name: string;
  completedAt: string;
}

// ============ Event Classes ============

export class ActivityRemindedEvent extends BaseDomainEvent<ActivityRemindedPayload> {
  readonly eventType = 'activity.reminded';
  readonly aggregateType = 'Activity';

  constructor(payload: ActivityRemindedPayload, occurredAt: Date) {
    super(payload.name, payload, occurredAt);
  }
}

export class ActivityCompletedEvent extends BaseDomainEvent<ActivityCompletedPayload> {
  readonly eventType = 'activity.completed';
  readonly aggregateType = 'Activity';

  constructor(payload: ActivityCompletedPayload, occurredAt: Date) {
    super(payload.name, payload, occurredAt);
  }
}
