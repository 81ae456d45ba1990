import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { EVENT_BUS } from '../../../../shared/events';
import type { DomainEvent, IEventBus } from '../../../../shared/events';
import type {
  ActivityCompletedPayload,
  ActivityRemindedPayload,
} from '../../domain/events';

export interface DaySummary {
  reminders: number;
  completed: string[];
}

/**
 * Keeps a log of the day: every reminder and every completion.
 */
@Injectable()
export class AgendaEventHandlers implements OnModuleInit {
  private readonly logger = new Logger(AgendaEventHandlers.name);
  private reminders = 0;
  private readonly completed: string[] = [];

  constructor(@Inject(EVENT_BUS) private readonly eventBus: IEventBus) {}

  onModuleInit() {
    this.eventBus.subscribe<ActivityRemindedPayload>(
      'activity.reminded',
      this.onActivityReminded.bind(this),
    );

    this.eventBus.subscribe<ActivityCompletedPayload>(
      'activity.completed',
      this.onActivityCompleted.bind(this),
    );

    this.logger.debug('Agenda event handlers registered');
  }

  summary(): DaySummary {
    return { reminders: this.reminders, completed: [...this.completed] };
  }

  private async onActivityReminded(
    event: DomainEvent<ActivityRemindedPayload>,
  ): Promise<void> {
    const { payload } = event;
    this.reminders++;
    this.logger.log(
      `Reminder (${payload.trigger}) for ${payload.name} at ${payload.at}`,
    );
  }

  private async onActivityCompleted(
    event: DomainEvent<ActivityCompletedPayload>,
  ): Promise<void> {
    const { payload } = event;
    this.completed.push(payload.name);
    this.logger.log(`${payload.name} done at ${payload.completedAt}`);
  }
}
