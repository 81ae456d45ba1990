import { Inject, Injectable } from '@nestjs/common';
import { EVENT_BUS } from '../../../shared/events';
import type { IEventBus } from '../../../shared/events';
import type { ActivityEntity } from '../domain/activity.entity';
import { isDueSoon, isExactStart } from '../domain/activity.rules';
import { ActivityRemindedEvent } from '../domain/events';
import type { ReminderTrigger } from '../domain/events';
import type { MinuteLatch } from '../domain/minute-latch';
import { TimeOfDay } from '../domain/time-of-day';
import { AgendaConsole } from './agenda-console';
import { InteractionGate } from './interaction-gate.service';

/**
 * Edge-triggered start and due-soon checks for one activity at a time.
 * Each check fires at most once per observed minute per activity.
 */
@Injectable()
export class ActivityMatcher {
  constructor(
    private readonly console: AgendaConsole,
    private readonly gate: InteractionGate,
    @Inject(EVENT_BUS) private readonly eventBus: IEventBus,
  ) {}

  /**
   * "Time for <name>" when now is exactly the start of the activity.
   * @returns whether the trigger fired
   */
  async checkStart(
    activity: ActivityEntity,
    index: number,
    now: Date,
    latch: MinuteLatch,
  ): Promise<boolean> {
    if (activity.done) {
      return false;
    }

    const time = TimeOfDay.fromDate(now);
    if (!latch.tryFire(index, time.minute, isExactStart(activity, time))) {
      return false;
    }

    await this.remind(activity, 'start', `Time for ${activity.name}`, now);
    return true;
  }

  /**
   * Warning ten minutes before the activity ends.
   * @returns whether the trigger fired
   */
  async checkDueSoon(
    activity: ActivityEntity,
    index: number,
    now: Date,
    latch: MinuteLatch,
  ): Promise<boolean> {
    if (activity.done) {
      return false;
    }

    const time = TimeOfDay.fromDate(now);
    if (!latch.tryFire(index, time.minute, isDueSoon(activity, time))) {
      return false;
    }

    await this.remind(
      activity,
      'due-soon',
      `Don't forget to do ${activity.name} in 10 minutes!`,
      now,
    );
    return true;
  }

  private async remind(
    activity: ActivityEntity,
    trigger: ReminderTrigger,
    message: string,
    now: Date,
  ): Promise<void> {
    this.console.print(message);
    await this.eventBus.publish(
      new ActivityRemindedEvent(
        {
          name: activity.name,
          trigger,
          at: TimeOfDay.fromDate(now).format(),
        },
        now,
      ),
    );
    await this.gate.confirm(activity, now);
  }
}
