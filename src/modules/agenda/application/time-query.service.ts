import { Inject, Injectable } from '@nestjs/common';
import { EVENT_BUS } from '../../../shared/events';
import type { IEventBus } from '../../../shared/events';
import type { ActivityEntity } from '../domain/activity.entity';
import type { ActivitySchedule } from '../domain/activity-schedule';
import { isWithin } from '../domain/activity.rules';
import { ActivityRemindedEvent } from '../domain/events';
import { TimeOfDay } from '../domain/time-of-day';
import {
  TIME_QUERY_HINT,
  parseTimeQuery,
  resolveQueryTime,
} from '../domain/time-query';
import { AgendaConsole } from './agenda-console';
import { InteractionGate } from './interaction-gate.service';

export const NO_ACTIVITY_MESSAGE = 'There is no activity to do.';

/**
 * Answers "what should I be doing at this time?" typed by the user.
 */
@Injectable()
export class TimeQueryService {
  constructor(
    private readonly console: AgendaConsole,
    private readonly gate: InteractionGate,
    @Inject(EVENT_BUS) private readonly eventBus: IEventBus,
  ) {}

  /**
   * Validate one typed line and, when it is a time, resolve it.
   * @returns the activities that were active at the queried time, or null
   *   when the line was rejected
   */
  async handleLine(
    schedule: ActivitySchedule,
    line: string,
    sampledAt: Date,
  ): Promise<ActivityEntity[] | null> {
    const query = parseTimeQuery(line);
    if (!query) {
      this.console.print(TIME_QUERY_HINT);
      return null;
    }
    return this.resolve(schedule, resolveQueryTime(query, sampledAt));
  }

  /**
   * Route every activity whose window holds the query time through the gate,
   * last activity first. Done activities are acknowledged, not asked about.
   */
  async resolve(
    schedule: ActivitySchedule,
    queryTime: Date,
  ): Promise<ActivityEntity[]> {
    const time = TimeOfDay.fromDate(queryTime);
    const matches: ActivityEntity[] = [];

    for (let index = schedule.size - 1; index >= 0; index--) {
      const activity = schedule.at(index);
      if (!activity || !isWithin(activity, time)) {
        continue;
      }

      matches.push(activity);
      this.console.print(`Time for ${activity.name}`);
      await this.eventBus.publish(
        new ActivityRemindedEvent(
          { name: activity.name, trigger: 'query', at: time.format() },
          queryTime,
        ),
      );
      await this.gate.confirm(activity, queryTime);
    }

    if (matches.length === 0) {
      this.console.print(NO_ACTIVITY_MESSAGE);
    }
    await this.console.clearAfterDelay();

    return matches;
  }
}
