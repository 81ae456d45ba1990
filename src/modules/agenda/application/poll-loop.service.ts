import { Inject, Injectable, Logger } from '@nestjs/common';
import { setTimeout as sleep } from 'node:timers/promises';
import { agendaConfig } from '../../../config/agenda.config';
import type { AgendaConfig } from '../../../config/agenda.config';
import { TERMINAL } from '../../../shared/terminal/terminal.port';
import type { TerminalPort } from '../../../shared/terminal/terminal.port';
import type { SimulatedClock } from '../../clock/domain/simulated-clock';
import type { ActivitySchedule } from '../domain/activity-schedule';
import { hasDayEnded, startOfDay } from '../domain/activity.rules';
import type { SchedulerState } from '../domain/scheduler-state';
import { TimeOfDay } from '../domain/time-of-day';
import { ActivityMatcher } from './activity-matcher.service';
import { TimeQueryService } from './time-query.service';

export interface PollLoopResult {
  polls: number;
  endedAt: Date;
}

/**
 * The main loop: sample the clock, check every open activity, handle typed
 * input, sleep one poll interval. Runs until the starting day is over.
 */
@Injectable()
export class PollLoopService {
  private readonly logger = new Logger(PollLoopService.name);

  constructor(
    private readonly matcher: ActivityMatcher,
    private readonly timeQuery: TimeQueryService,
    @Inject(TERMINAL) private readonly terminal: TerminalPort,
    @Inject(agendaConfig.KEY) private readonly config: AgendaConfig,
  ) {}

  async run(
    schedule: ActivitySchedule,
    clock: SimulatedClock,
    state: SchedulerState,
  ): Promise<PollLoopResult> {
    const dayStart = startOfDay(clock.baseRealTime);
    let polls = 0;
    let lastMinute: string | null = null;
    let now = clock.sample();

    while (!hasDayEnded(now, dayStart)) {
      const minute = TimeOfDay.fromDate(now).format();
      if (minute !== lastMinute) {
        this.logger.verbose(`Simulated time ${minute}`);
        lastMinute = minute;
      }

      await this.pollOnce(schedule, state, now);
      polls++;

      await sleep(this.config.pollIntervalMs);
      now = clock.sample();
    }

    this.logger.log(`Day over after ${polls} polls`);
    return { polls, endedAt: now };
  }

  /**
   * One iteration at a fixed simulated time.
   */
  async pollOnce(
    schedule: ActivitySchedule,
    state: SchedulerState,
    now: Date,
  ): Promise<void> {
    for (const [index, activity] of schedule.entries()) {
      if (activity.done) {
        continue;
      }
      await this.matcher.checkStart(activity, index, now, state.startLatch);
      await this.matcher.checkDueSoon(activity, index, now, state.dueSoonLatch);
    }

    const lines = state.input.append(this.terminal.readAvailable());
    for (const line of lines) {
      await this.timeQuery.handleLine(schedule, line, now);
    }
  }
}
