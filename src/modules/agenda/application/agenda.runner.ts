import { Inject, Injectable, Logger } from '@nestjs/common';
import { TERMINAL } from '../../../shared/terminal/terminal.port';
import type { TerminalPort } from '../../../shared/terminal/terminal.port';
import { ClockAcceleratorService } from '../../clock/application/clock-accelerator.service';
import { createSchedulerState } from '../domain/scheduler-state';
import { SCHEDULE_REPOSITORY } from '../domain/schedule.repository';
import type { ScheduleRepository } from '../domain/schedule.repository';
import { AgendaConsole } from './agenda-console';
import { AgendaEventHandlers } from './event-handlers/agenda.event-handlers';
import { PollLoopService } from './poll-loop.service';
import { SpeedFactorPrompt } from './speed-factor.prompt';

export const EXIT_SUCCESS = 0;

/**
 * Runs one simulated day from start to finish.
 *
 * 1. Switch the terminal to non-blocking input (a failure ends the run)
 * 2. Load the schedule
 * 3. Ask for the speed factor and start the clock
 * 4. Poll until the day is over, then put the terminal back
 */
@Injectable()
export class AgendaRunner {
  private readonly logger = new Logger(AgendaRunner.name);

  constructor(
    @Inject(TERMINAL) private readonly terminal: TerminalPort,
    @Inject(SCHEDULE_REPOSITORY)
    private readonly scheduleRepository: ScheduleRepository,
    private readonly speedFactorPrompt: SpeedFactorPrompt,
    private readonly accelerator: ClockAcceleratorService,
    private readonly pollLoop: PollLoopService,
    private readonly console: AgendaConsole,
    private readonly eventHandlers: AgendaEventHandlers,
  ) {}

  async run(): Promise<number> {
    this.terminal.enableNonBlockingInput();

    try {
      const schedule = await this.scheduleRepository.load();
      this.logger.log(`Loaded ${schedule.size} activities`);

      const speedFactor = await this.speedFactorPrompt.ask();
      const clock = this.accelerator.start(speedFactor);

      try {
        await this.pollLoop.run(schedule, clock, createSchedulerState());
      } finally {
        this.accelerator.stop();
      }

      const { reminders, completed } = this.eventHandlers.summary();
      this.console.print(
        `Day over: ${schedule.countDone()} of ${schedule.size} activities done, ${reminders} reminders.`,
      );
      if (completed.length > 0) {
        this.console.print(`Done today: ${completed.join(', ')}`);
      }
      return EXIT_SUCCESS;
    } finally {
      this.terminal.restore();
    }
  }
}
