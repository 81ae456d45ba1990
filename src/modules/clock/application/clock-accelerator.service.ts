import { Inject, Injectable, Logger } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { agendaConfig } from '../../../config/agenda.config';
import type { AgendaConfig } from '../../../config/agenda.config';
import { CLOCK } from '../../../shared/domain/clock.port';
import type { Clock } from '../../../shared/domain/clock.port';
import { ClockAlreadyRunningError } from '../../../shared/domain/errors';
import { SimulatedClock } from '../domain/simulated-clock';

export const ACCELERATOR_INTERVAL = 'clock-accelerator';

/**
 * Drives the simulated clock from a real-time interval.
 *
 * The interval lives in SchedulerRegistry for the rest of the run, keeps
 * firing while the poll loop waits on a prompt, and is dropped by stop() or
 * by the registry when the application shuts down.
 */
@Injectable()
export class ClockAcceleratorService {
  private readonly logger = new Logger(ClockAcceleratorService.name);

  constructor(
    @Inject(CLOCK) private readonly systemClock: Clock,
    private readonly schedulerRegistry: SchedulerRegistry,
    @Inject(agendaConfig.KEY) private readonly config: AgendaConfig,
  ) {}

  /**
   * Capture the real time as the simulated base and start ticking.
   * @throws ClockAlreadyRunningError if an accelerator is already registered
   */
  start(speedFactor: number): SimulatedClock {
    if (this.isRunning()) {
      throw new ClockAlreadyRunningError();
    }

    const clock = new SimulatedClock(
      this.systemClock.now(),
      this.config.tickIntervalMs / 1000,
    );

    const interval = setInterval(
      () => clock.advance(speedFactor),
      this.config.tickIntervalMs,
    );
    this.schedulerRegistry.addInterval(ACCELERATOR_INTERVAL, interval);

    this.logger.log(
      `Clock started at ${clock.baseRealTime.toISOString()} running ${speedFactor}x (tick ${this.config.tickIntervalMs}ms)`,
    );
    return clock;
  }

  stop(): void {
    if (!this.isRunning()) {
      return;
    }
    this.schedulerRegistry.deleteInterval(ACCELERATOR_INTERVAL);
    this.logger.log('Clock stopped');
  }

  isRunning(): boolean {
    return this.schedulerRegistry.doesExist('interval', ACCELERATOR_INTERVAL);
  }
}
