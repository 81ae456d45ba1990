import { Inject, Injectable, Logger } from '@nestjs/common';
import { EVENT_BUS } from '../../../shared/events';
import type { IEventBus } from '../../../shared/events';
import type { ActivityEntity } from '../domain/activity.entity';
import { ActivityCompletedEvent } from '../domain/events';
import { TimeOfDay } from '../domain/time-of-day';
import { AgendaConsole } from './agenda-console';

export type GateState = 'idle' | 'awaiting-confirmation';

export type GateOutcome = 'completed' | 'declined' | 'already-done';

type Answer = 'yes' | 'no';

function normalizeAnswer(raw: string): Answer | null {
  const answer = raw.trim().toLowerCase();
  return answer === 'yes' || answer === 'no' ? answer : null;
}

/**
 * Asks whether a triggered activity is under way.
 *
 * idle -> awaiting-confirmation -> idle. A "yes" marks the activity done for
 * the rest of the day; a "no" leaves it open for the next trigger. Done
 * activities are acknowledged without asking.
 */
@Injectable()
export class InteractionGate {
  private readonly logger = new Logger(InteractionGate.name);
  private _state: GateState = 'idle';

  constructor(
    private readonly console: AgendaConsole,
    @Inject(EVENT_BUS) private readonly eventBus: IEventBus,
  ) {}

  get state(): GateState {
    return this._state;
  }

  /**
   * @param now simulated time the trigger was seen at
   */
  async confirm(activity: ActivityEntity, now: Date): Promise<GateOutcome> {
    if (activity.done) {
      this.console.print(`Chill, you've already done: ${activity.name}`);
      await this.console.clearAfterDelay();
      return 'already-done';
    }

    this._state = 'awaiting-confirmation';
    let answer: Answer | null = null;
    try {
      await this.console.pauseBeforePrompt();
      while (answer === null) {
        answer = normalizeAnswer(
          await this.console.ask(`Are you doing ${activity.name} now? (yes/no)\t`),
        );
      }
    } finally {
      this._state = 'idle';
    }

    if (answer === 'no') {
      this.logger.debug(`${activity.name} not started yet`);
      await this.console.clearAfterDelay();
      return 'declined';
    }

    activity.markDone();
    this.console.print(`${activity.name} marked as done.`);
    await this.eventBus.publish(
      new ActivityCompletedEvent(
        {
          name: activity.name,
          completedAt: TimeOfDay.fromDate(now).format(),
        },
        now,
      ),
    );
    await this.console.clearAfterDelay();
    return 'completed';
  }
}
