import { InputAccumulator } from './input-accumulator';
import { MinuteLatch } from './minute-latch';

/**
 * Everything the poll loop carries from one tick to the next.
 * Owned by the loop alone; the clock accelerator never touches it.
 */
export interface SchedulerState {
  readonly startLatch: MinuteLatch;
  readonly dueSoonLatch: MinuteLatch;
  readonly input: InputAccumulator;
}

export function createSchedulerState(): SchedulerState {
  return {
    startLatch: new MinuteLatch(),
    dueSoonLatch: new MinuteLatch(),
    input: new InputAccumulator(),
  };
}
