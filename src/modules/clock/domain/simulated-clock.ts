import type { Clock } from '../../../shared/domain/clock.port';

/** Pending offsets are folded into the clock once they reach this size */
export const FLUSH_THRESHOLD_SECONDS = 1;

/**
 * Clock that runs faster than real time.
 *
 * A ticker calls advance() on a fixed real-time interval; the poll loop calls
 * sample() once per iteration. Both run on the event loop, so taking the
 * pending offset and zeroing it in sample() cannot interleave with a tick.
 */
export class SimulatedClock implements Clock {
  private pendingSeconds = 0;
  private appliedSeconds = 0;
  private lastSample: Date;

  constructor(
    readonly baseRealTime: Date,
    readonly tickSeconds: number,
  ) {
    if (!(tickSeconds > 0)) {
      throw new RangeError(`Tick length must be positive, got ${tickSeconds}`);
    }
    this.lastSample = new Date(baseRealTime);
  }

  /**
   * Account for one real-time tick at the given speed.
   */
  advance(speedFactor: number): void {
    this.pendingSeconds += speedFactor * this.tickSeconds;
  }

  /**
   * Fold in the pending offset if it has reached the threshold, then report
   * the simulated time.
   */
  sample(): Date {
    if (this.pendingSeconds >= FLUSH_THRESHOLD_SECONDS) {
      const pending = this.pendingSeconds;
      this.pendingSeconds = 0;
      this.appliedSeconds += pending;
    }

    this.lastSample = new Date(
      this.baseRealTime.getTime() + this.appliedSeconds * 1000,
    );
    return new Date(this.lastSample);
  }

  /** Simulated time as of the last sample */
  now(): Date {
    return new Date(this.lastSample);
  }

  /** Simulated seconds applied so far */
  get elapsedSeconds(): number {
    return this.appliedSeconds;
  }

  /** Simulated seconds waiting for the next sample */
  get pendingOffset(): number {
    return this.pendingSeconds;
  }
}
