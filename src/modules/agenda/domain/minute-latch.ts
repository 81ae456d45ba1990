import { MAX_ACTIVITIES } from './activity-schedule';

/**
 * Once-per-minute edge latch for one trigger kind.
 *
 * Bit i of the mask is set whenever activity i is polled. A trigger fires only
 * while its bit is clear, and the whole mask is cleared when the observed
 * minute changes. The clear happens after the check, so on the first poll of
 * a new minute the first activity polled still sees the old mask.
 */
export class MinuteLatch {
  private mask = 0;
  private previousMinute: number | null = null;

  /**
   * @param index position of the activity in the schedule
   * @param minute minute of the hour being polled (0-59)
   * @param matched whether the trigger condition holds right now
   * @returns true when the trigger should fire
   */
  tryFire(index: number, minute: number, matched: boolean): boolean {
    if (index < 0 || index >= MAX_ACTIVITIES) {
      throw new RangeError(`Latch index ${index} is outside 0-${MAX_ACTIVITIES - 1}`);
    }

    if (this.previousMinute === null) {
      this.previousMinute = minute;
    }

    const bit = 1 << index;
    const fired = (this.mask & bit) === 0 && matched;

    this.mask |= bit;
    if (minute !== this.previousMinute) {
      this.mask = 0;
      this.previousMinute = minute;
    }

    return fired;
  }

  isLatched(index: number): boolean {
    return (this.mask & (1 << index)) !== 0;
  }

  get observedMinute(): number | null {
    return this.previousMinute;
  }
}
