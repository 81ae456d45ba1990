import { ActivityEntity } from './activity.entity';

/** Capacity of the per-minute latch masks, and so of a schedule */
export const MAX_ACTIVITIES = 10;

/**
 * Ordered, fixed set of activities for one day.
 * The position of an activity is its bit in the minute latches.
 */
export class ActivitySchedule {
  private readonly items: readonly ActivityEntity[];

  /**
   * @throws RangeError if the list is empty or longer than MAX_ACTIVITIES
   */
  constructor(activities: ActivityEntity[]) {
    if (activities.length === 0 || activities.length > MAX_ACTIVITIES) {
      throw new RangeError(
        `A schedule holds 1 to ${MAX_ACTIVITIES} activities, got ${activities.length}`,
      );
    }
    this.items = [...activities];
  }

  get size(): number {
    return this.items.length;
  }

  get activities(): readonly ActivityEntity[] {
    return this.items;
  }

  at(index: number): ActivityEntity | undefined {
    return this.items[index];
  }

  entries(): Array<[number, ActivityEntity]> {
    return this.items.map((activity, index) => [index, activity]);
  }

  countDone(): number {
    return this.items.filter((activity) => activity.done).length;
  }
}
