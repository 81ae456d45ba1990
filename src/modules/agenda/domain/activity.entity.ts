import {
  InvalidActivityNameError,
  InvalidActivityWindowError,
} from '../../../shared/domain/errors';
import { TimeOfDay } from './time-of-day';

export const MAX_ACTIVITY_NAME_LENGTH = 19;

/**
 * Fields an activity is built from
 */
export interface ActivityData {
  name: string;
  start: TimeOfDay;
  end: TimeOfDay;
  done: boolean;
}

/**
 * Activity Entity - a named window of the day that can be marked done once.
 */
export class ActivityEntity {
  readonly name: string;
  readonly start: TimeOfDay;
  readonly end: TimeOfDay;

  private _done: boolean;

  /**
   * @throws InvalidActivityNameError if the name is empty or too long
   * @throws InvalidActivityWindowError if start is not before end
   */
  constructor(data: ActivityData) {
    if (data.name.length === 0 || data.name.length > MAX_ACTIVITY_NAME_LENGTH) {
      throw new InvalidActivityNameError(data.name, MAX_ACTIVITY_NAME_LENGTH);
    }
    if (!data.start.isBefore(data.end)) {
      throw new InvalidActivityWindowError(
        data.name,
        data.start.format(),
        data.end.format(),
      );
    }
    this.name = data.name;
    this.start = data.start;
    this.end = data.end;
    this._done = data.done;
  }

  get done(): boolean {
    return this._done;
  }

  /**
   * Done is terminal: there is no way back to not-done.
   */
  markDone(): void {
    this._done = true;
  }

  /**
   * Fresh, not-done activity from "HH:MM" strings.
   * @throws InvalidTimeOfDayError if either time cannot be parsed
   */
  static create(name: string, start: string, end: string): ActivityEntity {
    return new ActivityEntity({
      name,
      start: parseOrThrow(start),
      end: parseOrThrow(end),
      done: false,
    });
  }
}

function parseOrThrow(text: string): TimeOfDay {
  const parsed = TimeOfDay.parse(text);
  if (parsed) {
    return parsed;
  }
  const [hour, minute] = text.split(':').map(Number);
  return TimeOfDay.of(hour, minute);
}
