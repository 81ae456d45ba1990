import { InvalidTimeOfDayError } from '../../../shared/domain/errors';

const HHMM_PATTERN = /^(\d{2}):(\d{2})$/;

const pad = (n: number): string => String(n).padStart(2, '0');

/**
 * Wall-clock hour and minute, without a date.
 * Immutable once constructed.
 */
export class TimeOfDay {
  private constructor(
    readonly hour: number,
    readonly minute: number,
  ) {}

  /**
   * @throws InvalidTimeOfDayError if hour is outside 0-23 or minute outside 0-59
   */
  static of(hour: number, minute: number): TimeOfDay {
    if (
      !Number.isInteger(hour) ||
      !Number.isInteger(minute) ||
      hour < 0 ||
      hour > 23 ||
      minute < 0 ||
      minute > 59
    ) {
      throw new InvalidTimeOfDayError(hour, minute);
    }
    return new TimeOfDay(hour, minute);
  }

  /**
   * Parse a strict "HH:MM" string. Returns null when the text does not
   * have that shape or the values are out of range.
   */
  static parse(text: string): TimeOfDay | null {
    const match = HHMM_PATTERN.exec(text);
    if (!match) {
      return null;
    }
    const hour = Number(match[1]);
    const minute = Number(match[2]);
    if (hour > 23 || minute > 59) {
      return null;
    }
    return new TimeOfDay(hour, minute);
  }

  /** Local wall-clock hour and minute of a date */
  static fromDate(date: Date): TimeOfDay {
    return new TimeOfDay(date.getHours(), date.getMinutes());
  }

  toMinutes(): number {
    return this.hour * 60 + this.minute;
  }

  compare(other: TimeOfDay): number {
    return this.toMinutes() - other.toMinutes();
  }

  equals(other: TimeOfDay): boolean {
    return this.hour === other.hour && this.minute === other.minute;
  }

  isBefore(other: TimeOfDay): boolean {
    return this.compare(other) < 0;
  }

  /**
   * Copy of the date with its local hour and minute replaced.
   * Seconds and the calendar date are left as they were.
   */
  applyTo(date: Date): Date {
    const result = new Date(date);
    result.setHours(this.hour, this.minute);
    return result;
  }

  format(): string {
    return `${pad(this.hour)}:${pad(this.minute)}`;
  }

  toString(): string {
    return this.format();
  }
}
