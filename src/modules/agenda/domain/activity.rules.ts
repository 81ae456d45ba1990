import type { TimeOfDay } from './time-of-day';

/**
 * Domain rules for matching activities against the clock.
 * Pure functions; edge triggering lives in MinuteLatch.
 */

export const DUE_SOON_MINUTES = 10;

/** The part of an activity the rules look at */
export interface ActivityWindow {
  start: TimeOfDay;
  end: TimeOfDay;
}

// ============ WINDOW RULES ============

/**
 * True iff now lies in [start, end) at minute granularity.
 * Windows never cross midnight (start < end is enforced by ActivityEntity).
 */
export function isWithin(activity: ActivityWindow, now: TimeOfDay): boolean {
  const minute = now.toMinutes();
  return (
    activity.start.toMinutes() <= minute && minute < activity.end.toMinutes()
  );
}

export function isExactStart(
  activity: ActivityWindow,
  now: TimeOfDay,
): boolean {
  return (
    now.hour === activity.start.hour && now.minute === activity.start.minute
  );
}

// ============ DUE-SOON RULES ============

/**
 * Minutes left until the end of the window, counted only when the end is in
 * the current hour or the next one. Anything further away yields null.
 */
export function minutesUntilEnd(
  activity: ActivityWindow,
  now: TimeOfDay,
): number | null {
  if (activity.end.hour === now.hour) {
    return activity.end.minute - now.minute;
  }
  if (activity.end.hour === now.hour + 1) {
    return activity.end.minute + 60 - now.minute;
  }
  return null;
}

export function isDueSoon(activity: ActivityWindow, now: TimeOfDay): boolean {
  return (
    isWithin(activity, now) &&
    minutesUntilEnd(activity, now) === DUE_SOON_MINUTES
  );
}

// ============ DAY RULES ============

/** Local midnight of the day the date falls on */
export function startOfDay(date: Date): Date {
  const midnight = new Date(date);
  midnight.setHours(0, 0, 0, 0);
  return midnight;
}

/**
 * Local midnight that ends the day starting at dayStart. Calendar arithmetic,
 * so 23- and 25-hour days end when the clock face reads 24:00.
 */
export function endOfDay(dayStart: Date): Date {
  const end = new Date(dayStart);
  end.setDate(end.getDate() + 1);
  return end;
}

export function hasDayEnded(now: Date, dayStart: Date): boolean {
  return now.getTime() >= endOfDay(dayStart).getTime();
}
