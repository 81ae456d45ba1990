import { TimeOfDay } from './time-of-day';

export const TIME_QUERY_HINT = 'Please enter a time ("now" or "HH:MM")';

/**
 * What the user asked about: the current simulated time, or a given time today.
 */
export type TimeQuery = { kind: 'now' } | { kind: 'at'; time: TimeOfDay };

/**
 * Accepts exactly "now" or a strict "HH:MM" (00-23, 00-59). Surrounding
 * whitespace is not allowed. Anything else is null.
 */
export function parseTimeQuery(line: string): TimeQuery | null {
  if (line === 'now') {
    return { kind: 'now' };
  }

  const time = TimeOfDay.parse(line);
  return time ? { kind: 'at', time } : null;
}

/**
 * The instant a query refers to: the sampled time itself for "now", otherwise
 * the sampled date with its hour and minute replaced.
 */
export function resolveQueryTime(query: TimeQuery, sampledAt: Date): Date {
  if (query.kind === 'now') {
    return new Date(sampledAt);
  }
  return query.time.applyTo(sampledAt);
}
