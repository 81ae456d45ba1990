import { describe, it, expect } from 'vitest';
import { parseTimeQuery, resolveQueryTime } from './time-query';
import { InputAccumulator } from './input-accumulator';
import { TimeOfDay } from './time-of-day';

describe('parseTimeQuery', () => {
  it('should accept "now"', () => {
    expect(parseTimeQuery('now')).toEqual({ kind: 'now' });
  });

  it('should accept a valid HH:MM', () => {
    const query = parseTimeQuery('12:30');

    expect(query?.kind).toBe('at');
    expect(query?.kind === 'at' && query.time.format()).toBe('12:30');
  });

  it.each(['9:30', '24:00', '12:60', 'NOW', '12-30', 'noon', '', '  now ', ' 12:30 '])(
    'should reject "%s"',
    (line) => {
      expect(parseTimeQuery(line)).toBeNull();
    },
  );
});

describe('resolveQueryTime', () => {
  const sampledAt = new Date(2026, 2, 2, 15, 42, 17);

  it('should use the sampled time for "now"', () => {
    const resolved = resolveQueryTime({ kind: 'now' }, sampledAt);

    expect(resolved).toEqual(sampledAt);
    expect(resolved).not.toBe(sampledAt);
  });

  it('should put a given time on the sampled date', () => {
    const resolved = resolveQueryTime(
      { kind: 'at', time: TimeOfDay.of(8, 5) },
      sampledAt,
    );

    expect(resolved).toEqual(new Date(2026, 2, 2, 8, 5, 17));
  });
});

describe('InputAccumulator', () => {
  it('should hold a partial line until it is terminated', () => {
    const input = new InputAccumulator();

    expect(input.append('no')).toEqual([]);
    expect(input.append('w\n')).toEqual(['now']);
  });

  it('should split a chunk holding several lines', () => {
    const input = new InputAccumulator();

    expect(input.append('12:30\r\nnow\n09:')).toEqual(['12:30', 'now']);
    expect(input.append('15\n')).toEqual(['09:15']);
  });

  it('should ignore empty chunks', () => {
    const input = new InputAccumulator();
    input.append('1');

    expect(input.append('')).toEqual([]);
    expect(input.append('2:00\n')).toEqual(['12:00']);
  });

  it('should keep empty lines as empty strings', () => {
    expect(new InputAccumulator().append('\n')).toEqual(['']);
  });
});
