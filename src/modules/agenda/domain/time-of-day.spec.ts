import { describe, it, expect } from 'vitest';
import { TimeOfDay } from './time-of-day';
import { InvalidTimeOfDayError } from '../../../shared/domain/errors';

describe('TimeOfDay', () => {
  describe('of', () => {
    it('should accept the last minute of the day', () => {
      const time = TimeOfDay.of(23, 59);

      expect(time.hour).toBe(23);
      expect(time.minute).toBe(59);
    });

    it.each([
      [24, 0],
      [12, 60],
      [-1, 30],
      [1.5, 0],
    ])('should reject %d:%d', (hour, minute) => {
      expect(() => TimeOfDay.of(hour, minute)).toThrow(InvalidTimeOfDayError);
    });
  });

  describe('parse', () => {
    it('should read a strict HH:MM string', () => {
      const time = TimeOfDay.parse('12:30');

      expect(time?.hour).toBe(12);
      expect(time?.minute).toBe(30);
    });

    it.each(['9:30', '24:00', '12:60', '1a:00', ' 12:30', '12:30:00', ''])(
      'should return null for "%s"',
      (text) => {
        expect(TimeOfDay.parse(text)).toBeNull();
      },
    );
  });

  describe('fromDate', () => {
    it('should take the local hour and minute', () => {
      const time = TimeOfDay.fromDate(new Date(2026, 2, 2, 7, 5, 44));

      expect(time.format()).toBe('07:05');
    });
  });

  describe('ordering', () => {
    it('should compare by minutes of the day', () => {
      const breakfast = TimeOfDay.of(8, 50);
      const walk = TimeOfDay.of(9, 0);

      expect(breakfast.isBefore(walk)).toBe(true);
      expect(walk.isBefore(breakfast)).toBe(false);
      expect(walk.compare(breakfast)).toBe(10);
      expect(walk.equals(TimeOfDay.of(9, 0))).toBe(true);
    });
  });

  describe('applyTo', () => {
    it('should replace hour and minute but keep date and seconds', () => {
      const result = TimeOfDay.of(8, 5).applyTo(new Date(2026, 2, 2, 15, 42, 17));

      expect(result).toEqual(new Date(2026, 2, 2, 8, 5, 17));
    });

    it('should leave the given date untouched', () => {
      const sampled = new Date(2026, 2, 2, 15, 42, 17);

      TimeOfDay.of(8, 5).applyTo(sampled);

      expect(sampled.getHours()).toBe(15);
    });
  });
});
