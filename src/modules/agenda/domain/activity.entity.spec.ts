import { describe, it, expect } from 'vitest';
import { ActivityEntity, MAX_ACTIVITY_NAME_LENGTH } from './activity.entity';
import { TimeOfDay } from './time-of-day';
import {
  InvalidActivityNameError,
  InvalidActivityWindowError,
  InvalidTimeOfDayError,
} from '../../../shared/domain/errors';

describe('ActivityEntity', () => {
  describe('create', () => {
    it('should build a not-done activity from HH:MM strings', () => {
      const lunch = ActivityEntity.create('Lunch', '11:00', '12:00');

      expect(lunch.name).toBe('Lunch');
      expect(lunch.start.format()).toBe('11:00');
      expect(lunch.end.format()).toBe('12:00');
      expect(lunch.done).toBe(false);
    });

    it('should reject an out-of-range time', () => {
      expect(() => ActivityEntity.create('Late', '25:00', '26:00')).toThrow(
        InvalidTimeOfDayError,
      );
    });

    it('should reject a window that does not start before it ends', () => {
      expect(() => ActivityEntity.create('Nap', '15:00', '13:45')).toThrow(
        InvalidActivityWindowError,
      );
      expect(() => ActivityEntity.create('Nap', '15:00', '15:00')).toThrow(
        'Activity "Nap" must start before it ends (got 15:00-15:00)',
      );
    });

    it('should reject a window crossing midnight', () => {
      expect(() => ActivityEntity.create('Night shift', '23:55', '00:10')).toThrow(
        InvalidActivityWindowError,
      );
    });
  });

  describe('name', () => {
    it(`should accept up to ${MAX_ACTIVITY_NAME_LENGTH} characters`, () => {
      const name = 'x'.repeat(MAX_ACTIVITY_NAME_LENGTH);

      expect(ActivityEntity.create(name, '10:00', '11:00').name).toBe(name);
    });

    it('should reject longer names', () => {
      expect(() =>
        ActivityEntity.create('x'.repeat(MAX_ACTIVITY_NAME_LENGTH + 1), '10:00', '11:00'),
      ).toThrow(InvalidActivityNameError);
    });

    it('should reject an empty name', () => {
      expect(() => ActivityEntity.create('', '10:00', '11:00')).toThrow(
        InvalidActivityNameError,
      );
    });
  });

  describe('constructor', () => {
    it('should keep the done flag it is given', () => {
      const dinner = new ActivityEntity({
        name: 'Dinner',
        start: TimeOfDay.of(17, 45),
        end: TimeOfDay.of(18, 30),
        done: true,
      });

      expect(dinner.done).toBe(true);
    });
  });

  describe('markDone', () => {
    it('should stay done once marked', () => {
      const lunch = ActivityEntity.create('Lunch', '11:00', '12:00');

      lunch.markDone();
      lunch.markDone();

      expect(lunch.done).toBe(true);
    });
  });
});
