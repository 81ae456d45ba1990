import { describe, it, expect, vi, beforeEach } from 'vitest';
import { InMemoryEventBus } from './in-memory-event-bus';
import { BaseDomainEvent } from './domain-event';

class NudgeEvent extends BaseDomainEvent<{ note: string }> {
  readonly eventType = 'activity.nudged';
  readonly aggregateType = 'Activity';

  constructor(activityName: string, note: string) {
    super(activityName, { note }, new Date('2026-03-02T09:00:00'));
  }
}

describe('InMemoryEventBus', () => {
  let eventBus: InMemoryEventBus;

  beforeEach(() => {
    eventBus = new InMemoryEventBus();
  });

  describe('subscribe', () => {
    it('should register a handler for an event type', () => {
      eventBus.subscribe('activity.nudged', vi.fn());

      expect(eventBus.hasHandlers('activity.nudged')).toBe(true);
      expect(eventBus.getRegisteredEventTypes()).toEqual(['activity.nudged']);
    });
  });

  describe('publish', () => {
    it('should call every handler registered for the event type', async () => {
      const first = vi.fn().mockResolvedValue(undefined);
      const second = vi.fn().mockResolvedValue(undefined);
      eventBus.subscribe('activity.nudged', first);
      eventBus.subscribe('activity.nudged', second);

      const event = new NudgeEvent('Lunch', 'soup is ready');
      await eventBus.publish(event);

      expect(first).toHaveBeenCalledTimes(1);
      expect(second).toHaveBeenCalledWith(event);
    });

    it('should hand the payload through unchanged', async () => {
      const handler = vi.fn().mockResolvedValue(undefined);
      eventBus.subscribe('activity.nudged', handler);

      await eventBus.publish(new NudgeEvent('Dinner', 'set the table'));

      const received = handler.mock.calls[0][0];
      expect(received.aggregateId).toBe('Dinner');
      expect(received.aggregateType).toBe('Activity');
      expect(received.payload).toEqual({ note: 'set the table' });
    });

    it('should resolve when nobody listens', async () => {
      await expect(
        eventBus.publish(new NudgeEvent('Lunch', 'unheard')),
      ).resolves.toBeUndefined();
    });

    it('should reject when a handler fails, after calling the others', async () => {
      const ok = vi.fn().mockResolvedValue(undefined);
      const failing = vi.fn().mockRejectedValue(new Error('Handler failed'));
      eventBus.subscribe('activity.nudged', ok);
      eventBus.subscribe('activity.nudged', failing);

      await expect(
        eventBus.publish(new NudgeEvent('Lunch', 'boom')),
      ).rejects.toThrow('Handler failed');
      expect(ok).toHaveBeenCalled();
    });
  });

  describe('unsubscribe', () => {
    it('should only remove the given handler', async () => {
      const kept = vi.fn().mockResolvedValue(undefined);
      const removed = vi.fn().mockResolvedValue(undefined);
      eventBus.subscribe('activity.nudged', kept);
      eventBus.subscribe('activity.nudged', removed);

      eventBus.unsubscribe('activity.nudged', removed);
      await eventBus.publish(new NudgeEvent('Lunch', 'once'));

      expect(kept).toHaveBeenCalledTimes(1);
      expect(removed).not.toHaveBeenCalled();
    });

    it('should forget the event type once its last handler is gone', () => {
      const handler = vi.fn();
      eventBus.subscribe('activity.nudged', handler);

      eventBus.unsubscribe('activity.nudged', handler);

      expect(eventBus.hasHandlers('activity.nudged')).toBe(false);
      expect(eventBus.getRegisteredEventTypes()).toEqual([]);
    });
  });

  describe('toJSON', () => {
    it('should serialize the occurrence time as ISO text', () => {
      const event = new NudgeEvent('Lunch', 'json');

      expect(event.toJSON()).toEqual({
        eventType: 'activity.nudged',
        aggregateType: 'Activity',
        aggregateId: 'Lunch',
        payload: { note: 'json' },
        occurredAt: new Date('2026-03-02T09:00:00').toISOString(),
      });
    });
  });
});
