import { describe, it, expect, beforeEach, vi } from 'vitest';
import { NO_ACTIVITY_MESSAGE, TimeQueryService } from './time-query.service';
import { AgendaConsole } from './agenda-console';
import { InteractionGate } from './interaction-gate.service';
import { ActivityEntity } from '../domain/activity.entity';
import { ActivitySchedule } from '../domain/activity-schedule';
import { TIME_QUERY_HINT } from '../domain/time-query';
import { InMemoryEventBus } from '../../../shared/events';
import { FakeTerminal, testAgendaConfig } from '../../../shared/testing';

describe('TimeQueryService', () => {
  const sampledAt = new Date(2026, 2, 2, 11, 45, 10);
  let terminal: FakeTerminal;
  let eventBus: InMemoryEventBus;
  let service: TimeQueryService;
  let lunch: ActivityEntity;
  let tea: ActivityEntity;
  let medicine: ActivityEntity;
  let schedule: ActivitySchedule;

  beforeEach(() => {
    terminal = new FakeTerminal();
    eventBus = new InMemoryEventBus();
    const console = new AgendaConsole(terminal, testAgendaConfig());
    service = new TimeQueryService(
      console,
      new InteractionGate(console, eventBus),
      eventBus,
    );
    lunch = ActivityEntity.create('Lunch', '11:00', '12:00');
    tea = ActivityEntity.create('Tea', '11:30', '12:30');
    medicine = ActivityEntity.create('Get medicine', '21:30', '21:45');
    schedule = new ActivitySchedule([lunch, tea, medicine]);
  });

  it('should print the hint for a malformed line', async () => {
    const result = await service.handleLine(schedule, '9:30', sampledAt);

    expect(result).toBeNull();
    expect(terminal.lines()).toEqual([TIME_QUERY_HINT]);
    expect(terminal.clearCount).toBe(0);
  });

  it('should print the hint for a time padded with spaces', async () => {
    const result = await service.handleLine(schedule, ' 11:15 ', sampledAt);

    expect(result).toBeNull();
    expect(terminal.lines()).toEqual([TIME_QUERY_HINT]);
    expect(terminal.prompts).toEqual([]);
  });

  it('should ask about every matching activity, last one first', async () => {
    terminal.answer('no', 'no');

    const result = await service.handleLine(schedule, 'now', sampledAt);

    expect(result).toEqual([tea, lunch]);
    expect(terminal.lines()).toEqual(['Time for Tea', 'Time for Lunch']);
    expect(terminal.prompts).toEqual([
      'Are you doing Tea now? (yes/no)\t',
      'Are you doing Lunch now? (yes/no)\t',
    ]);
    // one clear per answer, one at the end
    expect(terminal.clearCount).toBe(3);
  });

  it('should resolve HH:MM on the sampled day', async () => {
    terminal.answer('yes');

    const result = await service.handleLine(schedule, '21:30', sampledAt);

    expect(result).toEqual([medicine]);
    expect(medicine.done).toBe(true);
    expect(terminal.lines()).toEqual([
      'Time for Get medicine',
      'Get medicine marked as done.',
    ]);
  });

  it('should say so when nothing is scheduled', async () => {
    const result = await service.handleLine(schedule, '03:00', sampledAt);

    expect(result).toEqual([]);
    expect(terminal.lines()).toEqual([NO_ACTIVITY_MESSAGE]);
    expect(terminal.clearCount).toBe(1);
  });

  it('should not ask about a done activity', async () => {
    lunch.markDone();

    await service.handleLine(schedule, '11:15', sampledAt);

    expect(terminal.prompts).toEqual([]);
    expect(terminal.lines()).toEqual([
      'Time for Lunch',
      "Chill, you've already done: Lunch",
    ]);
  });

  it('should publish a query reminder per match', async () => {
    const handler = vi.fn().mockResolvedValue(undefined);
    eventBus.subscribe('activity.reminded', handler);
    terminal.answer('no');

    await service.handleLine(schedule, '11:10', sampledAt);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0][0].payload).toEqual({
      name: 'Lunch',
      trigger: 'query',
      at: '11:10',
    });
  });
});
