import { describe, it, expect, vi, beforeEach } from 'vitest';
import { CallbackRegistry, CallbackType } from '../events/callback-registry.js';
import { TimerDispatcher } from '../events/timer-dispatcher.js';
import type { Schedule } from '../db/capturer-dao.js';
import { ScheduleMonitor, type ScheduleSource } from './schedule-monitor.js';

class MockSchedules implements ScheduleSource {
  schedules: Schedule[] = [];

  listSchedules(): Schedule[] {
    return this.schedules;
  }
}

function schedule(id: number, startTime: string, durationMinutes: number, enabled = true): Schedule {
  return {
    id,
    name: `Schedule ${id}`,
    startTime,
    durationMinutes,
    enabled,
    createdAt: '2025-01-01T00:00:00.000Z',
  };
}

describe('ScheduleMonitor', () => {
  let now: Date;
  let registry: CallbackRegistry;
  let source: MockSchedules;
  let monitor: ScheduleMonitor;
  const clock = () => now;

  beforeEach(() => {
    now = new Date('2025-05-01T09:00:00.000Z');
    registry = new CallbackRegistry();
    source = new MockSchedules();
    monitor = new ScheduleMonitor(source, registry, clock);
  });

  it('should record ticks fired through the dispatcher once started', () => {
    monitor.start();
    const dispatcher = new TimerDispatcher(registry, clock);

    dispatcher.tick(1);
    dispatcher.tick(2);

    const snapshot = monitor.getSnapshot();
    expect(snapshot.ticksReceived).toBe(2);
    expect(snapshot.lastTick).toBe(2);
    expect(snapshot.lastTickAt).toBe('2025-05-01T09:00:00.000Z');
  });

  it('should subscribe only once and detach on stop', () => {
    monitor.start();
    monitor.start();
    expect(registry.subscriberCount(CallbackType.Timer)).toBe(1);

    monitor.stop();
    expect(registry.subscriberCount(CallbackType.Timer)).toBe(0);
  });

  it('should fire schedule-start and schedule-end as windows open and close', () => {
    const started = vi.fn();
    const ended = vi.fn();
    registry.subscribe(CallbackType.ScheduleStart, started);
    registry.subscribe(CallbackType.ScheduleEnd, ended);
    source.schedules = [schedule(1, '09:00', 10)];

    monitor.handleTick({ n: 1, firedAt: now.toISOString() });
    expect(started).toHaveBeenCalledWith({ scheduleId: 1, name: 'Schedule 1', at: '2025-05-01T09:00:00.000Z' });
    expect(monitor.getSnapshot().activeSchedules).toEqual([
      { id: 1, name: 'Schedule 1', startTime: '09:00', durationMinutes: 10 },
    ]);

    now = new Date('2025-05-01T09:05:00.000Z');
    monitor.handleTick({ n: 2, firedAt: now.toISOString() });
    expect(started).toHaveBeenCalledTimes(1);
    expect(ended).not.toHaveBeenCalled();

    now = new Date('2025-05-01T09:10:00.000Z');
    monitor.handleTick({ n: 3, firedAt: now.toISOString() });
    expect(ended).toHaveBeenCalledWith({ scheduleId: 1, name: 'Schedule 1', at: '2025-05-01T09:10:00.000Z' });
    expect(monitor.getSnapshot().activeSchedules).toEqual([]);
  });

  it('should ignore disabled schedules', () => {
    const started = vi.fn();
    registry.subscribe(CallbackType.ScheduleStart, started);
    source.schedules = [schedule(1, '09:00', 10, false)];

    monitor.handleTick({ n: 1, firedAt: now.toISOString() });

    expect(started).not.toHaveBeenCalled();
    expect(monitor.getSnapshot().activeSchedules).toEqual([]);
  });

  it('should end a window when its schedule is deleted', () => {
    const ended = vi.fn();
    registry.subscribe(CallbackType.ScheduleEnd, ended);
    source.schedules = [schedule(4, '08:30', 60)];
    monitor.handleTick({ n: 1, firedAt: now.toISOString() });

    source.schedules = [];
    monitor.handleTick({ n: 2, firedAt: now.toISOString() });

    expect(ended).toHaveBeenCalledTimes(1);
    expect(ended.mock.calls[0][0].scheduleId).toBe(4);
  });

  it('should report uptime from construction time', () => {
    now = new Date('2025-05-01T09:01:30.500Z');

    const snapshot = monitor.getSnapshot();
    expect(snapshot.startedAt).toBe('2025-05-01T09:00:00.000Z');
    expect(snapshot.uptimeSeconds).toBe(90);
    expect(snapshot.ticksReceived).toBe(0);
    expect(snapshot.lastTick).toBeNull();
  });
});
