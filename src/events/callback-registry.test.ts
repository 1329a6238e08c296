import { describe, it, expect, vi, afterEach } from 'vitest';
import { CallbackRegistry, CallbackType } from './callback-registry.js';

const timerEvent = { n: 1, firedAt: '2025-01-01T00:00:00.000Z' };

describe('CallbackRegistry', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should notify subscribers in registration order', () => {
    const registry = new CallbackRegistry();
    const calls: string[] = [];

    registry.subscribe(CallbackType.Timer, () => calls.push('first'));
    registry.subscribe(CallbackType.Timer, () => calls.push('second'));

    const notified = registry.fireEvent(CallbackType.Timer, timerEvent);

    expect(notified).toBe(2);
    expect(calls).toEqual(['first', 'second']);
  });

  it('should pass the payload to subscribers', () => {
    const registry = new CallbackRegistry();
    const callback = vi.fn();

    registry.subscribe(CallbackType.Timer, callback);
    registry.fireEvent(CallbackType.Timer, timerEvent);

    expect(callback).toHaveBeenCalledWith(timerEvent);
  });

  it('should only notify subscribers of the fired type', () => {
    const registry = new CallbackRegistry();
    const timerCallback = vi.fn();
    const scheduleCallback = vi.fn();

    registry.subscribe(CallbackType.Timer, timerCallback);
    registry.subscribe(CallbackType.ScheduleStart, scheduleCallback);

    registry.fireEvent(CallbackType.ScheduleStart, {
      scheduleId: 1,
      name: 'Morning run',
      at: '2025-01-01T06:00:00.000Z',
    });

    expect(timerCallback).not.toHaveBeenCalled();
    expect(scheduleCallback).toHaveBeenCalledTimes(1);
  });

  it('should return 0 when nobody is subscribed', () => {
    const registry = new CallbackRegistry();

    expect(registry.fireEvent(CallbackType.Timer, timerEvent)).toBe(0);
  });

  it('should stop notifying after the returned unsubscribe is called', () => {
    const registry = new CallbackRegistry();
    const callback = vi.fn();

    const unsubscribe = registry.subscribe(CallbackType.Timer, callback);
    unsubscribe();
    registry.fireEvent(CallbackType.Timer, timerEvent);

    expect(callback).not.toHaveBeenCalled();
    expect(registry.subscriberCount(CallbackType.Timer)).toBe(0);
  });

  it('should report whether unsubscribe removed anything', () => {
    const registry = new CallbackRegistry();
    const callback = vi.fn();

    registry.subscribe(CallbackType.Timer, callback);

    expect(registry.unsubscribe(CallbackType.Timer, callback)).toBe(true);
    expect(registry.unsubscribe(CallbackType.Timer, callback)).toBe(false);
  });

  it('should keep notifying when a subscriber throws', () => {
    const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const registry = new CallbackRegistry();
    const after = vi.fn();

    registry.subscribe(CallbackType.Timer, () => {
      throw new Error('subscriber failed');
    });
    registry.subscribe(CallbackType.Timer, after);

    const notified = registry.fireEvent(CallbackType.Timer, timerEvent);

    expect(notified).toBe(2);
    expect(after).toHaveBeenCalledTimes(1);
    expect(consoleSpy).toHaveBeenCalledTimes(1);
  });

  it('should not call subscribers added while an event is being fired', () => {
    const registry = new CallbackRegistry();
    const late = vi.fn();

    registry.subscribe(CallbackType.Timer, () => {
      registry.subscribe(CallbackType.Timer, late);
    });
    registry.fireEvent(CallbackType.Timer, timerEvent);

    expect(late).not.toHaveBeenCalled();
    expect(registry.subscriberCount(CallbackType.Timer)).toBe(2);
  });
});
