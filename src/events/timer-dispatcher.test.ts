import { describe, it, expect, vi } from 'vitest';
import { CallbackRegistry, CallbackType } from './callback-registry.js';
import { TimerDispatcher } from './timer-dispatcher.js';

describe('TimerDispatcher', () => {
  const fixedClock = () => new Date('2025-03-01T12:00:00.000Z');

  it('should fire exactly one timer event per tick', () => {
    const registry = new CallbackRegistry();
    const fireSpy = vi.spyOn(registry, 'fireEvent');
    const dispatcher = new TimerDispatcher(registry, fixedClock);

    dispatcher.tick(7);

    expect(fireSpy).toHaveBeenCalledTimes(1);
    expect(fireSpy).toHaveBeenCalledWith(CallbackType.Timer, {
      n: 7,
      firedAt: '2025-03-01T12:00:00.000Z',
    });
  });

  it('should return the tick counter unchanged', () => {
    const dispatcher = new TimerDispatcher(new CallbackRegistry(), fixedClock);

    expect(dispatcher.tick(0)).toBe(0);
    expect(dispatcher.tick(42)).toBe(42);
  });

  it('should fire on every tick, including repeated counters', () => {
    const registry = new CallbackRegistry();
    const subscriber = vi.fn();
    registry.subscribe(CallbackType.Timer, subscriber);
    const dispatcher = new TimerDispatcher(registry, fixedClock);

    dispatcher.tick(3);
    dispatcher.tick(3);
    dispatcher.tick(4);

    expect(subscriber).toHaveBeenCalledTimes(3);
    expect(subscriber.mock.calls.map(([event]) => event.n)).toEqual([3, 3, 4]);
  });
});
