/**
 * Turns system timer ticks from the dashboard into `timer` events.
 *
 * Every tick fires; there is no filtering, coalescing or backpressure.
 */

import { CallbackRegistry, CallbackType } from './callback-registry.js';

export class TimerDispatcher {
  constructor(
    private registry: CallbackRegistry,
    private clock: () => Date = () => new Date()
  ) {}

  /**
   * Fire one timer event and echo the tick counter back
   */
  tick(n: number): number {
    this.registry.fireEvent(CallbackType.Timer, { n, firedAt: this.clock().toISOString() });
    return n;
  }
}
