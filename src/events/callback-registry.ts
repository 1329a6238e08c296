/**
 * Observer list for dashboard events.
 *
 * One registry is created by the composition root and handed to every
 * component that publishes or listens; there is no module-level instance.
 */

import { logError, toError } from '../errors/index.js';

export enum CallbackType {
  Timer = 'timer',
  ScheduleStart = 'schedule-start',
  ScheduleEnd = 'schedule-end',
}

export interface TimerEvent {
  n: number;
  firedAt: string;
}

export interface ScheduleEvent {
  scheduleId: number;
  name: string;
  at: string;
}

export interface CallbackPayloads {
  [CallbackType.Timer]: TimerEvent;
  [CallbackType.ScheduleStart]: ScheduleEvent;
  [CallbackType.ScheduleEnd]: ScheduleEvent;
}

export type Callback<K extends CallbackType> = (payload: CallbackPayloads[K]) => void;

type SubscriberLists = { [K in CallbackType]: Array<Callback<K>> };

export class CallbackRegistry {
  private subscribers: SubscriberLists = {
    [CallbackType.Timer]: [],
    [CallbackType.ScheduleStart]: [],
    [CallbackType.ScheduleEnd]: [],
  };

  /**
   * Register a callback; returns a function that removes it again
   */
  subscribe<K extends CallbackType>(type: K, callback: Callback<K>): () => void {
    this.subscribers[type].push(callback);
    return () => {
      this.unsubscribe(type, callback);
    };
  }

  /**
   * Remove one registration of the callback. Returns false if it was not registered.
   */
  unsubscribe<K extends CallbackType>(type: K, callback: Callback<K>): boolean {
    const list = this.subscribers[type];
    const index = list.indexOf(callback);
    if (index === -1) {
      return false;
    }
    list.splice(index, 1);
    return true;
  }

  /**
   * Notify every subscriber of the event type in registration order.
   * A throwing subscriber is logged and the rest still run.
   *
   * @returns number of subscribers notified
   */
  fireEvent<K extends CallbackType>(type: K, payload: CallbackPayloads[K]): number {
    const snapshot = [...this.subscribers[type]];

    for (const callback of snapshot) {
      try {
        callback(payload);
      } catch (error) {
        logError(toError(error), { eventType: type });
      }
    }

    return snapshot.length;
  }

  subscriberCount(type: CallbackType): number {
    return this.subscribers[type].length;
  }
}
