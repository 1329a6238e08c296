/**
 * Timer subscriber that tracks ticks and capture schedule windows.
 *
 * On every `timer` event the enabled schedules are re-evaluated and
 * `schedule-start` / `schedule-end` fire for windows that opened or closed
 * since the previous tick.
 */

import {
  CallbackRegistry,
  CallbackType,
  type TimerEvent,
} from '../events/callback-registry.js';
import type { Schedule } from '../db/capturer-dao.js';
import { isWindowActive } from '../utils/schedule-window.js';

export interface ScheduleSource {
  listSchedules(): Schedule[];
}

export type ActiveSchedule = Pick<Schedule, 'id' | 'name' | 'startTime' | 'durationMinutes'>;

export interface MonitorSnapshot {
  startedAt: string;
  uptimeSeconds: number;
  ticksReceived: number;
  lastTick: number | null;
  lastTickAt: string | null;
  activeSchedules: ActiveSchedule[];
}

export class ScheduleMonitor {
  private readonly startedAt: Date;
  private ticksReceived = 0;
  private lastTick: number | null = null;
  private lastTickAt: string | null = null;
  private active = new Map<number, Schedule>();
  private detach: (() => void) | null = null;

  constructor(
    private schedules: ScheduleSource,
    private registry: CallbackRegistry,
    private clock: () => Date = () => new Date()
  ) {
    this.startedAt = clock();
  }

  start(): void {
    if (this.detach) {
      return;
    }
    this.detach = this.registry.subscribe(CallbackType.Timer, event => this.handleTick(event));
  }

  stop(): void {
    this.detach?.();
    this.detach = null;
  }

  handleTick(event: TimerEvent): void {
    this.ticksReceived += 1;
    this.lastTick = event.n;
    this.lastTickAt = event.firedAt;

    const now = this.clock();
    const at = now.toISOString();
    const nowActive = new Map<number, Schedule>();

    for (const schedule of this.schedules.listSchedules()) {
      if (schedule.enabled && isWindowActive(schedule, now)) {
        nowActive.set(schedule.id, schedule);
      }
    }

    for (const [id, schedule] of nowActive) {
      if (!this.active.has(id)) {
        this.registry.fireEvent(CallbackType.ScheduleStart, { scheduleId: id, name: schedule.name, at });
      }
    }

    for (const [id, schedule] of this.active) {
      if (!nowActive.has(id)) {
        this.registry.fireEvent(CallbackType.ScheduleEnd, { scheduleId: id, name: schedule.name, at });
      }
    }

    this.active = nowActive;
  }

  getSnapshot(): MonitorSnapshot {
    const now = this.clock();

    return {
      startedAt: this.startedAt.toISOString(),
      uptimeSeconds: Math.max(0, Math.floor((now.getTime() - this.startedAt.getTime()) / 1000)),
      ticksReceived: this.ticksReceived,
      lastTick: this.lastTick,
      lastTickAt: this.lastTickAt,
      activeSchedules: [...this.active.values()].map(({ id, name, startTime, durationMinutes }) => ({
        id,
        name,
        startTime,
        durationMinutes,
      })),
    };
  }
}
