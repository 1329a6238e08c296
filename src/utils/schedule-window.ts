/**
 * Daily capture window utilities.
 *
 * A window starts at a UTC "HH:MM" time every day and lasts a number of
 * minutes; windows that run past midnight wrap into the next day.
 */

const MINUTES_PER_DAY = 24 * 60;

export interface DailyWindow {
  startTime: string;
  durationMinutes: number;
}

export function parseStartTime(startTime: string): { hour: number; minute: number } {
  const match = /^(\d{2}):(\d{2})$/.exec(startTime.trim());
  if (!match) {
    throw new Error(`Invalid start time: ${startTime}`);
  }

  const hour = parseInt(match[1], 10);
  const minute = parseInt(match[2], 10);

  if (hour > 23 || minute > 59) {
    throw new Error(`Invalid start time: ${startTime}`);
  }

  return { hour, minute };
}

export function isValidStartTime(startTime: string): boolean {
  try {
    parseStartTime(startTime);
    return true;
  } catch {
    return false;
  }
}

/**
 * Whether `at` falls inside the window, start inclusive and end exclusive
 */
export function isWindowActive(captureWindow: DailyWindow, at: Date = new Date()): boolean {
  const { hour, minute } = parseStartTime(captureWindow.startTime);
  const startMinute = hour * 60 + minute;
  const nowMinute = at.getUTCHours() * 60 + at.getUTCMinutes();
  const elapsed = (nowMinute - startMinute + MINUTES_PER_DAY) % MINUTES_PER_DAY;

  return elapsed < captureWindow.durationMinutes;
}

/**
 * ISO timestamp of the next time the window opens (strictly after `from`)
 */
export function getNextWindowStart(startTime: string, from: Date = new Date()): string {
  const { hour, minute } = parseStartTime(startTime);

  const next = new Date(from);
  next.setUTCHours(hour, minute, 0, 0);

  if (next.getTime() <= from.getTime()) {
    next.setUTCDate(next.getUTCDate() + 1);
  }

  return next.toISOString();
}
