import type { SyncWindow } from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_PAST_DAYS = 7;
export const DEFAULT_FUTURE_DAYS = 28;

/**
 * Window from `pastDays` before `now` to `futureDays` after it.
 */
export function buildSyncWindow(
  now: Date,
  pastDays: number = DEFAULT_PAST_DAYS,
  futureDays: number = DEFAULT_FUTURE_DAYS
): SyncWindow {
  if (pastDays < 0 || futureDays < 0) {
    throw new RangeError("Window sizes must not be negative");
  }
  return {
    start: new Date(now.getTime() - pastDays * DAY_MS),
    end: new Date(now.getTime() + futureDays * DAY_MS),
  };
}

/**
 * Half-open membership test on the event start.
 */
export function isInWindow(start: Date, window: SyncWindow): boolean {
  const t = start.getTime();
  return t >= window.start.getTime() && t < window.end.getTime();
}

export function describeWindow(window: SyncWindow): string {
  return `${window.start.toISOString()} .. ${window.end.toISOString()}`;
}
