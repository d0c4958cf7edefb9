import { DateTime, Duration } from 'luxon';
import { TimeInterval } from '../types/index.js';
import { BlackoutWindow, SchedulerConfig } from '../config/index.js';

/**
 * Overlap check (half-open: touching endpoints do not overlap)
 */
export function overlaps(a: TimeInterval, b: TimeInterval): boolean {
  return a.start.toMillis() < b.end.toMillis() && b.start.toMillis() < a.end.toMillis();
}

/**
 * The given local day at a whole hour. Hour 24 is midnight of the next day.
 */
export function atLocalHour(day: DateTime, hour: number): DateTime {
  const midnight = day.startOf('day');
  if (hour >= 24) {
    return midnight.plus({ days: 1 });
  }
  return midnight.set({ hour });
}

/**
 * Working window of a local calendar day (09:00 - 22:00 by default)
 */
export function dayWindow(
  day: DateTime,
  config: Pick<SchedulerConfig, 'timeZone' | 'workdayStartHour' | 'workdayEndHour'>
): TimeInterval {
  const local = day.setZone(config.timeZone);
  return {
    start: atLocalHour(local, config.workdayStartHour),
    end: atLocalHour(local, config.workdayEndHour)
  };
}

function blackoutOn(day: DateTime, window: BlackoutWindow): TimeInterval {
  return {
    start: atLocalHour(day, window.startHour),
    end: atLocalHour(day, window.endHour)
  };
}

/**
 * Free slot search
 *
 * Walks candidate start times from windowStart. A candidate that touches a
 * blackout window moves on by stepMinutes; one that hits a busy interval jumps
 * straight to that interval's end. Returns null once nothing fits before windowEnd.
 */
export function findFreeSlot(
  windowStart: DateTime,
  windowEnd: DateTime,
  duration: Duration,
  busy: readonly TimeInterval[],
  blackoutWindows: readonly BlackoutWindow[],
  stepMinutes: number = 30
): TimeInterval | null {
  const zone = windowStart.zone;
  let candidate = windowStart;

  while (candidate.plus(duration).toMillis() <= windowEnd.toMillis()) {
    const slot: TimeInterval = { start: candidate, end: candidate.plus(duration) };

    const inBlackout = blackoutWindows.some(window => overlaps(slot, blackoutOn(candidate, window)));
    if (inBlackout) {
      candidate = candidate.plus({ minutes: stepMinutes });
      continue;
    }

    const conflict = busy.find(interval => overlaps(slot, interval));
    if (conflict) {
      candidate = conflict.end.setZone(zone);
      continue;
    }

    return slot;
  }

  return null;
}

export function toIso(dt: DateTime): string {
  return dt.toISO({ suppressMilliseconds: true }) ?? dt.toString();
}

export function formatDay(dt: DateTime): string {
  return dt.toFormat('yyyy-MM-dd');
}
