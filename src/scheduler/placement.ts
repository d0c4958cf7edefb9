import { DateTime, Duration } from 'luxon';
import { TimeInterval } from '../types/index.js';
import { FallbackOrder, SchedulerConfig } from '../config/index.js';
import { dayWindow, findFreeSlot } from './intervals.js';

// Homework sessions are anchored this many days before the due date
export const HOMEWORK_LEAD_DAYS = 2;

/**
 * Preferred local day for a single homework session
 */
export function anchorDay(due: DateTime, config: Pick<SchedulerConfig, 'timeZone'>): DateTime {
  return due.setZone(config.timeZone).minus({ days: HOMEWORK_LEAD_DAYS }).startOf('day');
}

/**
 * Days to try after the anchor day is full.
 *
 * interleaved:    -1, +1, -2, +2, ... -radius, +radius
 * backward-first: -1 ... -radius, then +1 ... +radius
 */
export function fallbackDays(anchor: DateTime, radiusDays: number, order: FallbackOrder): DateTime[] {
  const days: DateTime[] = [];

  if (order === 'backward-first') {
    for (let offset = 1; offset <= radiusDays; offset++) {
      days.push(anchor.minus({ days: offset }));
    }
    for (let offset = 1; offset <= radiusDays; offset++) {
      days.push(anchor.plus({ days: offset }));
    }
    return days;
  }

  for (let offset = 1; offset <= radiusDays; offset++) {
    days.push(anchor.minus({ days: offset }));
    days.push(anchor.plus({ days: offset }));
  }
  return days;
}

export function findSlotOnDay(
  day: DateTime,
  duration: Duration,
  busy: readonly TimeInterval[],
  config: SchedulerConfig
): TimeInterval | null {
  const window = dayWindow(day, config);
  return findFreeSlot(window.start, window.end, duration, busy, config.blackoutWindows, config.slotStepMinutes);
}

/**
 * Slot for one homework session: the anchor day first, then the fallback days.
 */
export function findHomeworkSlot(
  due: DateTime,
  duration: Duration,
  busy: readonly TimeInterval[],
  config: SchedulerConfig
): TimeInterval | null {
  const anchor = anchorDay(due, config);
  const candidates = [anchor, ...fallbackDays(anchor, config.searchRadiusDays, config.fallbackOrder)];

  for (const day of candidates) {
    const slot = findSlotOnDay(day, duration, busy, config);
    if (slot) {
      return slot;
    }
  }

  return null;
}

export function exhaustedMessage(config: Pick<SchedulerConfig, 'searchRadiusDays'>): string {
  return `No free slot found within +/-${config.searchRadiusDays} days of preferred scheduling day.`;
}
