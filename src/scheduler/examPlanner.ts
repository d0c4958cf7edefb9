import { DateTime } from 'luxon';
import { SchedulerConfig } from '../config/index.js';
import { formatDay } from './intervals.js';

/**
 * Round half to even (2.5 -> 2, 3.5 -> 4)
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * First local day an exam's prep sessions can fall on
 */
export function prepSpanStart(
  due: DateTime,
  prepSpanDays: number,
  config: Pick<SchedulerConfig, 'timeZone' | 'defaultPrepSpanDays'>
): DateTime {
  const spanDays = prepSpanDays > 0 ? prepSpanDays : config.defaultPrepSpanDays;
  return due.setZone(config.timeZone).minus({ days: spanDays });
}

/**
 * Prep session days for an exam, spread evenly over the span before the due date.
 *
 * day_i = (due - span) + round(i * span / sessions), i in [0, sessions).
 * A span of zero or less falls back to the default span. Two sessions can land
 * on the same day; the second one then takes a later slot that day.
 */
export function examSessionDays(
  due: DateTime,
  prepSessions: number,
  prepSpanDays: number,
  config: Pick<SchedulerConfig, 'timeZone' | 'defaultPrepSpanDays'>
): DateTime[] {
  const spanDays = prepSpanDays > 0 ? prepSpanDays : config.defaultPrepSpanDays;
  const spanStart = prepSpanStart(due, prepSpanDays, config);
  const delta = spanDays / Math.max(1, prepSessions);

  const days: DateTime[] = [];
  for (let i = 0; i < prepSessions; i++) {
    days.push(spanStart.plus({ days: roundHalfEven(i * delta) }).startOf('day'));
  }
  return days;
}

export function noSlotOnDayMessage(day: DateTime): string {
  return `No free slot found on ${formatDay(day)}`;
}
