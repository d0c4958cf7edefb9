/**
 * In-memory Calendar Provider
 *
 * Used when no Google credentials are configured, and in tests.
 * Reads return the seeded intervals plus everything written so far.
 */

import { DateTime } from 'luxon';
import { CalendarProvider, ProviderName } from './types.js';
import { EventHandle, TimeInterval } from '../types/index.js';
import { Result, ok, err } from '../utils/result.js';
import { overlaps } from '../scheduler/intervals.js';

export interface MemoryEvent {
  id: string;
  interval: TimeInterval;
  title: string;
  description: string;
}

export interface MemoryCalendarOptions {
  timeZone?: string;
  busy?: TimeInterval[];
  failReads?: boolean;
  failWriteWhen?: (title: string, interval: TimeInterval) => boolean;
}

export class MemoryCalendarProvider implements CalendarProvider {
  name: ProviderName = 'memory';

  readonly events: MemoryEvent[] = [];
  readonly queries: Array<{ timeMin: DateTime; timeMax: DateTime }> = [];
  writeAttempts = 0;

  private busy: TimeInterval[];
  private timeZone: string;
  private failReads: boolean;
  private failWriteWhen?: (title: string, interval: TimeInterval) => boolean;

  constructor(options: MemoryCalendarOptions = {}) {
    this.timeZone = options.timeZone ?? 'America/New_York';
    this.busy = [...(options.busy ?? [])];
    this.failReads = options.failReads ?? false;
    this.failWriteWhen = options.failWriteWhen;
  }

  async listBusyIntervals(timeMin: DateTime, timeMax: DateTime): Promise<Result<TimeInterval[]>> {
    this.queries.push({ timeMin, timeMax });

    if (this.failReads) {
      return err('CALENDAR_READ_FAILED', 'Memory calendar is configured to fail reads');
    }

    const range: TimeInterval = { start: timeMin, end: timeMax };
    const intervals = [...this.busy, ...this.events.map(e => e.interval)]
      .filter(interval => overlaps(interval, range))
      .map(interval => ({
        start: interval.start.setZone(this.timeZone),
        end: interval.end.setZone(this.timeZone)
      }))
      .sort((a, b) => a.start.toMillis() - b.start.toMillis());

    return ok(intervals);
  }

  async createEvent(interval: TimeInterval, title: string, description: string): Promise<Result<EventHandle>> {
    this.writeAttempts++;

    if (this.failWriteWhen?.(title, interval)) {
      return err('CALENDAR_WRITE_FAILED', `Failed to create event "${title}"`);
    }

    const id = `memory-${this.events.length + 1}`;
    this.events.push({ id, interval, title, description });
    console.log('[MemoryCalendar] Event created:', id);

    return ok({ id });
  }
}
