import { getConfig } from '../config/index.js';
import { CalendarProvider, createCalendarProvider } from '../calendar/index.js';
import { BatchScheduler } from '../scheduler/index.js';
import { createTaskQueue } from '../utils/taskQueue.js';

// Singletons, created on first use
let calendar: CalendarProvider | null = null;
let scheduler: BatchScheduler | null = null;

export function getCalendar(): CalendarProvider {
  if (!calendar) {
    calendar = createCalendarProvider(getConfig());
  }
  return calendar;
}

export function getScheduler(): BatchScheduler {
  if (!scheduler) {
    scheduler = new BatchScheduler(getCalendar(), getConfig().scheduler);
  }
  return scheduler;
}

// One calendar per server, so one queue
export const runExclusive = createTaskQueue();
