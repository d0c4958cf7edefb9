/**
 * Calendar Provider Types
 *
 * The two capabilities the scheduler needs from a calendar: read the busy
 * time in a range, and write one event.
 */

import type { DateTime } from 'luxon';
import type { EventHandle, TimeInterval } from '../types/index.js';
import type { Result } from '../utils/result.js';

export type ProviderName = 'google' | 'memory';

export interface CalendarProvider {
  /** Provider name */
  name: ProviderName;

  /** Busy intervals overlapping [timeMin, timeMax], normalized to the scheduler zone */
  listBusyIntervals(timeMin: DateTime, timeMax: DateTime): Promise<Result<TimeInterval[]>>;

  /** Writes one event */
  createEvent(interval: TimeInterval, title: string, description: string): Promise<Result<EventHandle>>;
}
