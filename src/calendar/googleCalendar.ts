/**
 * Google Calendar Provider
 *
 * Reads existing events as busy time and writes study sessions through the
 * Google Calendar API.
 */

import { DateTime } from 'luxon';
import { google, calendar_v3 } from 'googleapis';
import { CalendarProvider, ProviderName } from './types.js';
import { EventHandle, TimeInterval } from '../types/index.js';
import { Result, ok, err, toAppError } from '../utils/result.js';
import { toIso } from '../scheduler/intervals.js';

type OAuth2Client = InstanceType<typeof google.auth.OAuth2>;

// Largest page the events.list endpoint accepts
const PAGE_SIZE = 2500;

export interface CalendarEvent {
  id?: string;
  summary: string;
  description?: string;
  htmlLink?: string;
  start: {
    dateTime?: string;  // ISO 8601
    date?: string;      // YYYY-MM-DD (all-day)
    timeZone?: string;
  };
  end: {
    dateTime?: string;
    date?: string;
    timeZone?: string;
  };
}

export interface GoogleCalendarOptions {
  clientId?: string;
  clientSecret?: string;
  redirectUri?: string;
  refreshToken?: string;
  calendarId?: string;
  timeZone: string;
}

/**
 * Busy interval of one event, or null when its times cannot be read.
 * All-day events block local midnight to local midnight.
 */
export function toBusyInterval(event: CalendarEvent, timeZone: string): TimeInterval | null {
  const rawStart = event.start.dateTime ?? event.start.date;
  const rawEnd = event.end.dateTime ?? event.end.date;
  if (!rawStart || !rawEnd) return null;

  const start = DateTime.fromISO(rawStart, { zone: timeZone });
  const end = DateTime.fromISO(rawEnd, { zone: timeZone });
  if (!start.isValid || !end.isValid || end.toMillis() <= start.toMillis()) {
    return null;
  }

  return { start, end };
}

export class GoogleCalendarProvider implements CalendarProvider {
  name: ProviderName = 'google';

  private oauth2Client: OAuth2Client;
  private calendar: calendar_v3.Calendar;
  private calendarId: string;
  private timeZone: string;

  constructor(options: GoogleCalendarOptions) {
    this.oauth2Client = new google.auth.OAuth2(
      options.clientId,
      options.clientSecret,
      options.redirectUri
    );
    if (options.refreshToken) {
      this.oauth2Client.setCredentials({ refresh_token: options.refreshToken });
    }

    this.calendar = google.calendar({ version: 'v3', auth: this.oauth2Client });
    this.calendarId = options.calendarId ?? 'primary';
    this.timeZone = options.timeZone;
  }

  // ====================================================
  // Read
  // ====================================================

  /**
   * All single events in the range, following every page
   */
  async listEvents(timeMin: DateTime, timeMax: DateTime): Promise<CalendarEvent[]> {
    const events: CalendarEvent[] = [];
    let pageToken: string | undefined;

    do {
      const response = await this.calendar.events.list({
        calendarId: this.calendarId,
        timeMin: toIso(timeMin),
        timeMax: toIso(timeMax),
        maxResults: PAGE_SIZE,
        singleEvents: true,
        orderBy: 'startTime',
        pageToken
      });

      events.push(...(response.data.items || []).map(event => this.mapToCalendarEvent(event)));
      pageToken = response.data.nextPageToken || undefined;
    } while (pageToken);

    return events;
  }

  async listBusyIntervals(timeMin: DateTime, timeMax: DateTime): Promise<Result<TimeInterval[]>> {
    try {
      const events = await this.listEvents(timeMin, timeMax);
      const intervals: TimeInterval[] = [];

      for (const event of events) {
        const interval = toBusyInterval(event, this.timeZone);
        if (!interval) {
          console.warn('[GoogleCalendar] Skipping event with unreadable times:', event.id);
          continue;
        }
        intervals.push(interval);
      }

      return ok(intervals);
    } catch (error) {
      console.error('[GoogleCalendar] listBusyIntervals error:', error);
      return { ok: false, error: toAppError(error, 'CALENDAR_READ_FAILED') };
    }
  }

  // ====================================================
  // Write
  // ====================================================

  async createEvent(interval: TimeInterval, title: string, description: string): Promise<Result<EventHandle>> {
    try {
      const response = await this.calendar.events.insert({
        calendarId: this.calendarId,
        requestBody: {
          summary: title,
          description: description || undefined,
          start: { dateTime: toIso(interval.start), timeZone: this.timeZone },
          end: { dateTime: toIso(interval.end), timeZone: this.timeZone }
        }
      });

      const id = response.data.id;
      if (!id) {
        return err('CALENDAR_WRITE_FAILED', `Calendar returned no id for "${title}"`);
      }

      console.log('[GoogleCalendar] Event created:', id);
      return ok({ id, htmlLink: response.data.htmlLink || undefined });
    } catch (error) {
      console.error('[GoogleCalendar] createEvent error:', error);
      return { ok: false, error: toAppError(error, 'CALENDAR_WRITE_FAILED') };
    }
  }

  // ====================================================
  // Utilities
  // ====================================================

  private mapToCalendarEvent(event: calendar_v3.Schema$Event): CalendarEvent {
    return {
      id: event.id || undefined,
      summary: event.summary || '',
      description: event.description || undefined,
      htmlLink: event.htmlLink || undefined,
      start: {
        dateTime: event.start?.dateTime || undefined,
        date: event.start?.date || undefined,
        timeZone: event.start?.timeZone || undefined
      },
      end: {
        dateTime: event.end?.dateTime || undefined,
        date: event.end?.date || undefined,
        timeZone: event.end?.timeZone || undefined
      }
    };
  }
}
