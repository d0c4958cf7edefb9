import { AppConfig } from '../config/index.js';
import { CalendarProvider } from './types.js';
import { GoogleCalendarProvider } from './googleCalendar.js';
import { MemoryCalendarProvider } from './memoryCalendar.js';

export type { CalendarProvider, ProviderName } from './types.js';
export { GoogleCalendarProvider, toBusyInterval } from './googleCalendar.js';
export type { CalendarEvent } from './googleCalendar.js';
export { MemoryCalendarProvider } from './memoryCalendar.js';

/**
 * Google when OAuth credentials are configured, otherwise in-memory
 */
export function createCalendarProvider(config: AppConfig): CalendarProvider {
  const { google } = config;

  if (google.clientId && google.clientSecret && google.refreshToken) {
    return new GoogleCalendarProvider({
      clientId: google.clientId,
      clientSecret: google.clientSecret,
      redirectUri: google.redirectUri,
      refreshToken: google.refreshToken,
      calendarId: google.calendarId,
      timeZone: config.scheduler.timeZone
    });
  }

  console.warn('[Calendar] Google credentials not set, using the in-memory calendar');
  return new MemoryCalendarProvider({ timeZone: config.scheduler.timeZone });
}
