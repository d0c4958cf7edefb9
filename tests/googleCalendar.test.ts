import test from 'node:test';
import assert from 'node:assert/strict';
import { toBusyInterval, createCalendarProvider, CalendarEvent } from '../src/calendar/index.js';
import { loadConfig } from '../src/config/index.js';
import { toIso } from '../src/scheduler/intervals.js';

const zone = 'America/New_York';

function event(start: CalendarEvent['start'], end: CalendarEvent['end']): CalendarEvent {
  return { id: 'evt', summary: 'Lecture', start, end };
}

test('toBusyInterval converts timed events to the scheduler zone', () => {
  const interval = toBusyInterval(
    event({ dateTime: '2026-11-09T15:00:00Z' }, { dateTime: '2026-11-09T16:30:00Z' }),
    zone
  );

  assert.equal(interval && toIso(interval.start), '2026-11-09T10:00:00-05:00');
  assert.equal(interval && toIso(interval.end), '2026-11-09T11:30:00-05:00');
});

test('toBusyInterval blocks all-day events from local midnight to midnight', () => {
  const interval = toBusyInterval(event({ date: '2026-11-09' }, { date: '2026-11-10' }), zone);

  assert.equal(interval && toIso(interval.start), '2026-11-09T00:00:00-05:00');
  assert.equal(interval && toIso(interval.end), '2026-11-10T00:00:00-05:00');
});

test('toBusyInterval skips events it cannot read', () => {
  assert.equal(toBusyInterval(event({}, { dateTime: '2026-11-09T16:30:00Z' }), zone), null);
  assert.equal(toBusyInterval(event({ dateTime: 'soon' }, { dateTime: '2026-11-09T16:30:00Z' }), zone), null);
  assert.equal(
    toBusyInterval(event({ dateTime: '2026-11-09T16:30:00Z' }, { dateTime: '2026-11-09T16:30:00Z' }), zone),
    null
  );
});

test('createCalendarProvider uses memory without Google credentials', () => {
  assert.equal(createCalendarProvider(loadConfig({})).name, 'memory');
});

test('createCalendarProvider uses Google when credentials are set', () => {
  const config = loadConfig({
    GOOGLE_CLIENT_ID: 'test-client-id',
    GOOGLE_CLIENT_SECRET: 'test-secret',
    GOOGLE_REFRESH_TOKEN: 'test-refresh-token'
  });
  assert.equal(createCalendarProvider(config).name, 'google');
});
