import test from 'node:test';
import assert from 'node:assert/strict';
import { DateTime, Duration } from 'luxon';
import { anchorDay, fallbackDays, findHomeworkSlot, exhaustedMessage } from '../src/scheduler/placement.js';
import { DEFAULT_SCHEDULER_CONFIG, SchedulerConfig } from '../src/config/index.js';
import { TimeInterval } from '../src/types/index.js';

const zone = 'America/New_York';
const at = (iso: string) => DateTime.fromISO(iso, { zone });
const span = (start: string, end: string): TimeInterval => ({ start: at(start), end: at(end) });
const fmt = (interval: TimeInterval | null) =>
  interval ? `${interval.start.toFormat('yyyy-MM-dd HH:mm')}-${interval.end.toFormat('HH:mm')}` : null;
const days = (list: DateTime[]) => list.map(d => d.toFormat('yyyy-MM-dd'));

const config = DEFAULT_SCHEDULER_CONFIG;
const backwardFirst: SchedulerConfig = { ...DEFAULT_SCHEDULER_CONFIG, fallbackOrder: 'backward-first' };
const twoHours = Duration.fromObject({ hours: 2 });
const due = at('2026-11-10T23:59');

test('anchorDay is two local days before the due date', () => {
  assert.equal(anchorDay(due, config).toFormat('yyyy-MM-dd HH:mm'), '2026-11-08 00:00');
});

test('anchorDay uses the local date of a UTC due date', () => {
  // 03:00Z on the 10th is 22:00 on the 9th in New York
  const utcDue = DateTime.fromISO('2026-11-10T03:00:00Z');
  assert.equal(anchorDay(utcDue, config).toFormat('yyyy-MM-dd'), '2026-11-07');
});

test('fallbackDays interleaves earlier and later days', () => {
  const anchor = at('2026-11-08');
  assert.deepEqual(days(fallbackDays(anchor, 2, 'interleaved')), [
    '2026-11-07',
    '2026-11-09',
    '2026-11-06',
    '2026-11-10'
  ]);
});

test('fallbackDays backward-first tries every earlier day before later ones', () => {
  const anchor = at('2026-11-08');
  assert.deepEqual(days(fallbackDays(anchor, 2, 'backward-first')), [
    '2026-11-07',
    '2026-11-06',
    '2026-11-09',
    '2026-11-10'
  ]);
});

test('findHomeworkSlot takes 09:00 on the anchor day of an empty calendar', () => {
  assert.equal(fmt(findHomeworkSlot(due, twoHours, [], config)), '2026-11-08 09:00-11:00');
});

test('findHomeworkSlot moves to the day before when the anchor day is full', () => {
  const busy = [span('2026-11-08T00:00', '2026-11-09T00:00')];
  assert.equal(fmt(findHomeworkSlot(due, twoHours, busy, config)), '2026-11-07 09:00-11:00');
});

test('findHomeworkSlot fallback order decides between later and earlier days', () => {
  const busy = [span('2026-11-07T00:00', '2026-11-09T00:00')];

  assert.equal(fmt(findHomeworkSlot(due, twoHours, busy, config)), '2026-11-09 09:00-11:00');
  assert.equal(fmt(findHomeworkSlot(due, twoHours, busy, backwardFirst)), '2026-11-06 09:00-11:00');
});

test('findHomeworkSlot gives up after the search radius', () => {
  const busy = [span('2026-11-01T00:00', '2026-11-16T00:00')];
  assert.equal(findHomeworkSlot(due, twoHours, busy, config), null);
});

test('findHomeworkSlot reaches the last day of the radius', () => {
  // Everything but the 15th (anchor + 7) is taken
  const busy = [span('2026-11-01T00:00', '2026-11-15T00:00')];
  assert.equal(fmt(findHomeworkSlot(due, twoHours, busy, config)), '2026-11-15 09:00-11:00');
});

test('exhaustedMessage names the search radius', () => {
  assert.equal(exhaustedMessage(config), 'No free slot found within +/-7 days of preferred scheduling day.');
});
