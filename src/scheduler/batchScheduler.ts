import { DateTime, Duration } from 'luxon';
import {
  AssignmentRequest,
  BatchOptions,
  BatchReport,
  EventHandle,
  PlacementResult,
  TimeInterval
} from '../types/index.js';
import { DEFAULT_SCHEDULER_CONFIG, SchedulerConfig } from '../config/index.js';
import { CalendarProvider } from '../calendar/types.js';
import { Result, toAppError } from '../utils/result.js';
import { toIso } from './intervals.js';
import { anchorDay, exhaustedMessage, findHomeworkSlot, findSlotOnDay } from './placement.js';
import { examSessionDays, noSlotOnDayMessage, prepSpanStart } from './examPlanner.js';
import { buildErrorReport, buildReport, summarizeReport } from './report.js';

const LOOKBACK_DAYS = 14;
const LOOKAHEAD_DAYS = 1;

export const INVALID_DUE_DATE = 'Invalid due_date format; expected ISO datetime string.';
export const MISSING_TITLE = 'Missing title';
export const INVALID_DURATION = 'Invalid estimated_hours; expected a positive number.';
export const READ_FAILED = 'Could not fetch existing events';

export interface QueuedAssignment {
  request: AssignmentRequest;
  index: number;
  due: DateTime | null;
}

/**
 * ISO due date in the scheduler zone. Strings without an offset are read as local time.
 */
export function parseDueDate(raw: unknown, timeZone: string): DateTime | null {
  if (typeof raw !== 'string' || !raw.trim()) return null;
  const due = DateTime.fromISO(raw.trim(), { zone: timeZone });
  return due.isValid ? due : null;
}

/**
 * Days a request can end up on: the exam prep span for exams, the anchor day
 * plus the fallback radius for homework. Runs to the start of the day after
 * the last one.
 */
export function placementRange(
  request: AssignmentRequest,
  due: DateTime,
  config: SchedulerConfig
): TimeInterval {
  if (request.kind === 'exam') {
    const start = prepSpanStart(due, request.prepSpanDays ?? config.defaultPrepSpanDays, config).startOf('day');
    return { start, end: due.setZone(config.timeZone).plus({ days: 1 }).startOf('day') };
  }

  const anchor = anchorDay(due, config);
  return {
    start: anchor.minus({ days: config.searchRadiusDays }),
    end: anchor.plus({ days: config.searchRadiusDays + 1 })
  };
}

/**
 * Range of busy time to read for a batch: 14 days before the earliest due
 * date to 1 day after the latest, widened to every day a placement can land
 * on. Falls back to now -> now + 14 days when no due date could be parsed.
 */
export function coveringWindow(
  items: ReadonlyArray<Pick<QueuedAssignment, 'request' | 'due'>>,
  now: DateTime,
  config: SchedulerConfig
): TimeInterval {
  let earliest: DateTime | null = null;
  let latest: DateTime | null = null;

  for (const { request, due } of items) {
    if (!due) continue;
    const range = placementRange(request, due, config);
    for (const from of [due.minus({ days: LOOKBACK_DAYS }), range.start]) {
      if (!earliest || from.toMillis() < earliest.toMillis()) earliest = from;
    }
    for (const to of [due.plus({ days: LOOKAHEAD_DAYS }), range.end]) {
      if (!latest || to.toMillis() > latest.toMillis()) latest = to;
    }
  }

  if (!earliest || !latest) {
    const start = now.setZone(config.timeZone);
    return { start, end: start.plus({ days: LOOKBACK_DAYS }) };
  }

  return { start: earliest, end: latest };
}

export function assignmentId(request: AssignmentRequest, index: number): string {
  return request.id?.trim() || request.title?.trim() || `assignment-${index + 1}`;
}

export function sessionDescription(heading: string, request: AssignmentRequest): string {
  return [
    heading,
    `Resource Folder: ${request.folderLink || '[FOLDER_LINK]'}`,
    `Materials: ${JSON.stringify(request.materials ?? [])}`
  ].join('\n');
}

/**
 * Stable sort by due date; unparseable dates keep their order at the end.
 */
function byDueDate(queue: QueuedAssignment[]): QueuedAssignment[] {
  return [...queue].sort((a, b) => {
    if (a.due && b.due) return a.due.toMillis() - b.due.toMillis();
    if (a.due) return -1;
    if (b.due) return 1;
    return 0;
  });
}

/**
 * Batch Scheduler
 *
 * Reads busy time once for the whole batch, then places assignments one at a
 * time. Every committed session joins the busy set, so later assignments in
 * the same batch never collide with earlier ones. Callers must not run two
 * batches against the same calendar at once.
 */
export class BatchScheduler {
  constructor(
    private calendar: CalendarProvider,
    private config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG
  ) {}

  async scheduleBatch(assignments: AssignmentRequest[], options: BatchOptions = {}): Promise<BatchReport> {
    const zone = this.config.timeZone;
    const queue: QueuedAssignment[] = assignments.map((request, index) => ({
      request,
      index,
      due: parseDueDate(request.dueDate, zone)
    }));

    const window = coveringWindow(queue, options.now ?? DateTime.now(), this.config);
    console.log(
      `[BatchScheduler] ${assignments.length} assignment(s), reading busy time ${toIso(window.start)} -> ${toIso(window.end)}`
    );

    let read: Result<TimeInterval[]>;
    try {
      read = await this.calendar.listBusyIntervals(window.start, window.end);
    } catch (error) {
      read = { ok: false, error: toAppError(error, 'CALENDAR_READ_FAILED') };
    }
    if (!read.ok) {
      console.error('[BatchScheduler] Busy time read failed:', read.error.message);
      return buildErrorReport(READ_FAILED, read.error);
    }

    const busy: TimeInterval[] = [...read.data];
    const ordered = options.order === 'due-date' ? byDueDate(queue) : queue;
    const results: Record<string, PlacementResult> = {};

    for (const item of ordered) {
      const id = assignmentId(item.request, item.index);
      let result = results[id];
      if (!result) {
        result = { assignmentId: id, scheduled: [], errors: [] };
        results[id] = result;
      }

      await this.placeAssignment(item, result, busy, options.dryRun ?? false);
    }

    const report = buildReport(results);
    const summary = summarizeReport(report);
    console.log(
      `[BatchScheduler] Done: ${summary.scheduledSessions} session(s) scheduled, ${summary.failedAssignments} assignment(s) without a session, ${summary.errors} error(s)`
    );
    return report;
  }

  private async placeAssignment(
    item: QueuedAssignment,
    result: PlacementResult,
    busy: TimeInterval[],
    dryRun: boolean
  ): Promise<void> {
    const { request, due } = item;
    const title = request.title?.trim();

    if (!title) {
      result.errors.push(MISSING_TITLE);
    }
    if (!due) {
      result.errors.push(INVALID_DUE_DATE);
    }

    const hours = request.estimatedHours ?? this.config.defaultSessionHours;
    const validHours = Number.isFinite(hours) && hours > 0;
    if (!validHours) {
      result.errors.push(INVALID_DURATION);
    }

    if (!title || !due || !validHours) {
      return;
    }

    const duration = Duration.fromObject({ hours });
    const eventTitle = `Study: ${title}`;

    if (request.kind === 'exam') {
      const days = examSessionDays(
        due,
        request.prepSessions ?? this.config.defaultPrepSessions,
        request.prepSpanDays ?? this.config.defaultPrepSpanDays,
        this.config
      );
      const description = sessionDescription(`Study Session for ${title}`, request);

      for (const day of days) {
        const slot = findSlotOnDay(day, duration, busy, this.config);
        if (!slot) {
          result.errors.push(noSlotOnDayMessage(day));
          continue;
        }
        await this.commit(result, slot, eventTitle, description, busy, dryRun);
      }
      return;
    }

    const slot = findHomeworkSlot(due, duration, busy, this.config);
    if (!slot) {
      result.errors.push(exhaustedMessage(this.config));
      return;
    }
    await this.commit(result, slot, eventTitle, sessionDescription(eventTitle, request), busy, dryRun);
  }

  /**
   * Writes one session. A failed write is recorded on the assignment and its
   * slot stays free for later placements.
   */
  private async commit(
    result: PlacementResult,
    interval: TimeInterval,
    title: string,
    description: string,
    busy: TimeInterval[],
    dryRun: boolean
  ): Promise<void> {
    let handle: EventHandle | undefined;

    if (!dryRun) {
      let created: Result<EventHandle>;
      try {
        created = await this.calendar.createEvent(interval, title, description);
      } catch (error) {
        created = { ok: false, error: toAppError(error, 'CALENDAR_WRITE_FAILED') };
      }

      if (!created.ok) {
        console.error(`[BatchScheduler] Write failed for ${result.assignmentId}:`, created.error.message);
        result.errors.push(created.error.message);
        return;
      }
      handle = created.data;
    }

    result.scheduled.push({
      assignmentId: result.assignmentId,
      interval,
      title,
      description,
      eventId: handle?.id,
      htmlLink: handle?.htmlLink
    });
    busy.push(interval);
  }
}
