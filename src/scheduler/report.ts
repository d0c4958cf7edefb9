import { BatchReport, PlacementResult, ReportSummary } from '../types/index.js';
import { toIso } from './intervals.js';

export function buildReport(results: Record<string, PlacementResult>): BatchReport {
  return { status: 'ok', results };
}

export function buildErrorReport(error: string, detail?: unknown): BatchReport {
  return detail === undefined ? { status: 'error', error } : { status: 'error', error, detail };
}

/**
 * Counts for logging. An assignment is failed when it ends with nothing scheduled.
 */
export function summarizeReport(report: BatchReport): ReportSummary {
  if (report.status === 'error') {
    return { assignments: 0, scheduledSessions: 0, failedAssignments: 0, errors: 1 };
  }

  const results = Object.values(report.results);
  return {
    assignments: results.length,
    scheduledSessions: results.reduce((sum, r) => sum + r.scheduled.length, 0),
    failedAssignments: results.filter(r => r.scheduled.length === 0).length,
    errors: results.reduce((sum, r) => sum + r.errors.length, 0)
  };
}

/**
 * JSON shape of a report: intervals as ISO strings
 */
export function serializeReport(report: BatchReport) {
  if (report.status === 'error') {
    return report;
  }

  const results: Record<string, unknown> = {};
  for (const [id, result] of Object.entries(report.results)) {
    results[id] = {
      assignment_id: result.assignmentId,
      scheduled: result.scheduled.map(event => ({
        title: event.title,
        description: event.description,
        start: toIso(event.interval.start),
        end: toIso(event.interval.end),
        event_id: event.eventId,
        html_link: event.htmlLink
      })),
      errors: result.errors
    };
  }

  return { status: report.status, results };
}
