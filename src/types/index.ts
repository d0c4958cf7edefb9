import type { DateTime } from 'luxon';

// ==============================================
// Study Scheduler Types
// ==============================================

// Half-open [start, end) range, normalized to the configured timezone
export interface TimeInterval {
  start: DateTime;
  end: DateTime;
}

export type AssignmentKind = 'homework' | 'exam';

// One assignment or exam to place study time for.
// dueDate stays raw so a malformed value only fails its own request.
export interface AssignmentRequest {
  id?: string;
  title?: string;
  dueDate: unknown;
  kind?: AssignmentKind;
  estimatedHours?: number; // default 2
  folderLink?: string;
  materials?: string[];
  prepSessions?: number; // exam only, default 3
  prepSpanDays?: number; // exam only, default 7
}

// Handle returned by the calendar once an event is written
export interface EventHandle {
  id: string;
  htmlLink?: string;
}

export interface ScheduledEvent {
  assignmentId: string;
  interval: TimeInterval;
  title: string;
  description: string;
  eventId?: string;
  htmlLink?: string;
}

export interface PlacementResult {
  assignmentId: string;
  scheduled: ScheduledEvent[];
  errors: string[];
}

export type BatchReport =
  | { status: 'ok'; results: Record<string, PlacementResult> }
  | { status: 'error'; error: string; detail?: unknown };

export type BatchOrder = 'input' | 'due-date';

export interface BatchOptions {
  order?: BatchOrder;
  dryRun?: boolean;
  now?: DateTime;
}

export interface ReportSummary {
  assignments: number;
  scheduledSessions: number;
  failedAssignments: number;
  errors: number;
}
