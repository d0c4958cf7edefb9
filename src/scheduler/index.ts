export { overlaps, findFreeSlot, dayWindow, atLocalHour, toIso, formatDay } from './intervals.js';
export { anchorDay, fallbackDays, findHomeworkSlot, findSlotOnDay, exhaustedMessage } from './placement.js';
export { examSessionDays, prepSpanStart, roundHalfEven, noSlotOnDayMessage } from './examPlanner.js';
export {
  BatchScheduler,
  parseDueDate,
  coveringWindow,
  placementRange,
  assignmentId,
  sessionDescription,
  INVALID_DUE_DATE,
  MISSING_TITLE,
  INVALID_DURATION,
  READ_FAILED
} from './batchScheduler.js';
export { buildReport, buildErrorReport, summarizeReport, serializeReport } from './report.js';
