import test from 'node:test';
import assert from 'node:assert/strict';
import { DateTime } from 'luxon';
import { buildReport, buildErrorReport, summarizeReport, serializeReport } from '../src/scheduler/report.js';
import { PlacementResult } from '../src/types/index.js';

const zone = 'America/New_York';
const at = (iso: string) => DateTime.fromISO(iso, { zone });

const results: Record<string, PlacementResult> = {
  essay: {
    assignmentId: 'essay',
    scheduled: [
      {
        assignmentId: 'essay',
        interval: { start: at('2026-11-08T09:00'), end: at('2026-11-08T11:00') },
        title: 'Study: Essay',
        description: 'Study: Essay\nResource Folder: [FOLDER_LINK]\nMaterials: []',
        eventId: 'evt-1'
      }
    ],
    errors: []
  },
  exam: {
    assignmentId: 'exam',
    scheduled: [],
    errors: ['No free slot found on 2026-11-10', 'No free slot found on 2026-11-12']
  }
};

test('buildReport wraps the results with an ok status', () => {
  assert.deepEqual(buildReport(results), { status: 'ok', results });
});

test('buildErrorReport only carries detail when given', () => {
  assert.deepEqual(buildErrorReport('Could not fetch existing events'), {
    status: 'error',
    error: 'Could not fetch existing events'
  });
  assert.deepEqual(buildErrorReport('Could not fetch existing events', { code: 'X' }), {
    status: 'error',
    error: 'Could not fetch existing events',
    detail: { code: 'X' }
  });
});

test('summarizeReport counts sessions, failed assignments and errors', () => {
  assert.deepEqual(summarizeReport(buildReport(results)), {
    assignments: 2,
    scheduledSessions: 1,
    failedAssignments: 1,
    errors: 2
  });
  assert.deepEqual(summarizeReport(buildErrorReport('down')), {
    assignments: 0,
    scheduledSessions: 0,
    failedAssignments: 0,
    errors: 1
  });
});

test('serializeReport writes intervals as ISO strings', () => {
  assert.deepEqual(serializeReport(buildReport(results)), {
    status: 'ok',
    results: {
      essay: {
        assignment_id: 'essay',
        scheduled: [
          {
            title: 'Study: Essay',
            description: 'Study: Essay\nResource Folder: [FOLDER_LINK]\nMaterials: []',
            start: '2026-11-08T09:00:00-05:00',
            end: '2026-11-08T11:00:00-05:00',
            event_id: 'evt-1',
            html_link: undefined
          }
        ],
        errors: []
      },
      exam: {
        assignment_id: 'exam',
        scheduled: [],
        errors: ['No free slot found on 2026-11-10', 'No free slot found on 2026-11-12']
      }
    }
  });
});

test('serializeReport passes error reports through', () => {
  const report = buildErrorReport('Could not fetch existing events');
  assert.deepEqual(serializeReport(report), report);
});
