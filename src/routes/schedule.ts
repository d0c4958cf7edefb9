import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { getScheduler, runExclusive } from '../services/scheduler.js';
import { serializeReport } from '../scheduler/index.js';
import { AssignmentKind, AssignmentRequest, BatchOptions } from '../types/index.js';

const router = Router();

// Per-item fields are lenient: a bad value becomes a per-assignment error in
// the report (or falls back to its default) instead of rejecting the batch.
const assignmentSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String).optional().catch(undefined),
  title: z.string().optional().catch(undefined),
  due_date: z.unknown(),
  type: z.unknown().transform((value): AssignmentKind =>
    typeof value === 'string' && value.trim().toLowerCase() === 'exam' ? 'exam' : 'homework'
  ),
  estimated_hours: z.unknown().transform(value => {
    if (value === undefined || value === null) return undefined;
    return typeof value === 'number' ? value : Number.NaN;
  }),
  folder_link: z.string().optional().catch(undefined),
  materials: z.array(z.string()).optional().catch(undefined),
  prep_sessions: z.number().int().min(0).max(14).optional().catch(undefined),
  prep_span_days: z.number().int().optional().catch(undefined)
});

// Anything that is not an object is scheduled as an empty request and reported
const assignmentItemSchema = z.preprocess(
  value => (typeof value === 'object' && value !== null && !Array.isArray(value) ? value : {}),
  assignmentSchema
);

export const batchBodySchema = z.object({
  assignments: z.array(assignmentItemSchema),
  order: z.enum(['input', 'due-date']).optional()
});

export type BatchBody = z.infer<typeof batchBodySchema>;

/**
 * snake_case request body -> AssignmentRequest
 */
export function toAssignmentRequests(body: BatchBody): AssignmentRequest[] {
  return body.assignments.map(a => ({
    id: a.id,
    title: a.title,
    dueDate: a.due_date,
    kind: a.type,
    estimatedHours: a.estimated_hours,
    folderLink: a.folder_link,
    materials: a.materials,
    prepSessions: a.prep_sessions,
    prepSpanDays: a.prep_span_days
  }));
}

async function handleBatch(req: Request, res: Response, dryRun: boolean): Promise<void> {
  const parsed = batchBodySchema.safeParse(req.body);
  if (!parsed.success) {
    res.status(400).json({ error: 'Invalid request body', issues: parsed.error.issues });
    return;
  }

  const options: BatchOptions = { order: parsed.data.order, dryRun };
  const assignments = toAssignmentRequests(parsed.data);
  const report = await runExclusive(() => getScheduler().scheduleBatch(assignments, options));

  res.status(report.status === 'ok' ? 200 : 502).json(serializeReport(report));
}

/**
 * POST /api/schedule/batch
 * Places study sessions for every assignment and writes them to the calendar
 */
router.post('/batch', async (req: Request, res: Response) => {
  try {
    await handleBatch(req, res, false);
  } catch (error) {
    console.error('Schedule batch error:', error);
    res.status(500).json({ error: 'Failed to schedule assignments' });
  }
});

/**
 * POST /api/schedule/preview
 * Same placement without writing anything
 */
router.post('/preview', async (req: Request, res: Response) => {
  try {
    await handleBatch(req, res, true);
  } catch (error) {
    console.error('Schedule preview error:', error);
    res.status(500).json({ error: 'Failed to preview schedule' });
  }
});

export default router;
