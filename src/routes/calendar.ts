import { Router, Request, Response } from 'express';
import { DateTime } from 'luxon';
import { z } from 'zod';
import { getCalendar } from '../services/scheduler.js';
import { getConfig } from '../config/index.js';
import { toIso } from '../scheduler/index.js';

const router = Router();

const busyQuerySchema = z.object({
  timeMin: z.string(),
  timeMax: z.string()
});

/**
 * GET /api/calendar/busy?timeMin=...&timeMax=...
 * Busy intervals currently on the calendar
 */
router.get('/busy', async (req: Request, res: Response) => {
  try {
    const parsed = busyQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: 'timeMin and timeMax are required', issues: parsed.error.issues });
      return;
    }

    const zone = getConfig().scheduler.timeZone;
    const timeMin = DateTime.fromISO(parsed.data.timeMin, { zone });
    const timeMax = DateTime.fromISO(parsed.data.timeMax, { zone });
    if (!timeMin.isValid || !timeMax.isValid || timeMax.toMillis() <= timeMin.toMillis()) {
      res.status(400).json({ error: 'timeMin and timeMax must be ISO datetimes with timeMin < timeMax' });
      return;
    }

    const result = await getCalendar().listBusyIntervals(timeMin, timeMax);
    if (!result.ok) {
      res.status(502).json({ error: 'Could not fetch existing events', detail: result.error });
      return;
    }

    res.json({
      busy: result.data.map(interval => ({
        start: toIso(interval.start),
        end: toIso(interval.end)
      }))
    });
  } catch (error) {
    console.error('Busy intervals error:', error);
    res.status(500).json({ error: 'Failed to list busy intervals' });
  }
});

export default router;
