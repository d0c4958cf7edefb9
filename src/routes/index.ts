import { Router } from 'express';
import scheduleRoutes from './schedule.js';
import calendarRoutes from './calendar.js';

const router = Router();

// Health check
router.get('/health', (_req, res) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

// API Routes
router.use('/schedule', scheduleRoutes);
router.use('/calendar', calendarRoutes);

export default router;
