import dotenv from 'dotenv';

// Load .env from the working directory before anything reads the config
dotenv.config();

import express from 'express';
import cors from 'cors';
import routes from './routes/index.js';
import { getConfig } from './config/index.js';

const config = getConfig();
const app = express();

// Middleware
app.use(cors({
  origin: config.frontendUrl,
  credentials: true
}));
app.use(express.json());

// Request logging
app.use((req, _res, next) => {
  console.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
  next();
});

// API Routes
app.use('/api', routes);

// Error handling
app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
  console.error('Error:', err);
  res.status(500).json({ error: 'Internal server error' });
});

// 404 handler
app.use((_req, res) => {
  res.status(404).json({ error: 'Not found' });
});

// Start server
app.listen(config.port, () => {
  console.log(`
╔═══════════════════════════════════════════════════╗
║                                                   ║
║   Study Session Scheduler                         ║
║                                                   ║
║   Server running on port ${String(config.port).padEnd(25)}║
║   Timezone: ${config.scheduler.timeZone.padEnd(38)}║
║                                                   ║
╚═══════════════════════════════════════════════════╝
  `);
});

export default app;
