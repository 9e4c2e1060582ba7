import express from 'express';
import cors from 'cors';

import { errorHandler } from './middleware/errorHandler.js';
import { createBreakpointsRouter } from './routes/breakpoints.js';
import { healthRouter } from './routes/health.js';
import { createLogisticsRouter } from './routes/logistics.js';
import type { LogisticsStore } from './services/store/logisticsStore.js';

export function createApp(deps: { store: LogisticsStore }) {
  const app = express();
  // Runs behind a reverse proxy: honour X-Forwarded-* headers.
  app.set('trust proxy', true);
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.use('/health', healthRouter);
  app.use('/logistics', createLogisticsRouter(deps.store));
  app.use('/breakpoints', createBreakpointsRouter(deps.store));
  app.use((_req, res) => {
    res.status(404).json({ ok: false, error: 'not found' });
  });

  // Must be last: centralized error handler.
  app.use(errorHandler);
  return app;
}
