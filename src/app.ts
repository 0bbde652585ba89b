import express, { Express } from 'express';
import type { Logger } from 'pino';
import { createRequestLogger } from './middleware/requestLogger';
import healthRouter from './routes/health';
import { createMetricsRouter } from './routes/metrics';
import type { MetricsService } from './services/metrics';
import { errorHandler } from './utils/errors';
import defaultLogger from './utils/logger';

export interface AppOptions {
  service: MetricsService;
  logger?: Logger;
  clock?: () => number;
}

export function createApp(options: AppOptions): Express {
  const { service, logger = defaultLogger, clock } = options;
  const app = express();

  app.disable('x-powered-by');
  app.use(createRequestLogger({ logger }));

  app.use('/api/health', healthRouter);
  app.use('/api/metrics', createMetricsRouter({ service, clock }));

  app.use(errorHandler);

  return app;
}
