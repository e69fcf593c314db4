import express, { type Express } from 'express';
import type { Logger } from 'pino';

import { cors } from '../middleware/cors';
import { errorHandler } from '../middleware/errorHandler';
import { createRequestLogger } from '../middleware/requestLogger';
import { landingRouter } from '../routes/landing';
import { createLogsRouter } from '../routes/logs';
import type { RingBufferSink } from '../sink/ringBufferSink';

/** Builds the read-only Express app serving `sink`. */
export function createApp(sink: RingBufferSink, logger: Logger): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(cors);
  app.use(createRequestLogger(logger));

  // -------------------------------------------------------------------------
  // Routes
  // -------------------------------------------------------------------------
  app.use('/logs', createLogsRouter(sink));
  app.use('/',     landingRouter);

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use(errorHandler);

  return app;
}
