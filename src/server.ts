import cors from 'cors';
import express from 'express';

import { CorsConfig, HttpStatus, ServerConfig } from './config';
import { createDumpHandler } from './controllers/dump';
import { createWriteAuth } from './middleware/auth';
import { errorHandler, notFound } from './middleware/errorHandler';
import { createRateLimit } from './middleware/rateLimit';
import { requestLogger } from './middleware/requestLogger';
import { createRequestTimeout } from './middleware/requestTimeout';
import { createHealthDataRouter } from './routes/healthData';

import type { RateLimitOptions } from './middleware/rateLimit';
import type { HealthRecordStore } from './storage';

export interface AppDependencies {
  store: HealthRecordStore;
  /** IANA zone that decides "today" */
  timeZone: string;
  /** Token required on POST /dump; open when undefined */
  writeToken?: string;
  now?: () => Date;
  rateLimit?: Partial<RateLimitOptions>;
  requestTimeoutMs?: number;
}

/**
 * Build the Express application. Listening is left to the caller.
 */
export function createApp(deps: AppDependencies): express.Express {
  const { now, store, timeZone } = deps;
  const app = express();
  app.disable('x-powered-by'); // Prevent version disclosure

  app.use(
    cors({
      allowedHeaders: CorsConfig.allowedHeaders,
      methods: CorsConfig.allowedMethods,
      origin: '*',
    }),
  );

  // Logger first so every later middleware and error path has req.log
  app.use(requestLogger);
  app.use(createRateLimit(deps.rateLimit));
  app.use(createRequestTimeout(deps.requestTimeoutMs));
  app.use(express.json({ limit: ServerConfig.bodyLimit }));

  app.get('/status', (_req, res) => {
    res.status(HttpStatus.OK).json({ status: 'ok' });
  });

  app.post('/dump', createWriteAuth(deps.writeToken), createDumpHandler({ now, store, timeZone }));
  app.use('/api/health-data', createHealthDataRouter({ now, store, timeZone }));

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
