import cors from 'cors';
import express, { ErrorRequestHandler, Express } from 'express';

import { HttpStatus } from './config/constants';
import { createRequestLogger } from './middleware/requestLogger';
import createIngesterRouter from './routes/ingester';
import { errorMessage } from './utils/errors';
import { logger as defaultLogger } from './utils/logger';

import type { ServerConfig, WriterConfig } from './config';
import type { WriteQueue } from './queue/WriteQueue';
import type { MetricStore } from './storage';
import type { Logger } from './utils/logger';

export interface AppDependencies {
  queue: WriteQueue;
  server: Pick<ServerConfig, 'bodyLimit' | 'corsOrigins' | 'uploadToken'>;
  store: MetricStore;
  writer: Pick<WriterConfig, 'storageErrorPolicy'>;
  log?: Logger;
}

function statusOf(error: unknown): number {
  if (typeof error === 'object' && error !== null) {
    if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
    // body-parser errors (payload too large, bad encoding) carry `status`
    if ('status' in error && typeof error.status === 'number') return error.status;
  }
  return HttpStatus.INTERNAL_SERVER_ERROR;
}

/**
 * Build the HTTP application. Listening and shutdown belong to the caller.
 */
export function createApp(deps: AppDependencies): Express {
  const { queue, server, store, writer } = deps;

  const app = express();
  app.disable('x-powered-by'); // Prevent version disclosure

  const corsOptions = {
    allowedHeaders: ['Content-Type', 'Authorization', 'api-key'],
    methods: ['GET', 'POST', 'OPTIONS'],
    origin: server.corsOrigins,
  };

  // eslint-disable-next-line sonarjs/cors -- CORS is intentionally enabled for API access
  app.use(cors(corsOptions));
  app.use(createRequestLogger(deps.log ?? defaultLogger));

  app.use(
    createIngesterRouter({
      bodyLimit: server.bodyLimit,
      policy: writer.storageErrorPolicy,
      queue,
      store,
      uploadToken: server.uploadToken,
    }),
  );

  // Health check endpoint
  app.get('/health', (_req: express.Request, res: express.Response) => {
    res.status(HttpStatus.OK).send('OK');
  });

  const errorHandler: ErrorRequestHandler = (error: unknown, req, res, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    const status = statusOf(error);
    if (status >= 500) {
      req.log.error('Unhandled request error', error);
    } else {
      req.log.warn('Request rejected', { error: errorMessage(error), status });
    }
    res.status(status).type('text/plain').send(`ERROR: ${errorMessage(error)}`);
  };
  app.use(errorHandler);

  return app;
}
