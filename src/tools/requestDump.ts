/**
 * Debugging server that stores the raw body of the last upload.
 * Point the exporter at it, then feed the file to `requestParse`.
 */

import path from 'path';

import express, { Express } from 'express';

import { Defaults, HttpStatus } from '../config/constants';
import { createRequestLogger } from '../middleware/requestLogger';
import { atomicWrite } from '../utils/fileHelpers';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

import type { Logger } from '../utils/logger';

export const DEFAULT_DUMP_FILE = 'request.json';

export function createDumpApp(filePath: string, log: Logger = logger): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(createRequestLogger(log));

  app.post(
    '/',
    express.text({ limit: Defaults.bodyLimit, type: () => true }),
    (req: express.Request, res: express.Response) => {
      const body = typeof req.body === 'string' ? req.body : '';
      atomicWrite(filePath, body)
        .then(() => {
          req.log.info('Request body written', { bytes: Buffer.byteLength(body), filePath });
          res.status(HttpStatus.OK).type('text/plain').send(`Written to ${path.basename(filePath)}`);
        })
        .catch((error: unknown) => {
          req.log.error('Failed to write request body', error, { filePath });
          res
            .status(HttpStatus.INTERNAL_SERVER_ERROR)
            .type('text/plain')
            .send(`ERROR: ${errorMessage(error)}`);
        });
    },
  );

  return app;
}

if (require.main === module) {
  const filePath = path.resolve(process.env.REQUEST_DUMP_FILE ?? DEFAULT_DUMP_FILE);
  const port = Number.parseInt(process.env.PORT ?? String(Defaults.port), 10);

  createDumpApp(filePath).listen(port, Defaults.host, () => {
    logger.info('Request dump server started', { filePath, port });
  });
}
