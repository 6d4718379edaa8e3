import { Request, RequestHandler, Response } from 'express';

import { HttpStatus } from '../config/constants';
import { decodeExport, formatSummary, summarizeExport } from '../mappers';
import { DecodeError, QueueFullError } from '../utils/errors';
import { writeExport } from './exportWriter';

import type { DecodedExport } from '../mappers';
import type { WriteQueue } from '../queue/WriteQueue';
import type { MetricStore } from '../storage';
import type { StorageErrorPolicy } from '../types';

export interface IngesterDependencies {
  policy: StorageErrorPolicy;
  queue: WriteQueue;
  store: MetricStore;
}

function sendText(res: Response, status: number, body: string): void {
  res.status(status).type('text/plain').send(body);
}

/**
 * POST /upload. Decodes the body, answers with a summary and leaves the
 * database writes to the queue.
 */
export function createIngestHandler(deps: IngesterDependencies): RequestHandler {
  const { policy, queue, store } = deps;

  return (req: Request, res: Response) => {
    const { log } = req;
    const timer = log.startTimer('ingestData');
    const body = typeof req.body === 'string' ? req.body : '';

    let decoded: DecodedExport;
    try {
      decoded = decodeExport(body);
    } catch (error) {
      if (!(error instanceof DecodeError)) throw error;
      timer.end('warn', 'Rejected undecodable export', { error: error.message });
      sendText(res, error.statusCode, `ERROR: ${error.message}`);
      return;
    }

    const data = decoded.export;
    const summary = summarizeExport(data);
    if (decoded.report.ambiguousSamples > 0) {
      log.warn('Samples carried fields of more than one shape', {
        ambiguousSamples: decoded.report.ambiguousSamples,
      });
    }

    const accepted = queue.enqueue({
      id: req.correlationId,
      run: (signal) => writeExport(store, data, { log, policy, signal }),
    });
    if (!accepted) {
      const error = new QueueFullError();
      timer.end('warn', 'Export rejected, write queue full', { ...summary });
      sendText(res, error.statusCode, `ERROR: ${error.message}`);
      return;
    }

    timer.end('info', 'Export accepted', { ...summary });
    sendText(res, HttpStatus.OK, formatSummary(summary));
  };
}
