import { NextFunction, Request, RequestHandler, Response } from 'express';

import { AUTH_HEADER } from '../config/constants';
import { LogContext, Logger } from '../utils/logger';

// Extend Express Request interface to include logging properties
declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      correlationId: string;
      log: Logger;
      startTime: number;
    }
  }
}

/**
 * Generate a unique correlation ID for request tracing.
 */
function generateCorrelationId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 8);
  return `req-${timestamp}-${random}`;
}

/**
 * Extract safe headers for logging. The api key is reported by presence only.
 */
function getSafeHeaders(req: Request): LogContext {
  const headers: LogContext = {};

  if (req.headers['content-type']) {
    headers.contentType = req.headers['content-type'];
  }
  if (req.headers['content-length']) {
    headers.contentLength = req.headers['content-length'];
  }
  if (req.headers['user-agent']) {
    headers.userAgent = req.headers['user-agent'];
  }
  if (req.headers[AUTH_HEADER]) {
    headers.hasApiKey = true;
  }

  return headers;
}

/**
 * Request logging middleware.
 * Generates correlation ID, attaches a child of `baseLogger` to the request,
 * logs the request and, once the response is sent, its outcome.
 */
export function createRequestLogger(baseLogger: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    req.correlationId = generateCorrelationId();
    req.startTime = Date.now();
    req.log = baseLogger.child(req.correlationId);

    req.log.info('Incoming request', {
      headers: getSafeHeaders(req),
      ip: req.ip ?? req.socket.remoteAddress,
      method: req.method,
      path: req.path,
    });

    res.on('finish', () => {
      const statusCode = res.statusCode;
      const logLevel = statusCode >= 500 ? 'error' : statusCode >= 400 ? 'warn' : 'info';
      const context = {
        contentLength: res.get('content-length'),
        durationMs: Date.now() - req.startTime,
        method: req.method,
        path: req.path,
        statusCode,
      };

      if (logLevel === 'error') {
        req.log.error('Request completed', undefined, context);
      } else {
        req.log[logLevel]('Request completed', context);
      }
    });

    next();
  };
}
