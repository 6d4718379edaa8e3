import { timingSafeEqual } from 'node:crypto';

import { NextFunction, Request, RequestHandler, Response } from 'express';

import { AUTH_HEADER, HttpStatus } from '../config/constants';

/**
 * Determine the reason for auth failure (for logging purposes only).
 */
function getAuthFailureReason(token: string | undefined): string {
  if (!token) return 'missing_token';
  return 'token_mismatch';
}

/**
 * Timing-safe token comparison to prevent timing attacks.
 */
function isValidToken(provided: string, expected: string): boolean {
  if (provided.length !== expected.length) {
    return false;
  }
  const providedBuf = Buffer.from(provided);
  const expectedBuf = Buffer.from(expected);
  return timingSafeEqual(providedBuf, expectedBuf);
}

/**
 * Require the configured upload token in the `api-key` header.
 */
export function requireUploadToken(expected: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const token = req.get(AUTH_HEADER);

    if (!token || !isValidToken(token, expected)) {
      req.log.warn('Upload authentication failed', {
        path: req.path,
        reason: getAuthFailureReason(token),
      });
      res.status(HttpStatus.UNAUTHORIZED).type('text/plain').send('ERROR: unauthorized');
      return;
    }

    req.log.debug('Upload authentication successful');
    next();
  };
}
