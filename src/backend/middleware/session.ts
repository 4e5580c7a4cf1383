/**
 * Session middleware - identifies the browser session that owns a metrics log.
 *
 * The web client generates an opaque id once per browser tab and sends it in
 * the x-session-id header. There are no accounts; the id only scopes the
 * in-memory run history.
 */

import type { NextFunction, Request, Response } from 'express';
import { SESSION_HEADER } from '../../shared/types/api';
import { ApiError } from './errorHandler';

/**
 * Extend Express Request to include the session id
 */
declare global {
  namespace Express {
    interface Request {
      sessionId?: string;
    }
  }
}

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{8,128}$/;

export function isValidSessionId(value: string): boolean {
  return SESSION_ID_PATTERN.test(value);
}

/**
 * Require a well-formed session id header and attach it to the request
 */
export function requireSession(req: Request, _res: Response, next: NextFunction): void {
  const value = req.header(SESSION_HEADER);
  if (!value || !isValidSessionId(value)) {
    next(new ApiError(
      400,
      `Missing or invalid ${SESSION_HEADER} header`,
      'invalid_session'
    ));
    return;
  }
  req.sessionId = value;
  next();
}

/**
 * Session id of a request that passed requireSession
 */
export function getSessionId(req: Request): string {
  if (!req.sessionId) {
    throw new ApiError(400, `Missing or invalid ${SESSION_HEADER} header`, 'invalid_session');
  }
  return req.sessionId;
}
