/**
 * Error handling middleware - provides centralized error handling for the API.
 * Catches errors from route handlers, formats error responses,
 * and handles structured logging of server-side errors.
 */

import type { ErrorRequestHandler, NextFunction, Request, Response } from 'express';
import type { Logger } from 'pino';
import { AppError, ErrorCategory } from '../../shared/errors';
import { serializeError } from '../logger';

/**
 * Custom error class for API errors with status codes
 */
export class ApiError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code?: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

/**
 * HTTP status for each AppError category
 */
export function statusForCategory(category: ErrorCategory): number {
  switch (category) {
    case ErrorCategory.VALIDATION:
      return 400;
    case ErrorCategory.PROVIDER:
    case ErrorCategory.PARSING:
      return 502;
    case ErrorCategory.COMPILATION:
      return 422;
    default:
      return 500;
  }
}

/**
 * Status carried by errors from body-parser and other http-errors style sources
 */
function readHttpStatus(err: Error): number | undefined {
  for (const key of ['statusCode', 'status'] as const) {
    if (key in err) {
      const value: unknown = Reflect.get(err, key);
      if (typeof value === 'number' && value >= 400 && value < 600) {
        return value;
      }
    }
  }
  return undefined;
}

export interface ErrorHandlerOptions {
  logger: Logger;
  /** Include messages and stacks of server errors in responses */
  exposeDetails: boolean;
}

/**
 * Centralized error handler middleware
 * Logs errors with full context and returns appropriate responses
 */
export function createErrorHandler(options: ErrorHandlerOptions): ErrorRequestHandler {
  const { logger, exposeDetails } = options;

  return (err: Error, req: Request, res: Response, _next: NextFunction) => {
    // Determine status code and error type
    let statusCode: number;
    let code: string | undefined;
    if (err instanceof ApiError) {
      statusCode = err.statusCode;
      code = err.code;
    } else if (err instanceof AppError) {
      statusCode = statusForCategory(err.category);
      code = err.code;
    } else {
      statusCode = readHttpStatus(err) ?? 500;
    }
    const isServerError = statusCode >= 500;

    // Build error context for logging
    const errorContext = {
      err: serializeError(err),
      requestId: req.id,
      method: req.method,
      path: req.path,
      sessionId: req.sessionId,
      statusCode,
      ...(code && { errorCode: code }),
    };

    // Log at appropriate level
    if (isServerError) {
      logger.error(errorContext, `Request failed: ${err.message}`);
    } else {
      logger.warn(errorContext, `Client error: ${err.message}`);
    }

    // Build response
    const response: Record<string, unknown> = {
      error: err instanceof AppError
        ? err.userMessage
        : isServerError ? 'Internal Server Error' : err.message,
    };

    if (code) {
      response.code = code;
    }

    if (exposeDetails) {
      response.message = err.message;
      response.stack = err.stack;
      if (err instanceof ApiError && err.details) {
        response.details = err.details;
      }
    }

    res.status(statusCode).json(response);
  };
}

/**
 * Async handler wrapper to catch errors in async route handlers
 * Forwards errors to the error handling middleware
 */
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) => {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
