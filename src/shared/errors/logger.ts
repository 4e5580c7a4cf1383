/**
 * Error Logger
 *
 * Structured logging of AppErrors through an injected pino logger.
 * Shared modules never own a log destination; the backend passes its
 * component loggers in, everything else falls back to a silent logger.
 */

import pino, { Logger } from 'pino';
import { AppError, ErrorSeverity } from './types';

/**
 * Logger that discards everything, used when no logger is injected
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

/**
 * Log an error with technical details at a level matching its severity
 */
export function logAppError(logger: Logger, error: AppError | Error): void {
  if (!(error instanceof AppError)) {
    logger.error({ err: error }, error.message);
    return;
  }

  const payload = {
    category: error.category,
    severity: error.severity,
    code: error.code,
    details: error.technicalDetails,
    context: error.context
  };

  switch (error.severity) {
    case ErrorSeverity.LOW:
      logger.info(payload, error.userMessage);
      break;
    case ErrorSeverity.MEDIUM:
      logger.warn(payload, error.userMessage);
      break;
    default:
      logger.error(payload, error.userMessage);
  }
}
