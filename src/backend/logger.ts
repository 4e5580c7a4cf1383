/**
 * Server logging.
 *
 * One pino root logger: pretty output while developing, one JSON object per
 * line otherwise, silent under tests unless LOG_LEVEL asks for output.
 * API keys, cookies, request bodies and job descriptions never reach a line.
 */

import pino, { type Logger, type LoggerOptions } from 'pino';
import { parseNodeEnv } from './config';

const NODE_ENV = parseNodeEnv(process.env.NODE_ENV);
const PRETTY = NODE_ENV === 'development';

function defaultLevel(): string {
  if (NODE_ENV === 'test') return 'silent';
  return PRETTY ? 'debug' : 'info';
}

const REDACTED_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'res.headers["set-cookie"]',
  'req.body',
  'apiKey',
  '*.apiKey',
  'llm.apiKey',
  'jobDescription',
  '*.jobDescription',
];

const options: LoggerOptions = {
  level: process.env.LOG_LEVEL || defaultLevel(),
  base: { pid: process.pid, env: NODE_ENV },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: { paths: REDACTED_PATHS, remove: true },
};

export const logger: Logger = PRETTY
  ? pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss.l',
          ignore: 'pid,hostname,env',
          messageFormat: '{component} {msg}',
        },
      },
    })
  : pino({
      ...options,
      formatters: {
        level: (label) => ({ level: label }),
      },
    });

/**
 * Child loggers, one per part of a generation run
 */
export const loggers = {
  http: logger.child({ component: 'http' }),
  llm: logger.child({ component: 'llm' }),
  latex: logger.child({ component: 'latex' }),
  pipeline: logger.child({ component: 'pipeline' }),
  config: logger.child({ component: 'config' }),
};

/**
 * Plain object for the `err` field; stacks only while developing
 */
export function serializeError(err: unknown): Record<string, unknown> {
  if (!(err instanceof Error)) {
    return { message: String(err) };
  }
  // Own enumerable fields of AppError/ApiError: code, category, statusCode...
  const fields: Record<string, unknown> = { ...err };
  return {
    type: err.constructor.name,
    message: err.message,
    stack: PRETTY ? err.stack : undefined,
    ...fields,
  };
}

/**
 * Startup failure: log it and stop the process
 */
export function logFatal(err: unknown, message: string): void {
  logger.fatal({ err: serializeError(err) }, message);
  process.exit(1);
}
