/**
 * One log line per API request through pino-http, tagged with a request id
 * and the caller's session id. Bodies are left out: they carry job descriptions.
 */

import pinoHttp, { type HttpLogger } from 'pino-http';
import { randomUUID } from 'crypto';
import type { IncomingMessage, ServerResponse } from 'http';
import type { Logger } from 'pino';
import { SESSION_HEADER } from '../../shared/types/api';

const HEALTH_PATH = '/api/health';

type Level = 'error' | 'warn' | 'info' | 'debug';

// A proxy in front of the server may already have assigned one
function requestId(req: IncomingMessage): string {
  const forwarded = req.headers['x-request-id'];
  return typeof forwarded === 'string' && forwarded ? forwarded : randomUUID();
}

function levelFor(req: IncomingMessage, res: ServerResponse, err?: Error): Level {
  if (err || res.statusCode >= 500) return 'error';
  if (res.statusCode >= 400) return 'warn';
  return req.url === HEALTH_PATH ? 'debug' : 'info';
}

export function createRequestLogger(logger: Logger, options: { quietHealthChecks: boolean }): HttpLogger {
  return pinoHttp({
    logger,
    genReqId: requestId,
    customAttributeKeys: { reqId: 'requestId' },
    serializers: {
      req: (req: IncomingMessage & { id?: unknown }) => ({
        id: req.id,
        method: req.method,
        url: req.url,
        sessionId: req.headers[SESSION_HEADER],
        contentLength: req.headers['content-length'],
      }),
      res: (res: ServerResponse) => ({ statusCode: res.statusCode }),
    },
    customLogLevel: levelFor,
    customSuccessMessage: (req, res, responseTime) =>
      `${req.method} ${req.url} ${res.statusCode} ${responseTime.toFixed(0)}ms`,
    customErrorMessage: (req, res, err) => `${req.method} ${req.url} ${res.statusCode} - ${err.message}`,
    autoLogging: {
      ignore: (req) => options.quietHealthChecks && req.url === HEALTH_PATH,
    },
  });
}
