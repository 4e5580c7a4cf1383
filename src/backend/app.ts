/**
 * Express application - configures middleware and mounts the API routes.
 * Created from already-built services so tests can supply fakes.
 */

import * as fs from 'fs';
import * as path from 'path';
import express, { Application } from 'express';
import cors from 'cors';
import { loggers } from './logger';
import { ApiError, createErrorHandler } from './middleware/errorHandler';
import { createRequestLogger } from './middleware/requestLogger';
import { createApiRouter } from './routes';
import type { Services } from './services';

/** Room for a maximal job description plus JSON overhead */
const JSON_BODY_LIMIT = '256kb';

export function createApp(services: Services): Application {
  const { config } = services;
  const app: Application = express();

  // CORS configuration - configured origins, plus any localhost origin in development
  const corsOptions: cors.CorsOptions = {
    origin: (origin, callback) => {
      // Allow requests with no origin (same-origin, curl)
      if (!origin || config.cors.origins.includes(origin)) {
        return callback(null, true);
      }
      if (config.server.isDevelopment && /^https?:\/\/localhost(:\d+)?$/.test(origin)) {
        return callback(null, true);
      }
      callback(new ApiError(403, 'Not allowed by CORS', 'cors'));
    },
  };

  // Middleware
  app.use(createRequestLogger(loggers.http, { quietHealthChecks: config.server.isProduction }));
  app.use(cors(corsOptions));
  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  // Health check endpoint (for load balancers/monitoring)
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/api', createApiRouter(services));

  // Unknown API paths are JSON 404s, not the web client
  app.use('/api', (req, _res, next) => {
    next(new ApiError(404, `Not found: ${req.method} ${req.originalUrl}`, 'not_found'));
  });

  // Built web client
  const indexHtml = path.join(config.server.staticDir, 'index.html');
  if (fs.existsSync(indexHtml)) {
    app.use(express.static(config.server.staticDir));
    app.get('*', (_req, res) => {
      res.sendFile(indexHtml);
    });
  }

  app.use(createErrorHandler({ logger: loggers.http, exposeDetails: config.server.isDevelopment }));

  return app;
}
