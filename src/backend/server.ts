/**
 * Express server setup - main entry point for the backend API server.
 * Loads and validates configuration, builds the services and starts the HTTP server.
 */

import type { Server } from 'http';
import { loadConfig } from './config';
import { createApp } from './app';
import { logFatal, loggers } from './logger';
import { createServices, type Services } from './services';

// Start function
export const start = (): Server | undefined => {
  let services: Services;
  try {
    // Fails fast on missing or invalid configuration
    services = createServices(loadConfig());
  } catch (err) {
    logFatal(err, 'Invalid configuration, server not started');
    return undefined;
  }

  const { config } = services;
  const app = createApp(services);
  return app.listen(config.server.port, () => {
    loggers.config.info(
      {
        port: config.server.port,
        provider: config.llm.provider,
        model: config.llm.model,
        compiler: config.latex.command,
        artifactsDir: config.artifactsDir
      },
      `Server listening on port ${config.server.port}`
    );
  });
};

// Start server when run directly
if (require.main === module) {
  start();
}
