/**
 * Agent Gateway - HTTP gateway for upstream LLM providers
 *
 * Main Application Entry Point
 */

import 'dotenv/config';

import { createGatewayServer } from './gateway/server.js';
import { loadConfig } from './config/loader.js';
import logger, { logLifecycle } from './utils/logger.js';
import { errorMessage } from './utils/helpers.js';

// =============================================================================
// Application Startup
// =============================================================================

async function bootstrap(): Promise<void> {
  logLifecycle('startup', 'Agent Gateway starting up...');

  const config = loadConfig();

  logLifecycle('startup', 'Configuration loaded', {
    port: config.server.port,
    host: config.server.host,
    environment: config.server.nodeEnv,
  });

  const server = createGatewayServer({ config });
  await server.start();
}

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', {
    error: error.message,
    stack: error.stack,
  });
  process.exit(1);
});

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', {
    reason: errorMessage(reason),
  });
});

bootstrap().catch((error: unknown) => {
  logLifecycle('error', 'Failed to start Agent Gateway', {
    error: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
