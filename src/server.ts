#!/usr/bin/env tsx

/**
 * Support Router Server
 *
 * Starts the chat WebSocket endpoint (/chat) together with the /health and
 * /status HTTP endpoints.
 *
 * Quick Start:
 * 1. cp .env.example .env
 * 2. Optionally set OPENAI_API_KEY (templated replies are used without it)
 * 3. npm install && npm run dev
 * 4. Connect a WebSocket client to ws://localhost:8765/chat?userId=<id>
 */

import type { Server } from 'http';
import { logger } from './utils/logger';
import { toError } from './utils/errors';
import { initializeEnvironment } from './config/environment';
import { createOrderStore } from './config/storage';
import { eventLogger } from './events';
import { AgentsGenerationBackend } from './services/generation';
import { createApp, createSupportSystem, describeConfiguration } from './app';

async function startServer(): Promise<void> {
  const config = initializeEnvironment();
  logger.setLevel(config.logLevel);
  eventLogger.start();

  if (!config.generation.apiKey) {
    logger.warn('OPENAI_API_KEY not configured', {
      operation: 'server_init'
    }, {
      message: 'Generated replies will fail over to templated responses'
    });
  }

  const orderStore = createOrderStore(config.storage);
  await orderStore.init();

  const backend = new AgentsGenerationBackend({
    apiKey: config.generation.apiKey || undefined,
    model: config.generation.model,
    timeoutMs: config.generation.timeoutMs
  });

  const system = createSupportSystem({
    backend,
    orderStore,
    routing: config.routing,
    transcriptLimit: config.transcriptLimit,
    idleTimeoutMs: config.idleTimeoutMs
  });

  const app = createApp(system, describeConfiguration(config));

  const server: Server = app.listen(config.port, config.host, () => {
    logger.info('Support router started', {
      operation: 'server_start'
    }, {
      host: config.host,
      port: config.port,
      env: process.env.NODE_ENV || 'development',
      orderStore: orderStore.name,
      endpoints: [
        `ws://${config.host}:${config.port}/chat`,
        `http://${config.host}:${config.port}/health (GET)`,
        `http://${config.host}:${config.port}/status (GET)`
      ]
    });
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info('Shutting down server...', { operation: 'server_shutdown' }, { signal });

    system.gateway.closeAll();
    server.close();

    try {
      await orderStore.close();
      logger.info('Server shutdown complete', { operation: 'server_shutdown' });
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', toError(error), { operation: 'server_shutdown' });
      process.exit(1);
    }
  };

  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((error) => logger.error('Shutdown failed', toError(error)));
  });
  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((error) => logger.error('Shutdown failed', toError(error)));
  });
}

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  logger.logError(error, { operation: 'uncaught_exception' });
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', toError(reason), {
    operation: 'unhandled_rejection'
  });
});

startServer().catch((error) => {
  logger.error('Failed to start server', toError(error), {
    operation: 'server_start_error'
  });
  process.exit(1);
});
