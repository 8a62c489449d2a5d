import express from 'express';
import expressWs from 'express-ws';
import cors from 'cors';
import { logger } from './utils/logger';
import { toError } from './utils/errors';
import { HandlerRegistry, createDefaultHandlers } from './registry/handler-registry';
import { Router } from './services/router';
import { Orchestrator } from './services/orchestrator';
import { ChatGateway, registerChatRoute, CHAT_ROUTE } from './channels/ws';
import type { EnvironmentConfig, RoutingPolicy } from './config/environment';
import type { GenerationBackend } from './services/generation';
import type { OrderStore } from './services/orders/types';

export const APP_VERSION = '1.0.0';

export interface SupportSystem {
  registry: HandlerRegistry;
  router: Router;
  orchestrator: Orchestrator;
  gateway: ChatGateway;
}

export interface SupportSystemOptions {
  backend: GenerationBackend;
  orderStore: OrderStore;
  routing: RoutingPolicy;
  transcriptLimit: number;
  idleTimeoutMs: number;
}

/**
 * Wire handlers, router, orchestrator and the chat gateway together.
 * Throws HandlerRegistryError when the handler set is incomplete.
 */
export function createSupportSystem(options: SupportSystemOptions): SupportSystem {
  const registry = HandlerRegistry.create(
    createDefaultHandlers({
      backend: options.backend,
      orderStore: options.orderStore,
      transcriptLimit: options.transcriptLimit
    })
  );
  const router = new Router(registry, options.routing);
  const orchestrator = new Orchestrator(registry, router);
  const gateway = new ChatGateway(orchestrator, { idleTimeoutMs: options.idleTimeoutMs });

  return { registry, router, orchestrator, gateway };
}

/**
 * Non-secret view of the configuration, reported by GET /status.
 */
export interface PublicConfiguration {
  generationConfigured: boolean;
  generationModel: string;
  orderStore: EnvironmentConfig['storage']['driver'];
  idleTimeoutMs: number;
  routing: RoutingPolicy;
}

export function describeConfiguration(config: EnvironmentConfig): PublicConfiguration {
  return {
    generationConfigured: config.generation.apiKey !== '',
    generationModel: config.generation.model,
    orderStore: config.storage.driver,
    idleTimeoutMs: config.idleTimeoutMs,
    routing: config.routing
  };
}

export function createApp(system: SupportSystem, configuration: PublicConfiguration): expressWs.Application {
  const { app } = expressWs(express());

  app.use(cors());
  app.use(express.json());

  /**
   * Health Check Endpoint
   */
  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: APP_VERSION
    });
  });

  /**
   * Status Endpoint - conversation counts, handler status and configuration
   */
  app.get('/status', (_req, res) => {
    try {
      res.json({
        status: 'running',
        system: {
          ...system.orchestrator.getSystemStats(),
          activeSessions: system.gateway.activeSessions
        },
        handlers: system.orchestrator.getHandlerStatus(),
        configuration,
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      const err = toError(error);
      logger.error('Status endpoint error', err, { operation: 'http_status' });
      res.status(500).json({
        status: 'error',
        error: err.message
      });
    }
  });

  registerChatRoute(app, system.gateway, CHAT_ROUTE);

  return app;
}
