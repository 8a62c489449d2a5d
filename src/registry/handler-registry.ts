import { logger } from '../utils/logger';
import { ErrorCode, HandlerRegistryError } from '../utils/errors';
import { HANDLER_KINDS, HandlerKind } from '../types/common';
import type { SupportHandler } from '../handlers/types';
import type { GenerationBackend } from '../services/generation';
import type { OrderStore } from '../services/orders/types';
import { GeneralHandler } from '../handlers/general';
import { TechnicalHandler } from '../handlers/technical';
import { BillingHandler } from '../handlers/billing';
import { EscalationHandler } from '../handlers/escalation';
import { OrderLookupHandler } from '../handlers/orders';

/**
 * Immutable mapping from HandlerKind to handler, built once at startup.
 * Iteration always follows HANDLER_KINDS order, which is also the routing
 * tie-break order.
 */
export class HandlerRegistry {
  private readonly handlers: ReadonlyMap<HandlerKind, SupportHandler>;

  private constructor(handlers: Map<HandlerKind, SupportHandler>) {
    this.handlers = handlers;
  }

  /**
   * Build a registry holding exactly one handler per kind.
   * Throws HandlerRegistryError otherwise; callers treat that as fatal.
   */
  static create(handlers: readonly SupportHandler[]): HandlerRegistry {
    const byKind = new Map<HandlerKind, SupportHandler>();

    for (const handler of handlers) {
      if (byKind.has(handler.kind)) {
        throw new HandlerRegistryError(
          ErrorCode.REGISTRY_DUPLICATE_HANDLER,
          `Handler '${handler.kind}' registered more than once`
        );
      }
      byKind.set(handler.kind, handler);
    }

    const missing = HANDLER_KINDS.filter((kind) => !byKind.has(kind));
    if (missing.length > 0) {
      throw new HandlerRegistryError(
        ErrorCode.REGISTRY_MISSING_HANDLER,
        `No handler registered for: ${missing.join(', ')}`
      );
    }

    logger.info('Handler registry initialized', {
      operation: 'handler_registry_init'
    }, {
      handlerCount: byKind.size,
      kinds: [...HANDLER_KINDS]
    });

    return new HandlerRegistry(byKind);
  }

  get(kind: HandlerKind): SupportHandler {
    const handler = this.handlers.get(kind);
    if (!handler) {
      // create() guarantees every kind is present
      throw new HandlerRegistryError(ErrorCode.REGISTRY_MISSING_HANDLER, `No handler registered for: ${kind}`);
    }
    return handler;
  }

  kinds(): HandlerKind[] {
    return [...HANDLER_KINDS];
  }

  list(): SupportHandler[] {
    return HANDLER_KINDS.map((kind) => this.get(kind));
  }

  get size(): number {
    return this.handlers.size;
  }
}

export interface HandlerDependencies {
  backend: GenerationBackend;
  orderStore: OrderStore;
  transcriptLimit?: number;
}

export function createDefaultHandlers(deps: HandlerDependencies): SupportHandler[] {
  const options = { transcriptLimit: deps.transcriptLimit };
  return [
    new GeneralHandler(deps.backend, options),
    new TechnicalHandler(deps.backend, options),
    new BillingHandler(deps.backend, options),
    new EscalationHandler(options),
    new OrderLookupHandler(deps.orderStore, options)
  ];
}
