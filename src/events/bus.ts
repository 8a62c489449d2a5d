import { EventEmitter } from 'events';
import { TypedEmitter, EventName, EventPayload, EventListener } from './types';
import { logger } from '../utils/logger';
import { toError } from '../utils/errors';

/**
 * TypedEventBus - A type-safe event bus for lifecycle events
 *
 * Wraps a plain EventEmitter so that emission and subscription are keyed by
 * the Events interface. A listener that throws is logged and never reaches
 * the emitter, so the code emitting an event is not affected by it.
 */
class TypedEventBus implements TypedEmitter {
  private static instance: TypedEventBus;
  private readonly MAX_LISTENERS = 100;
  private readonly emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(this.MAX_LISTENERS);
  }

  static getInstance(): TypedEventBus {
    if (!TypedEventBus.instance) {
      TypedEventBus.instance = new TypedEventBus();
    }
    return TypedEventBus.instance;
  }

  emit<K extends EventName>(event: K, payload: EventPayload<K>): boolean {
    logger.debug('Event emitted', {
      operation: 'event_emit',
      eventType: event
    }, {
      payload
    });

    return this.emitter.emit(event, payload);
  }

  on<K extends EventName>(event: K, listener: EventListener<K>): this {
    this.emitter.on(event, this.wrap(event, listener));
    return this;
  }

  removeAllListeners<K extends EventName>(event?: K): this {
    if (event === undefined) {
      this.emitter.removeAllListeners();
    } else {
      this.emitter.removeAllListeners(event);
    }
    return this;
  }

  listenerCount<K extends EventName>(event: K): number {
    return this.emitter.listenerCount(event);
  }

  getStats(): {
    totalListeners: number;
    eventCounts: Record<string, number>;
    maxListeners: number;
  } {
    const eventCounts: Record<string, number> = {};
    let totalListeners = 0;

    for (const eventName of this.emitter.eventNames()) {
      const count = this.emitter.listenerCount(eventName);
      eventCounts[eventName.toString()] = count;
      totalListeners += count;
    }

    return {
      totalListeners,
      eventCounts,
      maxListeners: this.emitter.getMaxListeners()
    };
  }

  private wrap<K extends EventName>(event: K, listener: EventListener<K>): (payload: EventPayload<K>) => void {
    const wrappedListener = (payload: EventPayload<K>) => {
      try {
        listener(payload);
      } catch (error) {
        logger.error('Event listener error', toError(error), {
          operation: 'event_listener_error',
          eventType: event
        });
      }
    };
    return wrappedListener;
  }
}

/**
 * Singleton event bus instance shared by the application
 */
export const eventBus = TypedEventBus.getInstance();

export { TypedEventBus };
