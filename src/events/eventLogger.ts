import { eventBus } from './bus';
import { logger } from '../utils/logger';
import { EventName, TypedEmitter } from './types';

const LIFECYCLE_EVENTS: EventName[] = [
  'conversation_start',
  'conversation_cleared',
  'handler_switch',
  'escalation',
  'handler_fallback',
  'subdialog_abandoned',
  'session_open',
  'session_close'
];

/**
 * EventLogger - Connects the event bus to the logging system
 *
 * Every lifecycle event becomes one structured log line, giving an audit
 * trail of routing decisions without the emitting code logging them itself.
 */
class EventLogger {
  private active = false;

  constructor(private readonly bus: TypedEmitter = eventBus) {}

  start(): void {
    if (this.active) {
      return;
    }
    this.active = true;

    this.bus.on('conversation_start', (payload) => {
      logger.logConversationStart(payload.userId);
    });

    this.bus.on('conversation_cleared', (payload) => {
      logger.info('Conversation cleared', {
        userId: payload.userId,
        operation: 'conversation_cleared',
        eventType: 'lifecycle'
      }, {
        turnCount: payload.turnCount,
        purgedTranscriptEntries: payload.purgedTranscriptEntries
      });
    });

    this.bus.on('handler_switch', (payload) => {
      logger.logHandlerSwitch(payload.fromHandler, payload.toHandler, payload.reason, {
        userId: payload.userId,
        eventType: 'routing'
      });
    });

    this.bus.on('escalation', (payload) => {
      logger.logEscalation(payload.reason, {
        userId: payload.userId,
        fromHandler: payload.fromHandler,
        eventType: 'routing'
      });
    });

    this.bus.on('handler_fallback', (payload) => {
      logger.logFallback(payload.failedHandler, payload.error, {
        userId: payload.userId,
        eventType: 'routing'
      });
    });

    this.bus.on('subdialog_abandoned', (payload) => {
      logger.warn('Contact info sub-dialog abandoned', {
        userId: payload.userId,
        operation: 'subdialog_abandoned',
        reason: payload.reason,
        eventType: 'routing'
      }, {
        prompts: payload.prompts
      });
    });

    this.bus.on('session_open', (payload) => {
      logger.info('Session opened', {
        userId: payload.userId,
        connectionId: payload.connectionId,
        operation: 'session_open',
        eventType: 'lifecycle'
      });
    });

    this.bus.on('session_close', (payload) => {
      logger.info('Session closed', {
        userId: payload.userId,
        connectionId: payload.connectionId,
        operation: 'session_close',
        reason: payload.reason,
        eventType: 'lifecycle'
      }, {
        messageCount: payload.messageCount
      });
    });

    logger.info('Event logging initialized', {
      operation: 'event_logger_init'
    });
  }

  getStats(): {
    listenersCount: Record<string, number>;
    isActive: boolean;
  } {
    const listenersCount: Record<string, number> = {};
    for (const event of LIFECYCLE_EVENTS) {
      listenersCount[event] = this.bus.listenerCount(event);
    }
    return { listenersCount, isActive: this.active };
  }

  stop(): void {
    for (const event of LIFECYCLE_EVENTS) {
      this.bus.removeAllListeners(event);
    }
    this.active = false;

    logger.info('Event logging stopped', {
      operation: 'event_logger_stop'
    });
  }
}

const eventLogger = new EventLogger();

export { eventLogger, EventLogger };
