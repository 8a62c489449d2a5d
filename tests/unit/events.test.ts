import { logger } from '../../src/utils/logger';
import { eventBus, TypedEventBus } from '../../src/events/bus';
import { EventLogger } from '../../src/events/eventLogger';
import { ConversationStartEvent, EscalationEvent, HandlerSwitchEvent } from '../../src/events/types';

describe('Event System', () => {
  let testEventBus: TypedEventBus;

  beforeEach(() => {
    jest.clearAllMocks();
    // Fresh bus per test so listeners never leak between tests
    testEventBus = new TypedEventBus();
  });

  afterEach(() => {
    testEventBus.removeAllListeners();
  });

  describe('TypedEventBus', () => {
    it('should emit and receive conversation_start events', () => {
      const payload: ConversationStartEvent = { userId: 'test-user-123' };
      const listener = jest.fn();

      testEventBus.on('conversation_start', listener);
      const result = testEventBus.emit('conversation_start', payload);

      expect(result).toBe(true);
      expect(listener).toHaveBeenCalledWith(payload);
    });

    it('should emit and receive handler_switch events', () => {
      const payload: HandlerSwitchEvent = {
        userId: 'test-user-456',
        fromHandler: 'general',
        toHandler: 'billing',
        reason: 'best_score'
      };
      const listener = jest.fn();

      testEventBus.on('handler_switch', listener);
      testEventBus.emit('handler_switch', payload);

      expect(listener).toHaveBeenCalledWith(payload);
    });

    it('should return false when nobody listens', () => {
      expect(testEventBus.emit('session_open', { connectionId: 'conn-1', userId: 'user-1' })).toBe(false);
    });

    it('should handle multiple listeners for the same event', () => {
      const first = jest.fn();
      const second = jest.fn();

      testEventBus.on('escalation', first);
      testEventBus.on('escalation', second);
      testEventBus.emit('escalation', { userId: 'u', reason: 'turn_limit', fromHandler: 'technical' });

      expect(first).toHaveBeenCalledTimes(1);
      expect(second).toHaveBeenCalledTimes(1);
    });

    it('should contain errors thrown by listeners', () => {
      const workingListener = jest.fn();

      testEventBus.on('conversation_start', () => {
        throw new Error('Test error');
      });
      testEventBus.on('conversation_start', workingListener);

      expect(() => testEventBus.emit('conversation_start', { userId: 'test' })).not.toThrow();
      expect(workingListener).toHaveBeenCalled();
      expect(logger.error).toHaveBeenCalledWith('Event listener error', expect.any(Error), {
        operation: 'event_listener_error',
        eventType: 'conversation_start'
      });
    });

    it('should count and remove listeners', () => {
      testEventBus.on('conversation_start', () => undefined);
      testEventBus.on('conversation_start', () => undefined);
      testEventBus.on('escalation', () => undefined);

      expect(testEventBus.listenerCount('conversation_start')).toBe(2);
      expect(testEventBus.getStats()).toEqual({
        totalListeners: 3,
        eventCounts: { conversation_start: 2, escalation: 1 },
        maxListeners: 100
      });

      testEventBus.removeAllListeners('conversation_start');
      expect(testEventBus.listenerCount('conversation_start')).toBe(0);
      expect(testEventBus.listenerCount('escalation')).toBe(1);
    });

    it('should share one application-wide instance', () => {
      expect(TypedEventBus.getInstance()).toBe(eventBus);
    });
  });

  describe('EventLogger', () => {
    it('should subscribe to every lifecycle event once', () => {
      const eventLogger = new EventLogger(testEventBus);

      eventLogger.start();
      eventLogger.start();

      const stats = eventLogger.getStats();
      expect(stats.isActive).toBe(true);
      expect(Object.keys(stats.listenersCount)).toHaveLength(8);
      expect(Object.values(stats.listenersCount).every((count) => count === 1)).toBe(true);
    });

    it('should log routing events through the logger helpers', () => {
      const eventLogger = new EventLogger(testEventBus);
      eventLogger.start();
      const escalation: EscalationEvent = { userId: 'user-1', reason: 'low_confidence', fromHandler: 'general' };

      testEventBus.emit('conversation_start', { userId: 'user-1' });
      testEventBus.emit('escalation', escalation);
      testEventBus.emit('handler_switch', {
        userId: 'user-1',
        fromHandler: 'general',
        toHandler: 'technical',
        reason: 'best_score'
      });

      expect(logger.logConversationStart).toHaveBeenCalledWith('user-1');
      expect(logger.logEscalation).toHaveBeenCalledWith('low_confidence', {
        userId: 'user-1',
        fromHandler: 'general',
        eventType: 'routing'
      });
      expect(logger.logHandlerSwitch).toHaveBeenCalledWith('general', 'technical', 'best_score', {
        userId: 'user-1',
        eventType: 'routing'
      });
    });

    it('should unsubscribe on stop', () => {
      const eventLogger = new EventLogger(testEventBus);
      eventLogger.start();

      eventLogger.stop();

      expect(eventLogger.getStats().isActive).toBe(false);
      expect(testEventBus.listenerCount('session_close')).toBe(0);
    });
  });
});
