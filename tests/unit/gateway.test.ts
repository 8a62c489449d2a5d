import { ChatGateway } from '../../src/channels/ws/gateway';
import { WELCOME_MESSAGE } from '../../src/channels/ws/protocol';
import { Orchestrator } from '../../src/services/orchestrator';
import { Router } from '../../src/services/router';
import { TypedEventBus } from '../../src/events/bus';
import { HandlerRegistry, createDefaultHandlers } from '../../src/registry/handler-registry';
import { InMemoryOrderStore } from '../../src/services/orders/memoryStore';
import { DEFAULT_ROUTING_POLICY } from '../../src/config/environment';
import { FakeSocket, ScriptedBackend, TEST_ORDERS } from '../helpers/fakes';
import type { GenerationBackend } from '../../src/services/generation';

const HOURS_QUESTION = JSON.stringify({ type: 'message', content: 'What are your business hours?' });

/**
 * Backend whose calls wait until the test lets them finish.
 */
class GatedBackend implements GenerationBackend {
  started: Promise<void>;
  private markStarted: () => void = () => undefined;
  private release: () => void = () => undefined;

  constructor() {
    this.started = new Promise((resolve) => {
      this.markStarted = resolve;
    });
  }

  async generate(): Promise<string> {
    this.markStarted();
    await new Promise<void>((resolve) => {
      this.release = resolve;
    });
    return 'late reply';
  }

  finish(): void {
    this.release();
  }
}

function buildGateway(backend: GenerationBackend = new ScriptedBackend(), idleTimeoutMs = 60000) {
  const events = new TypedEventBus();
  const registry = HandlerRegistry.create(
    createDefaultHandlers({ backend, orderStore: new InMemoryOrderStore({ orders: TEST_ORDERS }) })
  );
  const orchestrator = new Orchestrator(registry, new Router(registry, DEFAULT_ROUTING_POLICY, events), events);
  const gateway = new ChatGateway(orchestrator, { idleTimeoutMs }, events);
  return { gateway, orchestrator, events };
}

describe('ChatGateway', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('open', () => {
    it('should greet the client and register the session', () => {
      const { gateway, events } = buildGateway();
      const opened = jest.fn();
      events.on('session_open', opened);
      const socket = new FakeSocket();

      const connection = gateway.open(socket, { userId: '  customer-42 ' });

      expect(connection.userId).toBe('customer-42');
      expect(connection.state).toBe('open');
      expect(gateway.activeSessions).toBe(1);
      expect(socket.frames()).toEqual([
        {
          type: 'connection',
          status: 'connected',
          connectionId: connection.connectionId,
          userId: 'customer-42',
          message: WELCOME_MESSAGE,
          timestamp: expect.any(String)
        }
      ]);
      expect(opened).toHaveBeenCalledWith({ connectionId: connection.connectionId, userId: 'customer-42' });
      expect(gateway.getSession(connection.connectionId)).toEqual({
        connectionId: connection.connectionId,
        userId: 'customer-42',
        state: 'open',
        openedAt: connection.openedAt.toISOString(),
        lastActivity: connection.openedAt.toISOString(),
        messageCount: 0
      });
      gateway.closeAll();
    });

    it('should use the connection id when no user id is supplied', () => {
      const { gateway } = buildGateway();

      const connection = gateway.open(new FakeSocket());

      expect(connection.userId).toBe(connection.connectionId);
      expect(connection.connectionId).toMatch(/^[0-9a-f-]{36}$/);
      gateway.closeAll();
    });
  });

  describe('frames', () => {
    it('should answer chat messages with a message frame', async () => {
      const { gateway } = buildGateway();
      const socket = new FakeSocket();
      const { connectionId } = gateway.open(socket, { userId: 'user-1' });

      await gateway.receive(connectionId, HOURS_QUESTION);

      expect(socket.last()).toEqual({
        type: 'message',
        content: 'General Support reply',
        agentType: 'general',
        confidence: 0.9,
        timestamp: expect.any(String),
        metadata: expect.objectContaining({ recommendation: null })
      });
      gateway.closeAll();
    });

    it('should handle frames from one connection in arrival order', async () => {
      const { gateway } = buildGateway();
      const socket = new FakeSocket();
      const { connectionId } = gateway.open(socket, { userId: 'user-1' });

      const first = gateway.receive(connectionId, HOURS_QUESTION);
      const second = gateway.receive(connectionId, '{"type":"session"}');
      await Promise.all([first, second]);

      const [, reply, session] = socket.frames();
      expect(reply.type).toBe('message');
      expect(session).toMatchObject({ type: 'session', action: 'get', data: { userId: 'user-1', turnCount: 1 } });
      gateway.closeAll();
    });

    it('should answer an invalid frame with an error and keep going', async () => {
      const { gateway } = buildGateway();
      const socket = new FakeSocket();
      const { connectionId } = gateway.open(socket, { userId: 'user-1' });

      await gateway.receive(connectionId, '{"type":"dance"}');
      await gateway.receive(connectionId, 'plain text question');

      const [, error, reply] = socket.frames();
      expect(error).toEqual({ type: 'error', message: 'Unknown message type: dance', timestamp: expect.any(String) });
      expect(reply.type).toBe('message');
      gateway.closeAll();
    });

    it('should report system and handler status', async () => {
      const { gateway } = buildGateway();
      const socket = new FakeSocket();
      const { connectionId } = gateway.open(socket, { userId: 'user-1' });

      await gateway.receive(connectionId, HOURS_QUESTION);
      await gateway.receive(connectionId, '{"type":"status"}');
      await gateway.receive(connectionId, '{"type":"status","statusType":"agents"}');

      const [, , system, agents] = socket.frames();
      expect(system).toMatchObject({
        type: 'status',
        statusType: 'system',
        data: {
          totalConversations: 1,
          transcriptEntries: 1,
          handlerCount: 5,
          handlerKinds: ['general', 'technical', 'billing', 'escalation', 'order_lookup'],
          activeSessions: 1
        }
      });
      expect(agents).toMatchObject({
        type: 'status',
        statusType: 'agents',
        data: {
          general: { active: true, transcriptLength: 1, lastActivity: expect.any(String) },
          billing: { active: true, transcriptLength: 0, lastActivity: null }
        }
      });
      gateway.closeAll();
    });

    it('should get and clear the session of the connected user', async () => {
      const { gateway, orchestrator } = buildGateway();
      const socket = new FakeSocket();
      const { connectionId } = gateway.open(socket, { userId: 'user-1' });

      await gateway.receive(connectionId, '{"type":"session","action":"get"}');
      await gateway.receive(connectionId, HOURS_QUESTION);
      await gateway.receive(connectionId, '{"type":"session","action":"clear"}');

      const [, notFound, , cleared] = socket.frames();
      expect(notFound).toMatchObject({ type: 'session', action: 'get', message: 'Session not found' });
      expect(cleared).toMatchObject({ type: 'session', action: 'clear', message: 'Session cleared' });
      expect(orchestrator.getSessionInfo('user-1')).toBeUndefined();
      gateway.closeAll();
    });
  });

  describe('close', () => {
    it('should remove the session and keep the conversation state', async () => {
      const { gateway, events } = buildGateway();
      const closed = jest.fn();
      events.on('session_close', closed);
      const socket = new FakeSocket();
      const { connectionId } = gateway.open(socket, { userId: 'user-1' });
      await gateway.receive(connectionId, HOURS_QUESTION);

      gateway.close(connectionId, 'client_closed');
      gateway.close(connectionId, 'client_closed');

      expect(gateway.activeSessions).toBe(0);
      expect(closed).toHaveBeenCalledTimes(1);
      expect(closed).toHaveBeenCalledWith({
        connectionId,
        userId: 'user-1',
        reason: 'client_closed',
        messageCount: 1
      });

      const again = new FakeSocket();
      const reconnected = gateway.open(again, { userId: 'user-1' });
      await gateway.receive(reconnected.connectionId, '{"type":"session"}');
      expect(again.last()).toMatchObject({ type: 'session', data: { userId: 'user-1', turnCount: 1 } });
      gateway.closeAll();
    });

    it('should drop a reply that finishes after the connection closed', async () => {
      const backend = new GatedBackend();
      const { gateway, orchestrator } = buildGateway(backend);
      const socket = new FakeSocket();
      const { connectionId } = gateway.open(socket, { userId: 'user-1' });

      const pending = gateway.receive(connectionId, HOURS_QUESTION);
      await backend.started;
      gateway.close(connectionId, 'client_closed');
      backend.finish();
      await pending;

      expect(socket.sent).toHaveLength(1);
      expect(orchestrator.getSessionInfo('user-1')?.turnCount).toBe(1);
    });

    it('should ignore frames for closed connections', async () => {
      const { gateway } = buildGateway();
      const socket = new FakeSocket();
      const { connectionId } = gateway.open(socket);
      gateway.close(connectionId, 'client_closed');

      await gateway.receive(connectionId, HOURS_QUESTION);

      expect(socket.sent).toHaveLength(1);
    });

    it('should close every connection on shutdown', () => {
      const { gateway } = buildGateway();
      const first = new FakeSocket();
      const second = new FakeSocket();
      gateway.open(first);
      gateway.open(second);

      gateway.closeAll();

      expect(first.closedWith).toEqual({ code: 1001, reason: 'server shutdown' });
      expect(second.closedWith).toEqual({ code: 1001, reason: 'server shutdown' });
      expect(gateway.activeSessions).toBe(0);
    });
  });

  describe('idle timeout', () => {
    beforeEach(() => {
      jest.useFakeTimers();
    });

    afterEach(() => {
      jest.useRealTimers();
    });

    it('should close a connection that stays idle', () => {
      const { gateway, events } = buildGateway(new ScriptedBackend(), 1000);
      const closed = jest.fn();
      events.on('session_close', closed);
      const socket = new FakeSocket();
      const { connectionId } = gateway.open(socket, { userId: 'user-1' });

      jest.advanceTimersByTime(999);
      expect(socket.closedWith).toBeNull();

      jest.advanceTimersByTime(1);
      expect(socket.closedWith).toEqual({ code: 4000, reason: 'idle timeout' });
      expect(gateway.activeSessions).toBe(0);
      expect(closed).toHaveBeenCalledWith({ connectionId, userId: 'user-1', reason: 'idle_timeout', messageCount: 0 });
    });

    it('should restart the idle timer on every inbound frame', async () => {
      const { gateway } = buildGateway(new ScriptedBackend(), 1000);
      const socket = new FakeSocket();
      const { connectionId } = gateway.open(socket);

      jest.advanceTimersByTime(800);
      await gateway.receive(connectionId, '{"type":"status"}');
      jest.advanceTimersByTime(800);
      expect(socket.closedWith).toBeNull();

      jest.advanceTimersByTime(200);
      expect(socket.closedWith).toEqual({ code: 4000, reason: 'idle timeout' });
    });
  });
});
