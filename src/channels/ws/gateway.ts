import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../utils/logger';
import { toError } from '../../utils/errors';
import { eventBus } from '../../events/bus';
import { ClientConnection } from './connection';
import {
  AgentsStatusData,
  errorFrame,
  InboundFrame,
  parseInboundFrame,
  replyFrame,
  SESSION_CLEARED,
  SESSION_NOT_FOUND,
  SessionAction,
  sessionDataFrame,
  sessionMessageFrame,
  statusFrame,
  StatusType,
  SystemStatusData,
  welcomeFrame
} from './protocol';
import { ClientSocket, IDLE_CLOSE_CODE, IDLE_CLOSE_REASON, SessionSummary, SHUTDOWN_CLOSE_CODE } from './types';
import type { Orchestrator } from '../../services/orchestrator';
import type { TypedEmitter } from '../../events/types';
import type { ConnectionId } from '../../types/common';

export interface GatewayOptions {
  idleTimeoutMs: number;
}

export interface OpenOptions {
  /** Identity supplied by the client; the connection id is used when absent */
  userId?: string;
}

/**
 * Session layer for chat clients. Owns the table of live connections and
 * turns inbound frames into orchestrator calls.
 *
 * Closing a connection never touches the user's conversation state, so a
 * reconnect with the same user id continues where it left off.
 */
export class ChatGateway {
  private readonly sessions = new Map<ConnectionId, ClientConnection>();

  constructor(
    private readonly orchestrator: Orchestrator,
    private readonly options: GatewayOptions,
    private readonly events: TypedEmitter = eventBus
  ) {}

  get activeSessions(): number {
    return this.sessions.size;
  }

  getSession(connectionId: ConnectionId): SessionSummary | undefined {
    return this.sessions.get(connectionId)?.summary();
  }

  open(socket: ClientSocket, options: OpenOptions = {}): ClientConnection {
    const connectionId = uuidv4();
    const userId = options.userId?.trim() || connectionId;

    const connection = new ClientConnection(socket, connectionId, userId, {
      idleTimeoutMs: this.options.idleTimeoutMs,
      onIdle: (idle) => this.expire(idle)
    });
    this.sessions.set(connectionId, connection);
    connection.open();

    logger.info('Chat connection opened', {
      connectionId,
      userId,
      operation: 'session_open'
    });
    this.events.emit('session_open', { connectionId, userId });

    connection.send(welcomeFrame(connectionId, userId));
    return connection;
  }

  /**
   * Queue one raw frame for the connection. Resolves once the frame (and
   * everything queued before it) has been handled.
   */
  receive(connectionId: ConnectionId, raw: string): Promise<void> {
    const connection = this.sessions.get(connectionId);
    if (!connection) {
      logger.debug('Frame for unknown connection ignored', {
        connectionId,
        operation: 'frame_receive'
      });
      return Promise.resolve();
    }
    return connection.enqueue(() => this.handleFrame(connection, raw));
  }

  /**
   * Remove the session once the transport is gone. Safe to call more than
   * once for the same connection.
   */
  close(connectionId: ConnectionId, reason: string): void {
    const connection = this.sessions.get(connectionId);
    if (!connection) {
      return;
    }

    this.sessions.delete(connectionId);
    connection.markClosed();

    logger.info('Chat connection closed', {
      connectionId,
      userId: connection.userId,
      reason,
      operation: 'session_close'
    }, { messageCount: connection.messageCount });

    this.events.emit('session_close', {
      connectionId,
      userId: connection.userId,
      reason,
      messageCount: connection.messageCount
    });
  }

  closeAll(): void {
    for (const connection of [...this.sessions.values()]) {
      connection.close(SHUTDOWN_CLOSE_CODE, 'server shutdown');
      this.close(connection.connectionId, 'server_shutdown');
    }
  }

  private expire(connection: ClientConnection): void {
    logger.info('Closing idle connection', {
      connectionId: connection.connectionId,
      userId: connection.userId,
      operation: 'idle_timeout'
    }, { idleTimeoutMs: this.options.idleTimeoutMs });

    connection.close(IDLE_CLOSE_CODE, IDLE_CLOSE_REASON);
    this.close(connection.connectionId, 'idle_timeout');
  }

  private async handleFrame(connection: ClientConnection, raw: string): Promise<void> {
    const parsed = parseInboundFrame(raw);
    if (!parsed.ok) {
      connection.send(errorFrame(parsed.error));
      return;
    }

    try {
      await this.dispatch(connection, parsed.frame);
    } catch (error) {
      const err = toError(error);
      logger.error('Failed to handle frame', err, {
        connectionId: connection.connectionId,
        userId: connection.userId,
        operation: `frame_${parsed.frame.type}`
      });
      connection.send(errorFrame(`Failed to process ${parsed.frame.type} request: ${err.message}`));
    }
  }

  private async dispatch(connection: ClientConnection, frame: InboundFrame): Promise<void> {
    switch (frame.type) {
      case 'message': {
        const reply = await this.orchestrator.submit(frame.content, connection.userId);
        connection.send(replyFrame(reply));
        return;
      }
      case 'status':
        connection.send(statusFrame(frame.statusType, this.statusData(frame.statusType)));
        return;
      case 'session':
        await this.handleSession(connection, frame.action);
        return;
    }
  }

  private statusData(statusType: StatusType): SystemStatusData | AgentsStatusData {
    if (statusType === 'system') {
      return { ...this.orchestrator.getSystemStats(), activeSessions: this.sessions.size };
    }

    return Object.fromEntries(
      Object.values(this.orchestrator.getHandlerStatus()).map((status) => [
        status.kind,
        {
          active: status.active,
          transcriptLength: status.transcriptLength,
          lastActivity: status.lastActivity ? status.lastActivity.toISOString() : null
        }
      ])
    );
  }

  private async handleSession(connection: ClientConnection, action: SessionAction): Promise<void> {
    if (action === 'clear') {
      await this.orchestrator.clearSession(connection.userId);
      connection.send(sessionMessageFrame(action, SESSION_CLEARED));
      return;
    }

    const info = this.orchestrator.getSessionInfo(connection.userId);
    connection.send(info ? sessionDataFrame(action, info) : sessionMessageFrame(action, SESSION_NOT_FOUND));
  }
}
