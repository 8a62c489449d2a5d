import { logger } from '../../utils/logger';
import { toError } from '../../utils/errors';
import { ClientSocket, ConnectionState, SessionSummary, SOCKET_OPEN } from './types';
import type { OutboundFrame } from './protocol';
import type { ConnectionId, UserId } from '../../types/common';

export interface ConnectionOptions {
  idleTimeoutMs: number;
  onIdle: (connection: ClientConnection) => void;
}

/**
 * One client connection: its lifecycle state, a FIFO queue for inbound
 * frames and the idle timer.
 *
 * Lifecycle: connecting → open → closing → closed. Frames are only written
 * while the connection is open, so replies that finish after a close are
 * dropped.
 */
export class ClientConnection {
  readonly openedAt = new Date();
  private lifecycle: ConnectionState = 'connecting';
  private queue: Promise<void> = Promise.resolve();
  private idleTimer: NodeJS.Timeout | null = null;
  private received = 0;
  private lastActivity = this.openedAt;

  constructor(
    private readonly socket: ClientSocket,
    readonly connectionId: ConnectionId,
    readonly userId: UserId,
    private readonly options: ConnectionOptions
  ) {}

  get state(): ConnectionState {
    return this.lifecycle;
  }

  get messageCount(): number {
    return this.received;
  }

  open(): void {
    if (this.lifecycle !== 'connecting') {
      return;
    }
    this.lifecycle = 'open';
    this.resetIdleTimer();
  }

  /**
   * Queue work for one inbound frame. Tasks run strictly one after another;
   * tasks still queued when the connection leaves the open state are skipped.
   */
  enqueue(task: () => Promise<void>): Promise<void> {
    this.received += 1;
    this.lastActivity = new Date();
    this.resetIdleTimer();

    this.queue = this.queue
      .then(async () => {
        if (this.lifecycle === 'open') {
          await task();
        }
      })
      .catch((error) => {
        logger.error('Queued frame failed', toError(error), {
          connectionId: this.connectionId,
          userId: this.userId,
          operation: 'frame_queue'
        });
      });

    return this.queue;
  }

  send(frame: OutboundFrame): boolean {
    if (this.lifecycle !== 'open' || this.socket.readyState !== SOCKET_OPEN) {
      logger.debug('Dropping frame for connection that is not open', {
        connectionId: this.connectionId,
        operation: 'frame_send'
      }, { frameType: frame.type, state: this.lifecycle });
      return false;
    }

    try {
      this.socket.send(JSON.stringify(frame));
      return true;
    } catch (error) {
      logger.error('Failed to write frame', toError(error), {
        connectionId: this.connectionId,
        userId: this.userId,
        operation: 'frame_send'
      });
      return false;
    }
  }

  /**
   * Start closing from our side. The socket's own close event finishes the
   * transition through `markClosed`.
   */
  close(code: number, reason: string): void {
    if (this.lifecycle === 'closing' || this.lifecycle === 'closed') {
      return;
    }
    this.lifecycle = 'closing';
    this.clearIdleTimer();

    try {
      this.socket.close(code, reason);
    } catch (error) {
      logger.warn('Socket close failed', {
        connectionId: this.connectionId,
        operation: 'connection_close'
      }, { error: toError(error).message });
    }
  }

  markClosed(): void {
    this.lifecycle = 'closed';
    this.clearIdleTimer();
  }

  summary(): SessionSummary {
    return {
      connectionId: this.connectionId,
      userId: this.userId,
      state: this.lifecycle,
      openedAt: this.openedAt.toISOString(),
      lastActivity: this.lastActivity.toISOString(),
      messageCount: this.received
    };
  }

  private resetIdleTimer(): void {
    this.clearIdleTimer();
    this.idleTimer = setTimeout(() => {
      this.idleTimer = null;
      this.options.onIdle(this);
    }, this.options.idleTimeoutMs);
    this.idleTimer.unref();
  }

  private clearIdleTimer(): void {
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = null;
    }
  }
}
