import type { ConnectionId, UserId } from '../../types/common';

/**
 * The part of a WebSocket the session layer writes to. `ws` sockets satisfy
 * it directly; tests pass a recording fake.
 */
export interface ClientSocket {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

/** Mirrors `WebSocket.OPEN` */
export const SOCKET_OPEN = 1;

export type ConnectionState = 'connecting' | 'open' | 'closing' | 'closed';

export interface SessionSummary {
  connectionId: ConnectionId;
  userId: UserId;
  state: ConnectionState;
  openedAt: string;
  lastActivity: string;
  messageCount: number;
}

export const IDLE_CLOSE_CODE = 4000;
export const IDLE_CLOSE_REASON = 'idle timeout';
export const SHUTDOWN_CLOSE_CODE = 1001;
