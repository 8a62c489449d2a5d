import type { Request } from 'express';
import type expressWs from 'express-ws';
import type { RawData } from 'ws';
import { logger } from '../../utils/logger';
import { toError } from '../../utils/errors';
import type { ChatGateway } from './gateway';

export const CHAT_ROUTE = '/chat';

/**
 * Identity the client asked for: the `userId` query parameter, then the
 * `x-user-id` header. Frames cannot change it later.
 */
export function resolveUserId(req: Request): string | undefined {
  const fromQuery = req.query.userId;
  if (typeof fromQuery === 'string' && fromQuery.trim() !== '') {
    return fromQuery.trim();
  }
  const fromHeader = req.get('x-user-id');
  return fromHeader && fromHeader.trim() !== '' ? fromHeader.trim() : undefined;
}

export function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

/**
 * Mount the chat WebSocket endpoint and bridge socket events into the
 * gateway.
 */
export function registerChatRoute(app: expressWs.Application, gateway: ChatGateway, path: string = CHAT_ROUTE): void {
  app.ws(path, (ws, req) => {
    const connection = gateway.open(ws, { userId: resolveUserId(req) });
    const { connectionId } = connection;

    ws.on('message', (data: RawData) => {
      gateway.receive(connectionId, rawDataToString(data)).catch((error) => {
        logger.error('Chat frame handling failed', toError(error), {
          connectionId,
          operation: 'ws_message'
        });
      });
    });

    ws.on('close', (code: number) => {
      gateway.close(connectionId, `socket_closed_${code}`);
    });

    ws.on('error', (error: Error) => {
      logger.error('Chat socket error', error, {
        connectionId,
        userId: connection.userId,
        operation: 'ws_error'
      });
      gateway.close(connectionId, 'transport_error');
    });
  });
}
