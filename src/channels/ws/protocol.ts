import { z } from 'zod';
import type { HandlerReply } from '../../handlers/types';
import type { SessionInfo } from '../../context/types';
import type { SystemStats } from '../../services/orchestrator';
import type { ConnectionId, Metadata, UserId } from '../../types/common';

export const WELCOME_MESSAGE = 'Welcome to customer support! How can I help you today?';
export const SESSION_NOT_FOUND = 'Session not found';
export const SESSION_CLEARED = 'Session cleared';

const messageFrameSchema = z.object({
  type: z.literal('message'),
  content: z.string()
});

const statusFrameSchema = z.object({
  type: z.literal('status'),
  statusType: z.enum(['system', 'agents']).default('system')
});

const sessionFrameSchema = z.object({
  type: z.literal('session'),
  action: z.enum(['get', 'clear']).default('get')
});

export const inboundFrameSchema = z.discriminatedUnion('type', [
  messageFrameSchema,
  statusFrameSchema,
  sessionFrameSchema
]);

export type InboundFrame = z.infer<typeof inboundFrameSchema>;
export type StatusType = z.infer<typeof statusFrameSchema>['statusType'];
export type SessionAction = z.infer<typeof sessionFrameSchema>['action'];

const FRAME_TYPES: ReadonlySet<string> = new Set(['message', 'status', 'session']);

export type ParseResult =
  | { ok: true; frame: InboundFrame }
  | { ok: false; error: string };

/**
 * Turn one raw text frame into an inbound frame.
 *
 * Anything that is not a JSON object is taken as a chat message carrying the
 * raw text, and an object without `type` is a message too.
 */
export function parseInboundFrame(raw: string): ParseResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { ok: true, frame: { type: 'message', content: raw } };
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return { ok: true, frame: { type: 'message', content: raw } };
  }

  const candidate: Record<string, unknown> = { type: 'message', ...parsed };
  const type = candidate.type;
  if (typeof type !== 'string' || !FRAME_TYPES.has(type)) {
    return { ok: false, error: `Unknown message type: ${String(type)}` };
  }

  const result = inboundFrameSchema.safeParse(candidate);
  if (!result.success) {
    const details = result.error.issues.map((issue) => issue.message).join('; ');
    return { ok: false, error: `Invalid ${type} frame: ${details}` };
  }
  return { ok: true, frame: result.data };
}

// Outbound frames

export interface WelcomeFrame {
  type: 'connection';
  status: 'connected';
  connectionId: ConnectionId;
  userId: UserId;
  message: string;
  timestamp: string;
}

export interface ReplyFrame {
  type: 'message';
  content: string;
  agentType: string;
  confidence: number;
  timestamp: string;
  metadata: Metadata;
}

export interface SystemStatusData extends SystemStats {
  activeSessions: number;
}

export interface AgentStatusEntry {
  active: boolean;
  transcriptLength: number;
  lastActivity: string | null;
}

export type AgentsStatusData = Record<string, AgentStatusEntry>;

export interface StatusFrame {
  type: 'status';
  statusType: StatusType;
  data: SystemStatusData | AgentsStatusData;
  timestamp: string;
}

export type SessionFrame =
  | { type: 'session'; action: SessionAction; data: SessionInfo; timestamp: string }
  | { type: 'session'; action: SessionAction; message: string; timestamp: string };

export interface ErrorFrame {
  type: 'error';
  message: string;
  timestamp: string;
}

export type OutboundFrame = WelcomeFrame | ReplyFrame | StatusFrame | SessionFrame | ErrorFrame;

export function welcomeFrame(connectionId: ConnectionId, userId: UserId): WelcomeFrame {
  return {
    type: 'connection',
    status: 'connected',
    connectionId,
    userId,
    message: WELCOME_MESSAGE,
    timestamp: new Date().toISOString()
  };
}

export function replyFrame(reply: HandlerReply): ReplyFrame {
  return {
    type: 'message',
    content: reply.text,
    agentType: reply.handler,
    confidence: reply.confidence,
    timestamp: reply.timestamp.toISOString(),
    metadata: { ...reply.metadata }
  };
}

export function statusFrame(statusType: StatusType, data: SystemStatusData | AgentsStatusData): StatusFrame {
  return { type: 'status', statusType, data, timestamp: new Date().toISOString() };
}

export function sessionDataFrame(action: SessionAction, data: SessionInfo): SessionFrame {
  return { type: 'session', action, data, timestamp: new Date().toISOString() };
}

export function sessionMessageFrame(action: SessionAction, message: string): SessionFrame {
  return { type: 'session', action, message, timestamp: new Date().toISOString() };
}

export function errorFrame(message: string): ErrorFrame {
  return { type: 'error', message, timestamp: new Date().toISOString() };
}
