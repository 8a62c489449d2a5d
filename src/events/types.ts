import type { ConnectionId, HandlerKind, UserId } from '../types/common';

/**
 * Event payload interfaces for the lifecycle event system
 */

export interface ConversationStartEvent {
  userId: UserId;
}

export interface ConversationClearedEvent {
  userId: UserId;
  turnCount: number;
  purgedTranscriptEntries: number;
}

export interface HandlerSwitchEvent {
  userId: UserId;
  fromHandler: HandlerKind;
  toHandler: HandlerKind;
  reason: string;
}

export type EscalationReason = 'escalation_keyword' | 'low_confidence' | 'turn_limit';

export interface EscalationEvent {
  userId: UserId;
  reason: EscalationReason;
  fromHandler: HandlerKind;
}

export interface HandlerFallbackEvent {
  userId: UserId;
  failedHandler: HandlerKind;
  error: string;
}

export interface SubDialogAbandonedEvent {
  userId: UserId;
  prompts: number;
  reason: 'prompt_ceiling' | 'escalation_keyword';
}

export interface SessionOpenEvent {
  connectionId: ConnectionId;
  userId: UserId;
}

export interface SessionCloseEvent {
  connectionId: ConnectionId;
  userId: UserId;
  reason: string;
  messageCount: number;
}

/**
 * Complete event interface mapping event names to their payload types
 */
export interface Events {
  conversation_start: ConversationStartEvent;
  conversation_cleared: ConversationClearedEvent;
  handler_switch: HandlerSwitchEvent;
  escalation: EscalationEvent;
  handler_fallback: HandlerFallbackEvent;
  subdialog_abandoned: SubDialogAbandonedEvent;
  session_open: SessionOpenEvent;
  session_close: SessionCloseEvent;
}

export type EventName = keyof Events;

export type EventPayload<T extends EventName> = Events[T];

export type EventListener<T extends EventName> = (payload: EventPayload<T>) => void;

/**
 * Type-safe subset of the EventEmitter surface used by the application
 */
export interface TypedEmitter {
  emit<K extends EventName>(event: K, payload: EventPayload<K>): boolean;
  on<K extends EventName>(event: K, listener: EventListener<K>): this;
  removeAllListeners<K extends EventName>(event?: K): this;
  listenerCount<K extends EventName>(event: K): number;
}
