import type { HandlerKind, UserId } from '../types/common';

export type SubDialog = 'none' | 'awaiting_contact_info';

export interface HistoryEntry {
  handler: HandlerKind;
  timestamp: Date;
  query: string;
}

/**
 * Per-user routing state. Owned by the conversation store and mutated only
 * by the orchestrator while it holds that user's lock.
 */
export interface ConversationState {
  userId: UserId;
  currentHandler: HandlerKind;
  pendingSubDialog: SubDialog;
  /** Consecutive contact-info prompts in the current sub-dialog */
  contactPromptCount: number;
  turnCount: number;
  /** Consecutive turns answered by currentHandler without a resolution */
  sameHandlerTurns: number;
  history: HistoryEntry[];
  createdAt: Date;
  lastActivity: Date;
}

/**
 * Read-only view handed to the router.
 */
export type ConversationSnapshot = Readonly<Omit<ConversationState, 'history'>> & {
  readonly history: readonly Readonly<HistoryEntry>[];
};

/**
 * Wire-friendly copy of a user's state for session queries.
 */
export interface SessionInfo {
  userId: UserId;
  createdAt: string;
  lastActivity: string;
  turnCount: number;
  currentHandler: HandlerKind;
  pendingSubDialog: SubDialog;
  history: Array<{ handler: HandlerKind; timestamp: string; query: string }>;
}
