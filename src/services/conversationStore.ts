import { ConversationState, ConversationSnapshot, SessionInfo } from '../context/types';
import type { UserId } from '../types/common';

/**
 * Holds exactly one ConversationState per user, created on first use.
 * The store does no locking of its own; the orchestrator serializes access
 * per user.
 */
export class ConversationStore {
  private states: Map<UserId, ConversationState> = new Map();

  /**
   * Returns the state and whether it was created by this call.
   */
  getOrCreate(userId: UserId): { state: ConversationState; created: boolean } {
    const existing = this.states.get(userId);
    if (existing) {
      return { state: existing, created: false };
    }

    const now = new Date();
    const state: ConversationState = {
      userId,
      currentHandler: 'general',
      pendingSubDialog: 'none',
      contactPromptCount: 0,
      turnCount: 0,
      sameHandlerTurns: 0,
      history: [],
      createdAt: now,
      lastActivity: now
    };
    this.states.set(userId, state);
    return { state, created: true };
  }

  get(userId: UserId): ConversationSnapshot | undefined {
    return this.states.get(userId);
  }

  delete(userId: UserId): boolean {
    return this.states.delete(userId);
  }

  has(userId: UserId): boolean {
    return this.states.has(userId);
  }

  get size(): number {
    return this.states.size;
  }

  describe(userId: UserId): SessionInfo | undefined {
    const state = this.states.get(userId);
    if (!state) {
      return undefined;
    }
    return {
      userId: state.userId,
      createdAt: state.createdAt.toISOString(),
      lastActivity: state.lastActivity.toISOString(),
      turnCount: state.turnCount,
      currentHandler: state.currentHandler,
      pendingSubDialog: state.pendingSubDialog,
      history: state.history.map((entry) => ({
        handler: entry.handler,
        timestamp: entry.timestamp.toISOString(),
        query: entry.query
      }))
    };
  }
}
