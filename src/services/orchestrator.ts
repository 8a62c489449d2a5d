import { logger } from '../utils/logger';
import { toError } from '../utils/errors';
import { eventBus } from '../events/bus';
import { createFailureReply, createReply, HandlerReply, HandlerStatus } from '../handlers/types';
import { ConversationStore } from './conversationStore';
import { UserLock } from './userLock';
import { Router, RouteOutcome, isEscalationReason } from './router';
import type { HandlerRegistry } from '../registry/handler-registry';
import type { ConversationState, SessionInfo } from '../context/types';
import type { TypedEmitter } from '../events/types';
import type { HandlerKind, UserId } from '../types/common';

export const REPHRASE_PROMPT = "I didn't catch that. Could you rephrase your question?";

const INTERNAL_ERROR_REPLY =
  "I'm sorry, something went wrong while handling your message. Please try again, or ask to speak with a support specialist.";

export interface SystemStats {
  totalConversations: number;
  transcriptEntries: number;
  handlerCount: number;
  handlerKinds: HandlerKind[];
}

/**
 * Owns per-user conversation state and turns one customer message into one
 * reply. Each user's turns run one at a time under that user's lock; other
 * users are never blocked.
 */
export class Orchestrator {
  private readonly store = new ConversationStore();
  private readonly locks = new UserLock();

  constructor(
    private readonly registry: HandlerRegistry,
    private readonly router: Router,
    private readonly events: TypedEmitter = eventBus
  ) {}

  /**
   * Never rejects: unexpected errors become an apology reply.
   */
  async submit(text: string, userId: UserId): Promise<HandlerReply> {
    return this.locks.runExclusive(userId, async () => {
      const state = this.stateFor(userId);

      try {
        if (text.trim() === '') {
          state.turnCount += 1;
          state.lastActivity = new Date();
          return createReply('general', REPHRASE_PROMPT, 0, { inputError: 'empty_message' });
        }

        const outcome = await this.router.route(text, userId, state);
        this.apply(state, text, outcome);
        return outcome.reply;
      } catch (error) {
        const err = toError(error);
        logger.error('Failed to process message', err, {
          userId,
          operation: 'submit'
        });
        return createFailureReply('general', INTERNAL_ERROR_REPLY, err.message);
      }
    });
  }

  /**
   * Drop the user's state and their entries in every handler transcript.
   * Returns false when there was no state to clear.
   */
  async clearSession(userId: UserId): Promise<boolean> {
    return this.locks.runExclusive(userId, async () => {
      const existing = this.store.get(userId);
      let purged = 0;
      for (const handler of this.registry.list()) {
        purged += handler.purgeUser(userId);
      }

      if (!existing) {
        return false;
      }

      this.store.delete(userId);
      this.events.emit('conversation_cleared', {
        userId,
        turnCount: existing.turnCount,
        purgedTranscriptEntries: purged
      });
      return true;
    });
  }

  getSessionInfo(userId: UserId): SessionInfo | undefined {
    return this.store.describe(userId);
  }

  getSystemStats(): SystemStats {
    const handlers = this.registry.list();
    return {
      totalConversations: this.store.size,
      transcriptEntries: handlers.reduce((sum, handler) => sum + handler.status().transcriptLength, 0),
      handlerCount: this.registry.size,
      handlerKinds: this.registry.kinds()
    };
  }

  getHandlerStatus(): Record<HandlerKind, HandlerStatus> {
    return {
      general: this.registry.get('general').status(),
      technical: this.registry.get('technical').status(),
      billing: this.registry.get('billing').status(),
      escalation: this.registry.get('escalation').status(),
      order_lookup: this.registry.get('order_lookup').status()
    };
  }

  private stateFor(userId: UserId): ConversationState {
    const { state, created } = this.store.getOrCreate(userId);
    if (created) {
      this.events.emit('conversation_start', { userId });
    }
    return state;
  }

  private apply(state: ConversationState, text: string, outcome: RouteOutcome): void {
    const now = new Date();
    const previous = state.currentHandler;
    const { handler, decision } = outcome;

    if (handler === previous && state.history.length > 0) {
      state.sameHandlerTurns += 1;
    } else {
      state.sameHandlerTurns = 1;
    }
    if (outcome.reply.metadata.resolved === true) {
      state.sameHandlerTurns = 0;
    }

    state.history.push({ handler, timestamp: now, query: text });
    state.turnCount += 1;
    state.currentHandler = handler;
    state.pendingSubDialog = outcome.subDialog;
    state.contactPromptCount = outcome.contactPromptCount;
    state.lastActivity = now;

    if (isEscalationReason(decision.reason)) {
      this.events.emit('escalation', {
        userId: state.userId,
        reason: decision.reason,
        fromHandler: previous
      });
    }

    if (handler !== previous && state.history.length > 1) {
      this.events.emit('handler_switch', {
        userId: state.userId,
        fromHandler: previous,
        toHandler: handler,
        reason: outcome.fallbackFrom ? `fallback from ${outcome.fallbackFrom}` : decision.reason
      });
    }
  }
}
