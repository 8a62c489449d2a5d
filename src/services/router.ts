import keywords from '../handlers/keywords.json';
import { logger } from '../utils/logger';
import { toError } from '../utils/errors';
import { eventBus } from '../events/bus';
import { containsAny } from '../handlers/scoring';
import { contactPromptReply, extractContactInfo, extractOrderNumber, isLookupIntent } from '../handlers/orders';
import { annotateReply, createFailureReply, HandlerReply, isFailureReply } from '../handlers/types';
import { DEFAULT_ROUTING_POLICY, RoutingPolicy } from '../config/environment';
import type { HandlerRegistry } from '../registry/handler-registry';
import type { ConversationSnapshot, SubDialog } from '../context/types';
import type { EscalationReason, TypedEmitter } from '../events/types';
import type { HandlerKind, UserId } from '../types/common';

/**
 * Prefix put in front of the customer's text when the general handler
 * retries a turn another handler failed.
 */
export const FALLBACK_MARKER = 'Error occurred: ';

const FALLBACK_APOLOGY =
  "I'm sorry, something went wrong on our side. Please try again in a moment, or ask to speak with a support specialist.";

export type RouteReason =
  | EscalationReason
  | 'contact_supplied'
  | 'contact_reprompt'
  | 'lookup_intent'
  | 'best_score'
  | 'sticky';

const ESCALATION_REASONS: ReadonlySet<RouteReason> = new Set<RouteReason>([
  'escalation_keyword',
  'low_confidence',
  'turn_limit'
]);

export function isEscalationReason(reason: RouteReason): reason is EscalationReason {
  return ESCALATION_REASONS.has(reason);
}

export interface RoutingDecision {
  handler: HandlerKind;
  reason: RouteReason;
  /** Answer with the contact-info prompt instead of calling the handler */
  promptForContact: boolean;
  /** Confidence of every handler, present only when scoring ran */
  scores: Record<HandlerKind, number> | null;
  abandonedSubDialog?: 'prompt_ceiling' | 'escalation_keyword';
}

export interface RouteOutcome {
  reply: HandlerReply;
  /** The handler that actually produced the reply */
  handler: HandlerKind;
  decision: RoutingDecision;
  subDialog: SubDialog;
  contactPromptCount: number;
  fallbackFrom?: HandlerKind;
}

/**
 * Chooses a handler for each message and runs it.
 *
 * Order of precedence: escalation keywords, then a pending contact-info
 * sub-dialog, then lookup intent, then confidence scoring with stickiness and
 * the low-confidence and turn-limit overrides.
 */
export class Router {
  constructor(
    private readonly registry: HandlerRegistry,
    private readonly policy: RoutingPolicy = DEFAULT_ROUTING_POLICY,
    private readonly events: TypedEmitter = eventBus
  ) {}

  /**
   * Pure: the same text and state always produce the same decision.
   */
  select(text: string, state: ConversationSnapshot): RoutingDecision {
    const awaitingContact = state.pendingSubDialog === 'awaiting_contact_info';

    if (containsAny(text, keywords.escalationTriggers)) {
      return {
        handler: 'escalation',
        reason: 'escalation_keyword',
        promptForContact: false,
        scores: null,
        abandonedSubDialog: awaitingContact ? 'escalation_keyword' : undefined
      };
    }

    const suppliedDetails = extractContactInfo(text) !== null || extractOrderNumber(text) !== null;

    if (awaitingContact) {
      if (suppliedDetails) {
        return { handler: 'order_lookup', reason: 'contact_supplied', promptForContact: false, scores: null };
      }
      if (state.contactPromptCount < this.policy.contactPromptCeiling) {
        return { handler: 'order_lookup', reason: 'contact_reprompt', promptForContact: true, scores: null };
      }
      // order_lookup would only ask for the same details again
      return { ...this.selectByScore(text, state, 'order_lookup'), abandonedSubDialog: 'prompt_ceiling' };
    }

    if (isLookupIntent(text)) {
      return { handler: 'order_lookup', reason: 'lookup_intent', promptForContact: !suppliedDetails, scores: null };
    }

    return this.selectByScore(text, state);
  }

  scoreAll(text: string): Record<HandlerKind, number> {
    const scores: Record<HandlerKind, number> = {
      general: 0,
      technical: 0,
      billing: 0,
      escalation: 0,
      order_lookup: 0
    };
    for (const handler of this.registry.list()) {
      scores[handler.kind] = handler.confidence(text);
    }
    return scores;
  }

  /**
   * Select a handler for the message and run it, retrying once on the
   * general handler if the selected one fails. Never rejects on handler
   * failure.
   */
  async route(text: string, userId: UserId, state: ConversationSnapshot): Promise<RouteOutcome> {
    const decision = this.select(text, state);

    logger.debug('Routing decision', {
      userId,
      handler: decision.handler,
      reason: decision.reason,
      operation: 'route_select'
    }, { scores: decision.scores });

    if (decision.abandonedSubDialog) {
      this.events.emit('subdialog_abandoned', {
        userId,
        prompts: state.contactPromptCount,
        reason: decision.abandonedSubDialog
      });
    }

    if (decision.promptForContact) {
      const contactPromptCount =
        state.pendingSubDialog === 'awaiting_contact_info' ? state.contactPromptCount + 1 : 1;
      return {
        reply: contactPromptReply(contactPromptCount),
        handler: 'order_lookup',
        decision,
        subDialog: 'awaiting_contact_info',
        contactPromptCount
      };
    }

    const { reply, handler, fallbackFrom } = await this.execute(decision.handler, text, userId);
    const awaitingContact =
      !decision.abandonedSubDialog && handler === 'order_lookup' && reply.metadata.awaitingContactInfo === true;

    return {
      reply,
      handler,
      decision,
      subDialog: awaitingContact ? 'awaiting_contact_info' : 'none',
      contactPromptCount: awaitingContact ? 1 : 0,
      fallbackFrom
    };
  }

  private selectByScore(text: string, state: ConversationSnapshot, excluded?: HandlerKind): RoutingDecision {
    const scores = this.scoreAll(text);
    const kinds = this.registry.kinds().filter((kind) => kind !== excluded);

    // Strict comparison keeps the earliest kind on ties
    let best = kinds[0];
    for (const kind of kinds) {
      if (scores[kind] > scores[best]) {
        best = kind;
      }
    }

    let selected = best;
    let reason: RouteReason = 'best_score';

    const sticky = state.history.length > 0 && state.currentHandler !== excluded ? state.currentHandler : null;
    if (sticky !== null && sticky !== best && scores[sticky] > scores[best] * this.policy.stickinessRatio) {
      selected = sticky;
      reason = 'sticky';
    }

    if (selected !== 'escalation') {
      if (scores[selected] < this.policy.lowConfidenceThreshold) {
        return { handler: 'escalation', reason: 'low_confidence', promptForContact: false, scores };
      }
      if (selected === state.currentHandler && state.sameHandlerTurns >= this.policy.maxTurnsWithSameHandler) {
        return { handler: 'escalation', reason: 'turn_limit', promptForContact: false, scores };
      }
    }

    return { handler: selected, reason, promptForContact: false, scores };
  }

  /**
   * When the general handler cannot answer the retry either, the first
   * handler's own templated reply is kept, since it is specific to the
   * customer's problem.
   */
  private async execute(
    kind: HandlerKind,
    text: string,
    userId: UserId
  ): Promise<{ reply: HandlerReply; handler: HandlerKind; fallbackFrom?: HandlerKind }> {
    let failed: HandlerReply | null = null;
    let failure: string;

    try {
      const reply = await this.registry.get(kind).process(text, userId);
      if (!isFailureReply(reply)) {
        return { reply, handler: kind };
      }
      failed = reply;
      failure = String(reply.metadata.error);
    } catch (error) {
      failure = toError(error).message;
    }

    this.events.emit('handler_fallback', { userId, failedHandler: kind, error: failure });

    try {
      const retry = await this.registry.get('general').process(`${FALLBACK_MARKER}${text}`, userId);
      if (isFailureReply(retry) && failed !== null && kind !== 'general') {
        return {
          reply: annotateReply(failed, { fallbackFrom: kind, fallbackFailed: true }),
          handler: kind,
          fallbackFrom: kind
        };
      }
      return {
        reply: annotateReply(retry, { fallbackFrom: kind }),
        handler: 'general',
        fallbackFrom: kind
      };
    } catch (error) {
      const err = toError(error);
      logger.error('Fallback handler failed', err, {
        userId,
        handler: 'general',
        operation: 'handler_fallback'
      });
      return {
        reply: failed
          ? annotateReply(failed, { fallbackFrom: kind, fallbackFailed: true })
          : createFailureReply('general', FALLBACK_APOLOGY, err.message, { fallbackFrom: kind }),
        handler: failed ? kind : 'general',
        fallbackFrom: kind
      };
    }
  }
}
