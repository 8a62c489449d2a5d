import keywords from './keywords.json';
import { GenerativeHandler } from './base';
import { keywordDensity } from './scoring';
import type { GenerationPersona } from '../services/generation';
import type { HandlerKind, Metadata } from '../types/common';

export type RoutedKind = Exclude<HandlerKind, 'general'>;

const ROUTING_VOCABULARIES: Array<[RoutedKind, readonly string[]]> = [
  ['technical', keywords.generalRouting.technical],
  ['billing', keywords.generalRouting.billing],
  ['escalation', keywords.generalRouting.escalation],
  ['order_lookup', keywords.generalRouting.order_lookup]
];

export interface RoutingRecommendation {
  kind: RoutedKind;
  score: number;
}

/**
 * Keyword density of the text in each specialized vocabulary.
 */
export function routingScores(text: string): Record<RoutedKind, number> {
  const scores: Record<RoutedKind, number> = {
    technical: 0,
    billing: 0,
    escalation: 0,
    order_lookup: 0
  };
  for (const [kind, vocabulary] of ROUTING_VOCABULARIES) {
    scores[kind] = keywordDensity(text, vocabulary);
  }
  return scores;
}

/**
 * The specialized area the text leans towards most, or null when it matches none.
 */
export function routingRecommendation(text: string): RoutingRecommendation | null {
  const scores = routingScores(text);
  let best: RoutingRecommendation | null = null;
  for (const [kind] of ROUTING_VOCABULARIES) {
    if (scores[kind] > 0 && (best === null || scores[kind] > best.score)) {
      best = { kind, score: scores[kind] };
    }
  }
  return best;
}

export class GeneralHandler extends GenerativeHandler {
  readonly kind = 'general' as const;

  protected readonly persona: GenerationPersona = {
    name: 'General Support',
    instructions: `You are the first point of contact for customers of an online store.

## Primary Responsibilities:
- Answer general questions about the company, opening hours, policies and account basics
- Greet customers warmly and find out what they need
- When a question is clearly about a technical problem, billing or an order, say that you can help with that and ask for the relevant details

## Communication Style:
- Friendly, concise and professional
- One or two short paragraphs at most`
  };

  /**
   * Inverted scoring: the more the text matches a specialized vocabulary,
   * the less this handler wants it.
   */
  confidence(text: string): number {
    const highest = Math.max(...Object.values(routingScores(text)));
    if (highest > 0.3) return 0.2;
    if (highest > 0.1) return 0.5;
    return 0.9;
  }

  protected analyze(text: string): Metadata {
    return {
      routingScores: routingScores(text),
      recommendation: routingRecommendation(text)
    };
  }

  protected fallbackText(): string {
    return "Thanks for reaching out! I'm having trouble answering right now. You can ask me about an order, a billing question or a technical problem, or ask to speak with a support specialist.";
  }
}
