import { v4 as uuidv4 } from 'uuid';
import keywords from './keywords.json';
import { BaseHandler } from './base';
import { createReply, HandlerReply } from './types';
import { keywordConfidence, containsAny } from './scoring';
import { logger } from '../utils/logger';
import type { UserId } from '../types/common';

export type EscalationCategory =
  | 'urgent_technical'
  | 'customer_complaint'
  | 'complex_billing'
  | 'human_request'
  | 'general_escalation';

export type EscalationPriority = 'high' | 'medium';

export interface EscalationDetails {
  emotion: 'frustrated' | 'angry' | 'dissatisfied' | 'urgent' | null;
  issueDuration: string | null;
  previousAttempts: string | null;
  impact: 'high' | 'normal';
}

interface CategoryRule {
  category: Exclude<EscalationCategory, 'general_escalation'>;
  phrases: string[];
  priority: EscalationPriority;
  opening: string;
}

const CATEGORY_RULES: CategoryRule[] = [
  {
    category: 'urgent_technical',
    phrases: ['urgent', 'emergency', 'critical', 'not working', 'broken'],
    priority: 'high',
    opening: 'I understand this is an urgent technical issue. I am connecting you with a senior technical specialist.'
  },
  {
    category: 'customer_complaint',
    phrases: ['complaint', 'dissatisfied', 'unhappy', 'terrible', 'worst'],
    priority: 'medium',
    opening: 'I am sorry about your experience. I am connecting you with a supervisor who can address your concerns.'
  },
  {
    category: 'complex_billing',
    phrases: ['fraud', 'unauthorized', 'dispute', 'complex billing'],
    priority: 'high',
    opening: 'This billing matter needs immediate attention. I am connecting you with a billing specialist.'
  },
  {
    category: 'human_request',
    phrases: ['human', 'real person', 'speak to someone', 'supervisor', 'manager'],
    priority: 'medium',
    opening: 'I understand you would like to speak with a person. I am connecting you with a supervisor.'
  }
];

const EMOTIONS: Array<[NonNullable<EscalationDetails['emotion']>, string[]]> = [
  ['frustrated', ['frustrated', 'frustration', 'annoyed', 'irritated']],
  ['angry', ['angry', 'mad', 'furious', 'outraged', 'livid']],
  ['dissatisfied', ['dissatisfied', 'unhappy', 'disappointed', 'let down']],
  ['urgent', ['urgent', 'emergency', 'critical', 'immediate']]
];

const DURATION_PATTERNS = [
  /(\d+)\s*(?:days?|weeks?|months?)\s*(?:ago|for|now)/,
  /(?:been|trying)\s+(?:for|since)\s+(\d+)\s*(?:days?|weeks?|months?)/,
  /(?:issue|problem)\s+(?:for|since)\s+(\d+)\s*(?:days?|weeks?|months?)/
];

const ATTEMPT_PATTERNS = [
  /(?:tried|called|contacted)\s+(\d+)\s*(?:times?|attempts?)/,
  /(\d+)\s*(?:times?|attempts?)/,
  /((?:multiple|several)\s+(?:times?|attempts?))/
];

const HIGH_IMPACT_WORDS = ['critical', 'urgent', 'emergency', 'broken', 'not working'];

const RESOLUTION_TIMES: Record<EscalationCategory, string> = {
  urgent_technical: '2-4 hours',
  customer_complaint: '24 hours',
  complex_billing: '4-8 hours',
  human_request: '1-2 hours',
  general_escalation: '24 hours'
};

export function identifyEscalationCategory(text: string): { category: EscalationCategory; priority: EscalationPriority } {
  const rule = CATEGORY_RULES.find((candidate) => containsAny(text, candidate.phrases));
  return rule
    ? { category: rule.category, priority: rule.priority }
    : { category: 'general_escalation', priority: 'medium' };
}

export function extractEscalationDetails(text: string): EscalationDetails {
  const lowered = text.toLowerCase();

  return {
    emotion: EMOTIONS.find(([, words]) => containsAny(lowered, words))?.[0] ?? null,
    issueDuration: firstCapture(lowered, DURATION_PATTERNS),
    previousAttempts: firstCapture(lowered, ATTEMPT_PATTERNS),
    impact: containsAny(lowered, HIGH_IMPACT_WORDS) ? 'high' : 'normal'
  };
}

export function estimatedResolutionTime(category: EscalationCategory): string {
  return RESOLUTION_TIMES[category];
}

function firstCapture(text: string, patterns: RegExp[]): string | null {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (match) {
      return match[1];
    }
  }
  return null;
}

/**
 * Hands the conversation to a person. The reply is templated so that
 * escalation keeps working while the generation backend is unavailable.
 */
export class EscalationHandler extends BaseHandler {
  readonly kind = 'escalation' as const;

  confidence(text: string): number {
    return keywordConfidence(text, keywords.escalation, 0.2);
  }

  protected async respond(text: string, userId: UserId): Promise<HandlerReply> {
    const { category, priority } = identifyEscalationCategory(text);
    const details = extractEscalationDetails(text);
    const ticketId = `ESC-${uuidv4().slice(0, 8).toUpperCase()}`;
    const resolutionTime = estimatedResolutionTime(category);

    logger.info('Escalation ticket created', {
      userId,
      handler: this.kind,
      operation: 'escalation_ticket'
    }, { ticketId, category, priority });

    const opening =
      CATEGORY_RULES.find((rule) => rule.category === category)?.opening ??
      'I understand this needs attention from a specialist. I am connecting you with one now.';
    const acknowledgement = details.previousAttempts
      ? ' Thank you for your patience after reaching out more than once.'
      : '';

    return createReply(
      this.kind,
      `${opening}${acknowledgement} Your reference number is ${ticketId}. Expected resolution time: ${resolutionTime}.`,
      this.confidence(text),
      {
        ticketId,
        category,
        priority,
        estimatedResolution: resolutionTime,
        ...details
      }
    );
  }
}
