import keywords from './keywords.json';
import { GenerativeHandler } from './base';
import { keywordConfidence, matchedKeywords, containsAny } from './scoring';
import type { GenerationPersona } from '../services/generation';
import type { Metadata } from '../types/common';

export type BillingScenario =
  | 'refund_request'
  | 'payment_issue'
  | 'subscription_change'
  | 'billing_dispute'
  | 'general_inquiry';

export interface ScenarioMatch {
  scenario: BillingScenario;
  matched: string[];
  urgency: 'high' | 'normal';
}

export interface BillingDetails {
  amount: string | null;
  paymentMethod: string | null;
  transactionId: string | null;
}

// Checked in order; the first scenario with a matching phrase wins.
const SCENARIOS: Array<[Exclude<BillingScenario, 'general_inquiry'>, string[]]> = [
  ['refund_request', ['refund', 'return', 'money back', 'credit back']],
  ['payment_issue', ['payment failed', 'declined', 'error', 'not working']],
  ['subscription_change', ['upgrade', 'downgrade', 'change plan', 'modify']],
  ['billing_dispute', ['dispute', 'wrong amount', 'overcharge', 'unauthorized', 'charged twice']]
];

const URGENT_WORDS = ['urgent', 'emergency', 'fraud', 'unauthorized', 'dispute'];

const PAYMENT_METHODS: Array<[string, string[]]> = [
  ['credit card', ['credit card', 'visa', 'mastercard', 'amex', 'discover']],
  ['debit card', ['debit card', 'debit']],
  ['paypal', ['paypal', 'pay pal']],
  ['bank transfer', ['bank transfer', 'wire transfer', 'ach']],
  ['check', ['cheque', 'check']]
];

const AMOUNT_PATTERNS = [
  /\$\s?(\d+(?:,\d{3})*(?:\.\d{2})?)/,
  /(\d+(?:\.\d{2})?)\s*(?:dollars?|usd)/,
  /charged\s+(\d+(?:\.\d{2})?)/
];

const TRANSACTION_PATTERNS = [
  /transaction\s+(?:id|#)?[:\s]*([a-z0-9-]*\d[a-z0-9-]*)/,
  /\b(?:txn|tx)\s*(?:id|#)?[:\s]*([a-z0-9-]*\d[a-z0-9-]*)/,
  /receipt\s+(?:id|#)?[:\s]*([a-z0-9-]*\d[a-z0-9-]*)/
];

const POLICIES: Record<BillingScenario, string> = {
  refund_request: 'Refunds are available within 30 days of purchase for most products. Some digital products have different terms.',
  payment_issue: 'We accept major credit cards, PayPal and bank transfers. Payment issues are usually resolved within 1-2 business days.',
  subscription_change: 'You can change your subscription at any time. Changes take effect at the next billing cycle.',
  billing_dispute: 'Every billing dispute is investigated. You can also contact your payment provider to dispute a charge.',
  general_inquiry: 'I can help with your billing question once I have a few more details.'
};

export function identifyBillingScenario(text: string): ScenarioMatch {
  const lowered = text.toLowerCase();
  const urgency = containsAny(lowered, URGENT_WORDS) ? 'high' : 'normal';

  for (const [scenario, phrases] of SCENARIOS) {
    const matched = matchedKeywords(lowered, phrases);
    if (matched.length > 0) {
      return { scenario, matched, urgency };
    }
  }

  return { scenario: 'general_inquiry', matched: [], urgency };
}

export function extractBillingDetails(text: string): BillingDetails {
  const lowered = text.toLowerCase();

  const amount = firstCapture(lowered, AMOUNT_PATTERNS);
  const paymentMethod =
    PAYMENT_METHODS.find(([, words]) => words.some((word) => lowered.includes(word)))?.[0] ?? null;
  const transactionId = firstCapture(lowered, TRANSACTION_PATTERNS);

  return {
    amount: amount === null ? null : amount.replace(/,/g, ''),
    paymentMethod,
    transactionId: transactionId === null ? null : transactionId.toUpperCase()
  };
}

export function billingPolicy(scenario: BillingScenario): string {
  return POLICIES[scenario];
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

export class BillingHandler extends GenerativeHandler {
  readonly kind = 'billing' as const;

  protected readonly persona: GenerationPersona = {
    name: 'Billing Support',
    instructions: `You are a billing support specialist. You handle payment questions, refunds, subscription changes and billing disputes.

## Guidelines:
- Explain charges and policies clearly
- Never ask for full card numbers or passwords
- When a refund or dispute needs investigation, say what happens next and how long it usually takes
- Suggest escalation for fraud or unauthorized charges`
  };

  confidence(text: string): number {
    return keywordConfidence(text, keywords.billing, 0.15);
  }

  protected analyze(text: string): Metadata {
    const scenario = identifyBillingScenario(text);
    return {
      scenario: scenario.scenario,
      urgency: scenario.urgency,
      ...extractBillingDetails(text),
      policy: billingPolicy(scenario.scenario),
      suggestEscalation:
        scenario.urgency === 'high' ||
        scenario.scenario === 'billing_dispute' ||
        containsAny(text, ['fraud', 'unauthorized charge'])
    };
  }

  protected fallbackText(text: string): string {
    const { scenario } = identifyBillingScenario(text);
    return `${billingPolicy(scenario)} I can't look into your account right this moment. You can try again shortly, check your invoices in your account, or ask for a billing specialist.`;
  }
}
