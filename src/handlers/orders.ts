import keywords from './keywords.json';
import { BaseHandler, HandlerOptions } from './base';
import { createFailureReply, createReply, HandlerReply } from './types';
import { keywordConfidence, containsAny } from './scoring';
import { logger } from '../utils/logger';
import { toError } from '../utils/errors';
import type { OrderRecord, OrderStore } from '../services/orders/types';
import type { UserId } from '../types/common';

export interface ContactInfo {
  kind: 'email' | 'phone';
  value: string;
}

export const CONTACT_PROMPT =
  'I can look up your orders. What is the email address or phone number you used when ordering?';

const EMAIL_PATTERN = /[\w.+-]+@[\w-]+(?:\.[\w-]+)+/;
const PHONE_PATTERN = /(\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4})/;
const ORDER_NUMBER_PATTERNS = [
  /\b([A-Z]{2,4}-\d{3,})\b/i,
  /\border\s*(?:number|no\.|#)\s*#?\s*([A-Z0-9-]*\d[A-Z0-9-]*)/i,
  // Without a marker only a number of three or more digits counts
  /\border\s+(\d{3,}[A-Z0-9-]*)\b/i
];

const MAX_LISTED_ORDERS = 5;

export function extractContactInfo(text: string): ContactInfo | null {
  const email = EMAIL_PATTERN.exec(text);
  if (email) {
    return { kind: 'email', value: email[0].toLowerCase() };
  }
  const phone = PHONE_PATTERN.exec(text);
  if (phone) {
    return { kind: 'phone', value: phone[1] };
  }
  return null;
}

export function extractOrderNumber(text: string): string | null {
  for (const pattern of ORDER_NUMBER_PATTERNS) {
    const match = pattern.exec(text);
    if (match) {
      return match[1].toUpperCase();
    }
  }
  return null;
}

/**
 * Phrases like "check my orders" that open the contact-info sub-dialog.
 */
export function isLookupIntent(text: string): boolean {
  return containsAny(text, keywords.lookupIntent);
}

/**
 * The request for contact details. Identical on every attempt so the
 * customer sees the same question until they answer it.
 */
export function contactPromptReply(promptCount: number): HandlerReply {
  return createReply('order_lookup', CONTACT_PROMPT, 0.9, {
    awaitingContactInfo: true,
    promptCount
  });
}

export function describeOrder(order: OrderRecord): string {
  const placed = order.createdAt.slice(0, 10);
  return `Order ${order.orderNumber} (placed ${placed}): ${order.status}, total ${order.totalPaid.toFixed(2)} ${order.currency}`;
}

/**
 * Answers order questions from the order store: by order number when one is
 * given, otherwise by the customer's email or phone.
 */
export class OrderLookupHandler extends BaseHandler {
  readonly kind = 'order_lookup' as const;

  constructor(private readonly store: OrderStore, options: HandlerOptions = {}) {
    super(options);
  }

  confidence(text: string): number {
    return keywordConfidence(text, keywords.order_lookup, 0.15);
  }

  protected async respond(text: string, userId: UserId): Promise<HandlerReply> {
    const orderNumber = extractOrderNumber(text);
    if (orderNumber) {
      return this.withStore(userId, () => this.lookupByNumber(orderNumber));
    }

    const contact = extractContactInfo(text);
    if (contact) {
      return this.withStore(userId, () => this.lookupByContact(contact));
    }

    return contactPromptReply(1);
  }

  /**
   * Turn a store failure into the templated apology.
   */
  private async withStore(userId: UserId, lookup: () => Promise<HandlerReply>): Promise<HandlerReply> {
    try {
      return await lookup();
    } catch (error) {
      const err = toError(error);
      logger.error('Order lookup failed', err, {
        userId,
        handler: this.kind,
        operation: 'order_lookup'
      }, { store: this.store.name });

      return createFailureReply(
        this.kind,
        "I can't reach our order system right now. You can find your order details in your confirmation email or on the Orders page of your account, or try again in a few minutes.",
        err.message,
        { errorKind: 'storage' }
      );
    }
  }

  private async lookupByNumber(orderNumber: string): Promise<HandlerReply> {
    const order = await this.store.findOrderByNumber(orderNumber);
    if (!order) {
      return createReply(
        this.kind,
        `I couldn't find an order with the number ${orderNumber}. Please check the number, or share the email address you ordered with.`,
        0.8,
        { orderNumber, found: false, resolved: false }
      );
    }
    return createReply(this.kind, `${describeOrder(order)}.`, 1, {
      orderNumber,
      found: true,
      resolved: true,
      orders: [order]
    });
  }

  private async lookupByContact(contact: ContactInfo): Promise<HandlerReply> {
    const orders =
      contact.kind === 'email'
        ? await this.store.findOrdersByEmail(contact.value)
        : await this.store.findOrdersByPhone(contact.value);

    if (orders.length === 0) {
      return createReply(
        this.kind,
        `I couldn't find any orders for ${contact.value}. If you used a different email address or phone number, please share it.`,
        0.8,
        { contact: contact.kind, found: false, resolved: true, orders: [] }
      );
    }

    const listed = orders.slice(0, MAX_LISTED_ORDERS).map((order) => `- ${describeOrder(order)}`);
    const more = orders.length > MAX_LISTED_ORDERS ? `\n...and ${orders.length - MAX_LISTED_ORDERS} more.` : '';
    const noun = orders.length === 1 ? 'order' : 'orders';

    return createReply(
      this.kind,
      `I found ${orders.length} ${noun} for ${contact.value}:\n${listed.join('\n')}${more}`,
      1,
      { contact: contact.kind, found: true, resolved: true, orders }
    );
  }
}
