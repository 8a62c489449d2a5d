import type { HandlerKind, Metadata, UserId } from '../types/common';

/**
 * Reply produced by a handler for one customer message. Frozen on creation.
 */
export interface HandlerReply {
  readonly text: string;
  readonly confidence: number;
  readonly handler: HandlerKind;
  readonly timestamp: Date;
  readonly metadata: Readonly<Metadata>;
}

export interface TranscriptEntry {
  timestamp: Date;
  userId: UserId;
  query: string;
  response: string;
}

export interface HandlerStatus {
  kind: HandlerKind;
  active: boolean;
  transcriptLength: number;
  lastActivity: Date | null;
}

/**
 * Capability interface shared by every handler variant.
 *
 * `confidence` is synchronous and pure. `process` may suspend on the
 * generation backend or order storage but never rejects: failures come back
 * as a zero-confidence reply with `metadata.error` set.
 */
export interface SupportHandler {
  readonly kind: HandlerKind;
  confidence(text: string): number;
  process(text: string, userId: UserId): Promise<HandlerReply>;
  status(): HandlerStatus;
  purgeUser(userId: UserId): number;
}

export function createReply(
  handler: HandlerKind,
  text: string,
  confidence: number,
  metadata: Metadata = {}
): HandlerReply {
  return Object.freeze({
    text,
    confidence: Math.min(1, Math.max(0, confidence)),
    handler,
    timestamp: new Date(),
    metadata: Object.freeze({ ...metadata })
  });
}

/**
 * Reply signalling that the handler could not do its job.
 */
export function createFailureReply(
  handler: HandlerKind,
  text: string,
  error: string,
  metadata: Metadata = {}
): HandlerReply {
  return createReply(handler, text, 0, { ...metadata, error });
}

export function isFailureReply(reply: HandlerReply): boolean {
  return reply.confidence === 0 && typeof reply.metadata.error === 'string';
}

/**
 * Copy of a reply with extra metadata. The original stays untouched.
 */
export function annotateReply(reply: HandlerReply, extra: Metadata): HandlerReply {
  return Object.freeze({
    ...reply,
    metadata: Object.freeze({ ...reply.metadata, ...extra })
  });
}
