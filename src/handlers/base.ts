import { logger } from '../utils/logger';
import { GenerationError, toError } from '../utils/errors';
import type { GenerationBackend, GenerationPersona } from '../services/generation';
import type { HandlerKind, Metadata, UserId } from '../types/common';
import {
  HandlerReply,
  HandlerStatus,
  SupportHandler,
  TranscriptEntry,
  createFailureReply,
  createReply
} from './types';

export const DEFAULT_TRANSCRIPT_LIMIT = 10;

export interface HandlerOptions {
  transcriptLimit?: number;
}

/**
 * Shared behaviour for all handlers: the rolling transcript and the
 * never-reject guarantee around `respond`.
 */
export abstract class BaseHandler implements SupportHandler {
  abstract readonly kind: HandlerKind;

  private transcript: TranscriptEntry[] = [];
  private lastActivity: Date | null = null;
  private readonly transcriptLimit: number;

  constructor(options: HandlerOptions = {}) {
    this.transcriptLimit = options.transcriptLimit ?? DEFAULT_TRANSCRIPT_LIMIT;
  }

  abstract confidence(text: string): number;

  protected abstract respond(text: string, userId: UserId): Promise<HandlerReply>;

  async process(text: string, userId: UserId): Promise<HandlerReply> {
    let reply: HandlerReply;

    try {
      reply = await this.respond(text, userId);
    } catch (error) {
      const err = toError(error);
      logger.error('Handler failed to respond', err, {
        userId,
        handler: this.kind,
        operation: 'handler_process'
      });
      reply = createFailureReply(
        this.kind,
        "I'm sorry, I wasn't able to handle that just now. Please try again in a moment.",
        err.message
      );
    }

    this.record(userId, text, reply.text);
    return reply;
  }

  status(): HandlerStatus {
    return {
      kind: this.kind,
      active: true,
      transcriptLength: this.transcript.length,
      lastActivity: this.lastActivity
    };
  }

  purgeUser(userId: UserId): number {
    const before = this.transcript.length;
    this.transcript = this.transcript.filter((entry) => entry.userId !== userId);
    return before - this.transcript.length;
  }

  /**
   * Most recent exchanges with this user, oldest first.
   */
  protected recentExchanges(userId: UserId, count: number = 3): TranscriptEntry[] {
    return this.transcript.filter((entry) => entry.userId === userId).slice(-count);
  }

  private record(userId: UserId, query: string, response: string): void {
    const timestamp = new Date();
    this.transcript.push({ timestamp, userId, query, response });
    if (this.transcript.length > this.transcriptLimit) {
      this.transcript.splice(0, this.transcript.length - this.transcriptLimit);
    }
    this.lastActivity = timestamp;
  }
}

/**
 * Handler whose reply text comes from the generation backend. When the
 * backend fails, the reply degrades to a handler-specific template built from
 * the same analysis that would have gone into the prompt.
 */
export abstract class GenerativeHandler extends BaseHandler {
  protected abstract readonly persona: GenerationPersona;

  constructor(private readonly backend: GenerationBackend, options: HandlerOptions = {}) {
    super(options);
  }

  /**
   * Handler-specific extraction, attached to the reply metadata.
   */
  protected abstract analyze(text: string): Metadata;

  protected abstract fallbackText(text: string, analysis: Metadata): string;

  protected async respond(text: string, userId: UserId): Promise<HandlerReply> {
    const analysis = this.analyze(text);
    const prompt = this.buildPrompt(text, userId, analysis);

    try {
      const output = await this.backend.generate(prompt, this.persona);
      return createReply(this.kind, output, this.confidence(text), analysis);
    } catch (error) {
      const err = toError(error);
      const errorKind = error instanceof GenerationError ? error.kind : 'backend';

      logger.warn('Generation failed, using templated reply', {
        userId,
        handler: this.kind,
        operation: 'generation_fallback'
      }, {
        error: err.message,
        errorKind
      });

      return createFailureReply(this.kind, this.fallbackText(text, analysis), err.message, {
        ...analysis,
        errorKind
      });
    }
  }

  protected buildPrompt(text: string, userId: UserId, analysis: Metadata): string {
    const history = this.recentExchanges(userId)
      .map((entry) => `Customer: ${entry.query}\nAssistant: ${entry.response}`)
      .join('\n\n');

    return [
      history ? `RECENT CONVERSATION:\n${history}` : 'RECENT CONVERSATION:\nNone.',
      `ANALYSIS:\n${JSON.stringify(analysis, null, 2)}`,
      `CUSTOMER MESSAGE:\n${text}`,
      'Reply to the customer directly. Do not mention the analysis.'
    ].join('\n\n');
  }
}
