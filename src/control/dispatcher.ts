import type { AgentEngine } from '../engine/types.js';
import { AgentTimeoutError } from '../shared/errors.js';
import {
  MONITOR_SESSION_PREFIX,
  type DispatchResult,
  type InboundMessage,
  type ReplyCallbacks,
} from '../shared/protocol.js';
import { createLogger, type LoggerLike } from '../utils/logger.js';
import type { Notifier } from './notifier.js';
import type { InvocationOutcome, SessionManager } from './session-manager.js';

interface DispatcherOptions {
  sessions: SessionManager;
  engine: Pick<AgentEngine, 'forget'>;
  notifier: Notifier;
  maxMessageBytes: number;
  /** Forward partial agent output to channels that accept chunks. */
  streaming?: boolean;
  logger?: LoggerLike;
}

const CLEAR_COMMANDS = new Set(['!clear', '/clear']);
const STATUS_COMMANDS = new Set(['!status', '/status']);

export const replyTexts = {
  cleared: 'Conversation cleared. The next message starts a fresh session.',
  empty: 'Empty message, nothing to do.',
  reserved: 'This session id is reserved for monitoring.',
  superseded: 'Your earlier message was replaced by a newer one before it ran.',
  canceled: 'The request was canceled before the agent answered.',
  emptyReply: '(the agent returned an empty reply)',
  tooLong: (bytes: number, limit: number) => `Message too long (${bytes} bytes, limit ${limit}).`,
  timedOut: (timeoutMs: number) =>
    `The agent did not answer within ${Math.round(timeoutMs / 1000)}s. Try again or simplify the request.`,
  failed: (reason: string) => `Sorry, the request failed: ${reason}`,
  busy: (retryAfterMs: number) =>
    `The assistant is busy right now. Please retry in ${Math.max(1, Math.ceil(retryAfterMs / 1000))}s.`,
};

/**
 * Glue between channels and the session manager: validates inbound text,
 * handles chat commands, and turns invocation outcomes into replies on the
 * originating channel only.
 */
export class Dispatcher {
  private readonly logger: LoggerLike;

  constructor(private readonly options: DispatcherOptions) {
    this.logger = options.logger ?? createLogger('control.dispatcher');
  }

  async inbound(message: InboundMessage, callbacks: ReplyCallbacks): Promise<DispatchResult> {
    const { sessionId } = message;
    const text = message.text.trim();
    const fail = callbacks.error ?? callbacks.reply;

    if (sessionId.startsWith(MONITOR_SESSION_PREFIX)) {
      return this.respond(message, fail, 'invalid', replyTexts.reserved);
    }
    if (!text) {
      return this.respond(message, fail, 'invalid', replyTexts.empty);
    }
    const bytes = Buffer.byteLength(text, 'utf8');
    if (bytes > this.options.maxMessageBytes) {
      return this.respond(message, fail, 'invalid', replyTexts.tooLong(bytes, this.options.maxMessageBytes));
    }

    const command = text.toLowerCase();
    if (CLEAR_COMMANDS.has(command)) {
      this.clear(sessionId);
      return this.respond(message, callbacks.reply, 'command', replyTexts.cleared);
    }
    if (STATUS_COMMANDS.has(command)) {
      return this.respond(message, callbacks.reply, 'command', this.statusText(sessionId));
    }

    this.logger.info('inbound message', {
      sessionId,
      source: message.source,
      senderId: message.senderId,
      bytes,
    });

    const chunk = callbacks.chunk;
    const onChunk =
      this.options.streaming !== false && chunk
        ? (part: string) => {
            void this.options.notifier.deliver(sessionId, chunk, part);
          }
        : undefined;

    const outcome = await this.options.sessions.submit(sessionId, text, { onChunk }).result;
    return this.deliverOutcome(message, callbacks, outcome);
  }

  /** Forgets the agent-side conversation; the session record itself stays. */
  clear(sessionId: string) {
    this.options.engine.forget(sessionId);
    this.logger.info('session cleared', { sessionId });
  }

  statusText(sessionId: string) {
    const stats = this.options.sessions.stats();
    const session = this.options.sessions.getSession(sessionId);
    const sessionLine = session
      ? `Session ${sessionId}: ${session.state}, ${session.completed} completed, last activity ${session.lastActivityAt}.`
      : `Session ${sessionId}: no activity yet.`;
    return [
      sessionLine,
      `Invocations: ${stats.running}/${stats.maxConcurrent} running, ${stats.waiting}/${stats.maxWaiting} waiting.`,
      `Sessions known: ${stats.sessions}.`,
    ].join('\n');
  }

  private async deliverOutcome(
    message: InboundMessage,
    callbacks: ReplyCallbacks,
    outcome: InvocationOutcome,
  ): Promise<DispatchResult> {
    const notice = callbacks.notice ?? callbacks.reply;
    const fail = callbacks.error ?? callbacks.reply;

    switch (outcome.status) {
      case 'succeeded':
        return this.respond(message, callbacks.reply, 'succeeded', outcome.text.trim() || replyTexts.emptyReply);
      case 'timed_out': {
        const timeoutMs = outcome.error instanceof AgentTimeoutError ? outcome.error.timeoutMs : 0;
        this.logger.warn('invocation timed out', { sessionId: message.sessionId, timeoutMs });
        return this.respond(message, fail, 'timed_out', replyTexts.timedOut(timeoutMs));
      }
      case 'failed':
        this.logger.warn('invocation failed', {
          sessionId: message.sessionId,
          code: outcome.error.code,
          error: outcome.error.message,
        });
        return this.respond(message, fail, 'failed', replyTexts.failed(outcome.error.message));
      case 'canceled':
        return this.respond(message, notice, 'canceled', replyTexts.canceled);
      case 'superseded':
        return this.respond(message, notice, 'superseded', replyTexts.superseded);
      case 'rejected': {
        const result = await this.respond(
          message,
          fail,
          'rejected',
          replyTexts.busy(outcome.error.retryAfterMs),
        );
        return { ...result, retryAfterMs: outcome.error.retryAfterMs };
      }
    }
  }

  private async respond(
    message: InboundMessage,
    deliver: (text: string) => Promise<void>,
    status: DispatchResult['status'],
    text: string,
  ): Promise<DispatchResult> {
    await this.options.notifier.deliver(message.sessionId, deliver, text);
    return { status, sessionId: message.sessionId, text };
  }
}
