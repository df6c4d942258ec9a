import crypto from 'node:crypto';
import { z } from 'zod';
import { sessionIdFor, type InboundMessage } from '../../shared/protocol.js';
import { createLogger, type LoggerLike } from '../../utils/logger.js';
import { stripMarkdownBold } from '../format.js';
import type { ChannelTransport, TransportDeps } from '../types.js';

// Outgoing-webhook chat platforms post `{ token, user_id, username, text }`, as JSON or form fields.
export const webhookPayloadSchema = z.object({
  token: z.string().optional(),
  user_id: z.union([z.string(), z.number()]).optional(),
  username: z.string().optional(),
  text: z.string().default(''),
});

export type WebhookPayload = z.infer<typeof webhookPayloadSchema>;

export interface WebhookReply {
  status: number;
  body: { text: string } | { error: string };
}

interface WebhookTransportOptions {
  enabled: boolean;
  token: string;
  outgoingUrl?: string;
  fetchImpl?: typeof fetch;
  logger?: LoggerLike;
}

const safeEqual = (left: string, right: string) => {
  const a = Buffer.from(left);
  const b = Buffer.from(right);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
};

/**
 * Chat-webhook channel. Inbound messages arrive over HTTP and are answered
 * synchronously; alerts go out through the platform's incoming webhook URL.
 */
export class WebhookTransport implements ChannelTransport {
  readonly name = 'webhook';
  private unregister?: () => void;
  private readonly logger: LoggerLike;
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly options: WebhookTransportOptions,
    private readonly deps: TransportDeps,
  ) {
    this.logger = options.logger ?? createLogger('transports.webhook');
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  get enabled() {
    return this.options.enabled;
  }

  async start() {
    if (!this.options.enabled) {
      this.logger.info('Webhook transport disabled');
      return;
    }
    if (this.options.outgoingUrl) {
      this.unregister = this.deps.notifier.register('webhook:outgoing', (text) => this.send(text));
    }
    this.logger.info('Webhook transport ready', { outgoing: Boolean(this.options.outgoingUrl) });
  }

  async stop() {
    this.unregister?.();
    this.unregister = undefined;
  }

  async handle(payload: unknown, headerToken?: string): Promise<WebhookReply> {
    if (!this.options.enabled) {
      return { status: 404, body: { error: 'webhook channel disabled' } };
    }

    const parsed = webhookPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      return { status: 400, body: { error: 'invalid webhook payload' } };
    }

    const token = headerToken ?? parsed.data.token ?? '';
    if (!safeEqual(token, this.options.token)) {
      this.logger.warn('webhook rejected, bad token');
      return { status: 401, body: { error: 'unauthorized' } };
    }

    const userId = parsed.data.user_id === undefined ? 'anonymous' : String(parsed.data.user_id);
    const inbound: InboundMessage = {
      id: crypto.randomUUID(),
      source: 'webhook',
      sessionId: sessionIdFor('webhook', userId),
      senderId: userId,
      senderName: parsed.data.username,
      text: parsed.data.text,
      metadata: {},
      receivedAt: new Date().toISOString(),
    };

    // The platform shows the HTTP response body, so nothing is pushed back separately.
    const result = await this.deps.dispatcher.inbound(inbound, { reply: async () => {} });
    return { status: 200, body: { text: result.text } };
  }

  /** Posts to the incoming webhook as `payload={"text": ...}`, form-encoded. */
  async send(text: string) {
    if (!this.options.outgoingUrl) {
      throw new Error('WEBHOOK_OUTGOING_URL is not configured');
    }

    const body = new URLSearchParams({ payload: JSON.stringify({ text: stripMarkdownBold(text) }) });
    const response = await this.fetchImpl(this.options.outgoingUrl, {
      method: 'POST',
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      body: body.toString(),
    });
    if (!response.ok) {
      throw new Error(`webhook responded with HTTP ${response.status}`);
    }
  }
}
