import { App, LogLevel } from '@slack/bolt';
import type { AppConfig } from '../../config.js';
import { sessionIdFor, type InboundMessage } from '../../shared/protocol.js';
import { createLogger, type LoggerLike } from '../../utils/logger.js';
import { stripBotMention } from '../format.js';
import { isAllowedSlack } from '../guards.js';
import type { ChannelTransport, TransportDeps } from '../types.js';

type SlackConfig = Pick<
  AppConfig,
  | 'SLACK_ENABLED'
  | 'SLACK_BOT_TOKEN'
  | 'SLACK_APP_TOKEN'
  | 'SLACK_SIGNING_SECRET'
  | 'SLACK_ALLOWED_CHANNELS'
  | 'SLACK_ALLOWED_USERS'
  | 'SLACK_NOTIFY_CHANNELS'
  | 'LOG_LEVEL'
>;

export class SlackTransport implements ChannelTransport {
  readonly name = 'slack';
  private app?: App;
  private botUserId = '';
  private readonly unregister: Array<() => void> = [];
  private readonly logger: LoggerLike;

  constructor(
    private readonly config: SlackConfig,
    private readonly deps: TransportDeps,
  ) {
    this.logger = createLogger('transports.slack', config.LOG_LEVEL);
  }

  private async post(channelId: string, text: string, threadTs?: string) {
    if (!this.app) {
      throw new Error('slack app not ready');
    }

    await this.app.client.chat.postMessage({
      channel: channelId,
      text,
      thread_ts: threadTs,
      mrkdwn: true,
    });
  }

  async start() {
    if (!this.config.SLACK_ENABLED) {
      this.logger.info('Slack transport disabled');
      return;
    }

    if (!this.config.SLACK_BOT_TOKEN || !this.config.SLACK_APP_TOKEN || !this.config.SLACK_SIGNING_SECRET) {
      throw new Error('Slack is enabled but SLACK_BOT_TOKEN, SLACK_APP_TOKEN, SLACK_SIGNING_SECRET must be set');
    }

    this.app = new App({
      token: this.config.SLACK_BOT_TOKEN,
      appToken: this.config.SLACK_APP_TOKEN,
      signingSecret: this.config.SLACK_SIGNING_SECRET,
      socketMode: true,
      logLevel: LogLevel.INFO,
    });

    this.app.message(async ({ message }) => {
      if (message.subtype !== undefined || !message.text || !message.user) return;
      if (message.user === this.botUserId) return;

      const isDm = message.channel_type === 'im';
      const isMention = Boolean(this.botUserId) && message.text.includes(`<@${this.botUserId}>`);
      if (!isDm && !isMention) return;

      if (!isAllowedSlack(this.config, message.channel, message.user)) {
        this.logger.warn(`Slack event blocked for channel=${message.channel} user=${message.user}`);
        return;
      }

      const text = isMention ? stripBotMention(message.text, this.botUserId) : message.text.trim();
      if (!text) return;

      // Channel conversations are keyed per thread; a DM is one conversation.
      const threadTs = isDm ? undefined : message.thread_ts ?? message.ts;
      const inbound: InboundMessage = {
        id: message.client_msg_id ?? `${message.ts}-${message.user}`,
        source: 'slack',
        sessionId: sessionIdFor('slack', message.channel, threadTs),
        senderId: message.user,
        text,
        metadata: {
          channelId: message.channel,
          threadTs: threadTs ?? '',
        },
        receivedAt: new Date().toISOString(),
      };

      await this.deps.dispatcher.inbound(inbound, {
        reply: (reply) => this.post(message.channel, reply, threadTs),
      });
      this.logger.debug(`Slack event handled source=${message.channel} thread=${threadTs ?? 'main'} ts=${message.ts}`);
    });

    for (const channelId of this.config.SLACK_NOTIFY_CHANNELS) {
      this.unregister.push(this.deps.notifier.register(`slack:${channelId}`, (text) => this.post(channelId, text)));
    }

    await this.app.start();
    const response = await this.app.client.auth.test();
    this.botUserId = response.user_id ?? '';
    this.logger.info(`Slack transport started as bot=${this.botUserId}`);
  }

  async stop() {
    for (const unregister of this.unregister.splice(0)) {
      unregister();
    }
    if (!this.app) return;
    await this.app.stop();
    this.app = undefined;
    this.logger.info('Slack transport stopped');
  }
}
