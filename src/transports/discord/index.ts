import { Client, GatewayIntentBits, Partials, type Message } from 'discord.js';
import type { AppConfig } from '../../config.js';
import { sessionIdFor, type InboundMessage } from '../../shared/protocol.js';
import { createLogger, type LoggerLike } from '../../utils/logger.js';
import { splitMessage, stripBotMention } from '../format.js';
import { isAllowedDiscord } from '../guards.js';
import type { ChannelTransport, TransportDeps } from '../types.js';

type DiscordConfig = Pick<
  AppConfig,
  | 'DISCORD_ENABLED'
  | 'DISCORD_TOKEN'
  | 'DISCORD_TYPING_ENABLED'
  | 'DISCORD_ALLOWED_CHANNELS'
  | 'DISCORD_ALLOWED_GUILDS'
  | 'DISCORD_ALLOWED_USERS'
  | 'DISCORD_NOTIFY_CHANNELS'
  | 'LOG_LEVEL'
>;

const startTypingHeartbeat = (
  channel: { sendTyping: () => Promise<unknown> } | undefined,
  enabled: boolean,
  logger: LoggerLike,
) => {
  if (!enabled || !channel) {
    return () => {};
  }

  const fire = async () => {
    try {
      await channel.sendTyping();
    } catch (error) {
      logger.debug('typing indicator failed', error);
    }
  };

  void fire();
  const timer = setInterval(() => {
    void fire();
  }, 7000);

  return () => clearInterval(timer);
};

export class DiscordTransport implements ChannelTransport {
  readonly name = 'discord';
  private client?: Client;
  private readonly unregister: Array<() => void> = [];
  private readonly logger: LoggerLike;

  constructor(
    private readonly config: DiscordConfig,
    private readonly deps: TransportDeps,
  ) {
    this.logger = createLogger('transports.discord', config.LOG_LEVEL);
  }

  private async sendToChannel(channelId: string, text: string) {
    if (!this.client) {
      throw new Error('discord client not ready');
    }

    const channel = await this.client.channels.fetch(channelId);
    if (!channel || !channel.isTextBased() || !('send' in channel)) {
      throw new Error(`discord channel ${channelId} cannot receive messages`);
    }
    for (const part of splitMessage(text)) {
      await channel.send(part);
    }
  }

  private async replyTo(message: Message, text: string) {
    for (const part of splitMessage(text)) {
      await message.reply(part);
    }
  }

  private async handleMessage(message: Message) {
    if (message.author.bot || !message.content) return;
    const botUser = message.client.user;

    const isDm = message.channel.isDMBased();
    const mentioned = message.mentions.has(botUser.id);
    if (!isDm && !mentioned) return;

    const channelId = message.channel.id;
    const guildId = message.guildId ?? null;
    const userId = message.author.id;

    if (!isAllowedDiscord(this.config, channelId, guildId, userId)) {
      this.logger.warn(`Discord event blocked channel=${channelId} user=${userId}`);
      return;
    }

    const text = stripBotMention(message.content, botUser.id);
    if (!text) return;

    const inbound: InboundMessage = {
      id: message.id,
      source: 'discord',
      sessionId: sessionIdFor('discord', userId),
      senderId: userId,
      senderName: message.author.username,
      text,
      metadata: {
        channelId,
        guildId: guildId ?? '',
        channelType: isDm ? 'dm' : 'guild',
      },
      receivedAt: new Date().toISOString(),
    };

    const typingTarget = 'sendTyping' in message.channel ? message.channel : undefined;
    const stopTyping = startTypingHeartbeat(typingTarget, this.config.DISCORD_TYPING_ENABLED, this.logger);

    try {
      await this.deps.dispatcher.inbound(inbound, {
        reply: (reply) => this.replyTo(message, reply),
      });
    } finally {
      stopTyping();
    }
  }

  async start() {
    if (!this.config.DISCORD_ENABLED) {
      this.logger.info('Discord transport disabled');
      return;
    }
    if (!this.config.DISCORD_TOKEN) {
      throw new Error('DISCORD_ENABLED=true but DISCORD_TOKEN missing');
    }

    this.client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.DirectMessages,
        GatewayIntentBits.MessageContent,
      ],
      partials: [Partials.Channel],
    });

    this.client.on('messageCreate', (message) => {
      this.handleMessage(message).catch((error: unknown) => {
        this.logger.error('discord dispatch failed', error);
      });
    });

    for (const channelId of this.config.DISCORD_NOTIFY_CHANNELS) {
      this.unregister.push(
        this.deps.notifier.register(`discord:${channelId}`, (text) => this.sendToChannel(channelId, text)),
      );
    }

    await this.client.login(this.config.DISCORD_TOKEN);
    this.logger.info('Discord transport connected', {
      notifyChannels: this.config.DISCORD_NOTIFY_CHANNELS.length,
    });
  }

  async stop() {
    for (const unregister of this.unregister.splice(0)) {
      unregister();
    }
    if (!this.client) return;
    await this.client.destroy();
    this.client = undefined;
    this.logger.info('Discord transport stopped');
  }
}
