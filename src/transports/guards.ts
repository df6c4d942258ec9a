import type { AppConfig } from '../config.js';

export const hasMatch = (value: string, exact: string[]) => {
  if (!exact.length) return true;
  return exact.includes(value);
};

export const isAllowedSlack = (
  config: Pick<AppConfig, 'SLACK_ALLOWED_CHANNELS' | 'SLACK_ALLOWED_USERS'>,
  channelId: string,
  userId: string,
) => hasMatch(channelId, config.SLACK_ALLOWED_CHANNELS) && hasMatch(userId, config.SLACK_ALLOWED_USERS);

export const isAllowedDiscord = (
  config: Pick<AppConfig, 'DISCORD_ALLOWED_CHANNELS' | 'DISCORD_ALLOWED_GUILDS' | 'DISCORD_ALLOWED_USERS'>,
  channelId: string,
  guildId: string | null,
  userId: string,
) => {
  if (!hasMatch(channelId, config.DISCORD_ALLOWED_CHANNELS)) {
    return false;
  }

  // Direct messages carry no guild.
  if (guildId && !hasMatch(guildId, config.DISCORD_ALLOWED_GUILDS)) {
    return false;
  }

  return hasMatch(userId, config.DISCORD_ALLOWED_USERS);
};
