// MARK: - Shared Channel Access
// Grants and revokes a member's view of the shared channel

import { ChannelType, Client, TextChannel } from 'discord.js';
import { logger } from '../../utils/logger';

export interface ChannelAccessGateway {
  grant(guildId: string, discordId: string): Promise<void>;
  revoke(guildId: string, discordId: string): Promise<void>;
}

/**
 * Permission-overwrite implementation on the configured shared text channel
 */
export class DiscordChannelAccess implements ChannelAccessGateway {
  constructor(
    private readonly client: Client,
    private readonly sharedChannelId: string,
  ) {}

  async grant(guildId: string, discordId: string): Promise<void> {
    const channel = await this.resolveChannel(guildId);
    await channel.permissionOverwrites.edit(
      discordId,
      { ViewChannel: true, SendMessages: true },
      { reason: 'Daily journal goal reached' },
    );

    logger.debug('Shared channel overwrite added', { guildId, discordId, channelId: channel.id });
  }

  async revoke(guildId: string, discordId: string): Promise<void> {
    const channel = await this.resolveChannel(guildId);
    await channel.permissionOverwrites.delete(discordId, 'Daily journal reset');

    logger.debug('Shared channel overwrite removed', { guildId, discordId, channelId: channel.id });
  }

  private async resolveChannel(guildId: string): Promise<TextChannel> {
    const channel = await this.client.channels.fetch(this.sharedChannelId);

    if (!channel || channel.type !== ChannelType.GuildText) {
      throw new Error(`Shared channel ${this.sharedChannelId} not found or not a text channel`);
    }

    if (channel.guildId !== guildId) {
      throw new Error(`Shared channel ${this.sharedChannelId} does not belong to guild ${guildId}`);
    }

    return channel;
  }
}
