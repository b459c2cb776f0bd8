// MARK: - Journal Channel Directory
// Finds and creates members' private journal channels in the guild

import { ChannelType, Client, OverwriteResolvable, PermissionFlagsBits } from 'discord.js';
import type { Guild } from 'discord.js';
import { describeError } from '../errors';
import { logger } from '../utils/logger';

export interface JournalAuthor {
  id: string;
  username: string;
}

export interface JournalChannel {
  id: string;
  send(content: string): Promise<unknown>;
  delete(reason?: string): Promise<unknown>;
}

export interface JournalChannelDirectory {
  /** Resolves to null when the channel is gone or is not a text channel */
  fetch(channelId: string): Promise<JournalChannel | null>;
  create(name: string, author: JournalAuthor): Promise<JournalChannel>;
}

/**
 * Text channels in the configured guild, visible only to the author and the bot
 */
export class DiscordJournalChannels implements JournalChannelDirectory {
  constructor(
    private readonly client: Client,
    private readonly guildId: string,
  ) {}

  async fetch(channelId: string): Promise<JournalChannel | null> {
    const guild = await this.client.guilds.fetch(this.guildId);

    try {
      const channel = await guild.channels.fetch(channelId);
      return channel && channel.type === ChannelType.GuildText ? channel : null;
    } catch (error) {
      logger.debug('Stored journal channel could not be fetched', {
        guildId: this.guildId,
        channelId,
        error: describeError(error).message,
      });
      return null;
    }
  }

  async create(name: string, author: JournalAuthor): Promise<JournalChannel> {
    const guild = await this.client.guilds.fetch(this.guildId);

    return guild.channels.create({
      name,
      type: ChannelType.GuildText,
      topic: `Private journal for ${author.username}`,
      permissionOverwrites: this.buildOverwrites(guild, author),
    });
  }

  private buildOverwrites(guild: Guild, author: JournalAuthor): OverwriteResolvable[] {
    const access = [
      PermissionFlagsBits.ViewChannel,
      PermissionFlagsBits.SendMessages,
      PermissionFlagsBits.ReadMessageHistory,
    ];
    const overwrites: OverwriteResolvable[] = [
      { id: guild.roles.everyone.id, deny: [PermissionFlagsBits.ViewChannel] },
      { id: author.id, allow: access },
    ];

    if (this.client.user) {
      overwrites.push({ id: this.client.user.id, allow: access });
    }

    return overwrites;
  }
}
