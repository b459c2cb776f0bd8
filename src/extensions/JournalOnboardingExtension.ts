// MARK: - Journal Onboarding Extension
// Creates a private journal channel when a member DMs the bot

import { ChannelType, Events, Message } from 'discord.js';
import type { BotExtension, EventRouter } from '../events/EventRouter';
import type { JournalStore } from '../services/journal/JournalStore';
import { retryStoreCall } from '../services/journal/storeRetry';
import type { JournalAuthor, JournalChannel, JournalChannelDirectory } from './JournalChannelDirectory';
import { JournalBotError, describeError } from '../errors';
import { logger } from '../utils/logger';

const MAX_CHANNEL_NAME_LENGTH = 100;

export interface JournalOnboardingOptions {
  guildId: string;
  journalChannelPrefix: string;
  dailyWordRequirement: number;
}

/**
 * Discord channel names are lowercase with no spaces
 */
export function journalChannelName(prefix: string, username: string): string {
  const slug = username
    .toLowerCase()
    .replace(/\s+/g, '-')
    .replace(/[^\p{L}\p{N}_-]/gu, '')
    .replace(/-{2,}/g, '-');

  return `${prefix}${slug || 'writer'}`.slice(0, MAX_CHANNEL_NAME_LENGTH);
}

export class JournalOnboardingExtension implements BotExtension {
  readonly name = 'journal-onboarding';

  constructor(
    private readonly channels: JournalChannelDirectory,
    private readonly store: JournalStore,
    private readonly options: JournalOnboardingOptions,
  ) {}

  register(router: EventRouter): void {
    router.on(Events.MessageCreate, this.name, message => this.handleMessage(message));
  }

  async handleMessage(message: Message): Promise<void> {
    if (message.author.bot || message.channel.type !== ChannelType.DM) {
      return;
    }

    try {
      const { channel, created } = await this.ensureJournalChannel(message.author);

      if (!created) {
        await message.reply(`You already have a journal channel: <#${channel.id}>\nPlease write your journal entries there!`);
        return;
      }

      await message.reply(
        `Created your journal channel: <#${channel.id}>\n` +
        `Write at least ${this.options.dailyWordRequirement} words per day to access the shared channel!`,
      );
      await channel.send(
        `Welcome to your journal, <@${message.author.id}>! 📔\n\n` +
        `Write at least **${this.options.dailyWordRequirement} words** here each day to unlock the shared channel.\n` +
        'Every message in this channel counts toward your daily word count.',
      );
    } catch (error) {
      logger.error('Failed to set up journal channel', {
        discordId: message.author.id,
        error: describeError(error).message,
      });
      await message.reply('Sorry, there was an error creating your journal channel. Please contact an admin.');
    }
  }

  async ensureJournalChannel(author: JournalAuthor): Promise<{ channel: JournalChannel; created: boolean }> {
    const { guildId } = this.options;
    const record = await retryStoreCall('upsertUser', () => this.store.upsertUser({
      guildId,
      discordId: author.id,
      displayName: author.username,
    }));

    if (record.journalChannelId) {
      const existing = await this.channels.fetch(record.journalChannelId);
      if (existing) {
        return { channel: existing, created: false };
      }

      // Channel was deleted; forget it
      await retryStoreCall('setJournalChannel', () => this.store.setJournalChannel(guildId, author.id, null));
    }

    const channel = await this.channels.create(
      journalChannelName(this.options.journalChannelPrefix, author.username),
      author,
    );

    const stored = await retryStoreCall('setJournalChannel', () =>
      this.store.setJournalChannel(guildId, author.id, channel.id, { onlyIfUnset: true }),
    );

    if (!stored) {
      const latest = await retryStoreCall('getUser', () => this.store.getUser(guildId, author.id));
      const winner = latest?.journalChannelId ? await this.channels.fetch(latest.journalChannelId) : null;

      if (winner) {
        // Another instance stored a live channel first; keep theirs
        await channel.delete('Duplicate journal channel');
        return { channel: winner, created: false };
      }

      const replaced = await retryStoreCall('setJournalChannel', () =>
        this.store.setJournalChannel(guildId, author.id, channel.id),
      );
      if (!replaced) {
        await channel.delete('Journal channel could not be recorded');
        throw new JournalBotError('CHANNEL_NOT_RECORDED', `Journal channel for ${author.id} could not be recorded`, {
          guildId,
          discordId: author.id,
        });
      }

      logger.warn('Replaced unreachable journal channel', {
        guildId,
        discordId: author.id,
        previousChannelId: latest?.journalChannelId ?? null,
        channelId: channel.id,
      });
    }

    logger.info('Journal channel created', { guildId, discordId: author.id, channelId: channel.id });
    return { channel, created: true };
  }
}
