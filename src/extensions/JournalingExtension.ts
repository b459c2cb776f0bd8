// MARK: - Journaling Extension
// Feeds journal channel messages into the access controller

import { ChannelType, Events, Message } from 'discord.js';
import type { AccessController, JournalMessage } from '../services/access/AccessController';
import type { CriticalAlerts } from '../services/access/DailyResetScheduler';
import { buildEntryReply } from '../services/journal/JournalReplies';
import type { BotExtension, EventRouter } from '../events/EventRouter';
import { describeError, toError } from '../errors';
import { logger } from '../utils/logger';

export interface JournalingOptions {
  guildId: string;
  sharedChannelId: string;
  journalChannelPrefix: string;
}

export function isJournalChannelName(name: string, prefix: string): boolean {
  return name.startsWith(prefix);
}

export function toJournalMessage(message: Message<true>): JournalMessage {
  return {
    guildId: message.guildId,
    discordId: message.author.id,
    displayName: message.member?.displayName ?? message.author.username,
    channelId: message.channelId,
    messageId: message.id,
    content: message.content,
    createdAt: message.createdAt,
  };
}

export class JournalingExtension implements BotExtension {
  readonly name = 'journaling';

  constructor(
    private readonly controller: AccessController,
    private readonly alerts: CriticalAlerts,
    private readonly options: JournalingOptions,
  ) {}

  register(router: EventRouter): void {
    router.on(Events.MessageCreate, this.name, message => this.handleMessage(message));
  }

  async handleMessage(message: Message): Promise<void> {
    if (message.author.bot || !message.inGuild() || message.guildId !== this.options.guildId) {
      return;
    }

    const channel = message.channel;
    if (channel.type !== ChannelType.GuildText || !isJournalChannelName(channel.name, this.options.journalChannelPrefix)) {
      return;
    }

    try {
      const outcome = await this.controller.onNewEntry(toJournalMessage(message));
      const reply = buildEntryReply(outcome, this.controller.threshold, this.options.sharedChannelId);

      if (reply) {
        await message.reply(reply);
      }
    } catch (error) {
      logger.error('Failed to record journal entry', {
        guildId: message.guildId,
        discordId: message.author.id,
        messageId: message.id,
        error: describeError(error).message,
      });

      await this.alerts.notify(message.guildId, toError(error), {
        context: 'Journal ingestion',
        messageId: message.id,
        discordId: message.author.id,
      });
    }
  }
}
