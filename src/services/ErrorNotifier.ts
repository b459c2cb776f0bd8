// MARK: - Error Notifier Service
// Posts operator alerts and critical errors to the operator channel

import { Client, EmbedBuilder, TextChannel } from 'discord.js';
import { describeError } from '../errors';
import type { OperatorAlerts } from './access/AccessController';
import type { CriticalAlerts } from './access/DailyResetScheduler';
import { logger } from '../utils/logger';

export class ErrorNotifier implements OperatorAlerts, CriticalAlerts {
  private client: Client | null = null;
  private operatorChannelId: string | null = null;

  initialize(client: Client, operatorChannelId: string | null): void {
    this.client = client;
    this.operatorChannelId = operatorChannelId;

    if (!operatorChannelId) {
      logger.warn('No operator channel configured; alerts will only be logged');
    }
  }

  /**
   * Notify error to the operator channel
   */
  async notify(
    guildId: string,
    error: Error,
    context: Record<string, unknown>
  ): Promise<void> {
    try {
      const channel = await this.resolveChannel(guildId);
      if (!channel) {
        return;
      }

      const embed = new EmbedBuilder()
        .setTitle('🚨 Bot Error')
        .setDescription(error.message)
        .setColor(0xFF0000)
        .setTimestamp()
        .addFields(
          { name: 'Context', value: formatContext(context), inline: false },
          {
            name: 'Stack Trace',
            value: truncateStackTrace(error.stack || 'No stack trace'),
            inline: false
          }
        );

      await channel.send({ embeds: [embed] });

      logger.info('Error notification sent', { guildId, channelId: channel.id });

    } catch (notifyError) {
      logger.error('Failed to send error notification', {
        guildId,
        originalError: error.message,
        notifyError: describeError(notifyError).message,
      });
    }
  }

  /**
   * Notify warning to the operator channel
   */
  async notifyWarning(
    guildId: string,
    title: string,
    message: string,
    context?: Record<string, unknown>
  ): Promise<void> {
    try {
      const channel = await this.resolveChannel(guildId);
      if (!channel) return;

      const embed = new EmbedBuilder()
        .setTitle(`⚠️ ${title}`)
        .setDescription(message)
        .setColor(0xFFAA00)
        .setTimestamp();

      if (context) {
        embed.addFields({
          name: 'Details',
          value: formatContext(context),
          inline: false,
        });
      }

      await channel.send({ embeds: [embed] });

    } catch (error) {
      logger.error('Failed to send warning notification', {
        guildId,
        title,
        error: describeError(error).message,
      });
    }
  }

  /**
   * Notify critical error with an @here mention
   */
  async notifyCritical(
    guildId: string,
    error: Error,
    context: Record<string, unknown>
  ): Promise<void> {
    try {
      const channel = await this.resolveChannel(guildId);
      if (!channel) return;

      const embed = new EmbedBuilder()
        .setTitle('🔥 CRITICAL ERROR')
        .setDescription(`**${error.message}**\n\nImmediate attention required.`)
        .setColor(0xFF0000)
        .setTimestamp()
        .addFields(
          { name: 'Context', value: formatContext(context), inline: false },
          {
            name: 'Stack Trace',
            value: truncateStackTrace(error.stack || 'No stack trace'),
            inline: false
          }
        );

      await channel.send({
        content: '@here Critical bot error requires attention',
        embeds: [embed],
      });

    } catch (notifyError) {
      logger.error('Failed to send critical notification', {
        guildId,
        error: describeError(notifyError).message,
      });
    }
  }

  private async resolveChannel(guildId: string): Promise<TextChannel | null> {
    if (!this.client) {
      logger.warn('ErrorNotifier not initialized, skipping notification');
      return null;
    }

    if (!this.operatorChannelId) {
      return null;
    }

    const channel = await this.client.channels.fetch(this.operatorChannelId);
    if (!channel || !(channel instanceof TextChannel) || channel.guildId !== guildId) {
      logger.warn('Operator channel not found or not a text channel', {
        guildId,
        channelId: this.operatorChannelId,
      });
      return null;
    }

    return channel;
  }
}

/**
 * Format context object as readable string
 */
export function formatContext(context: Record<string, unknown>): string {
  const text = Object.entries(context)
    .map(([key, value]) => `**${key}**: ${JSON.stringify(value)}`)
    .join('\n')
    .slice(0, 1024); // Discord field limit

  return text.length > 0 ? text : 'No details';
}

/**
 * Truncate stack trace to fit Discord limits
 */
export function truncateStackTrace(stack: string): string {
  const maxLength = 1000;
  if (stack.length <= maxLength) {
    return `\`\`\`\n${stack}\n\`\`\``;
  }
  return `\`\`\`\n${stack.slice(0, maxLength)}...\n\`\`\``;
}

export const errorNotifier = new ErrorNotifier();
