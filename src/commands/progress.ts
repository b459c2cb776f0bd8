// MARK: - Progress Command
// Shows today's word count and shared channel status

import { ChatInputCommandInteraction, MessageFlags, SlashCommandBuilder } from 'discord.js';
import type { CommandContext } from './index';
import { buildProgressSummary } from '../services/journal/JournalReplies';
import { describeError } from '../errors';
import { logger } from '../utils/logger';

export const data = new SlashCommandBuilder()
  .setName('progress')
  .setDescription("See today's journal word count and shared channel access");

export async function execute(interaction: ChatInputCommandInteraction, context: CommandContext): Promise<void> {
  const guildId = interaction.guildId;

  if (!guildId) {
    await interaction.reply({
      content: '❌ This command can only be used in a server.',
      flags: MessageFlags.Ephemeral,
    });
    return;
  }

  try {
    const progress = await context.controller.getProgress(guildId, interaction.user.id);

    await interaction.reply({
      content: buildProgressSummary(progress, context.config.sharedChannelId),
      flags: MessageFlags.Ephemeral,
    });
  } catch (error) {
    logger.error('Progress command failed', {
      userId: interaction.user.id,
      error: describeError(error).message,
    });

    await interaction.reply({
      content: '❌ Could not load your progress. Try again shortly.',
      flags: MessageFlags.Ephemeral,
    });
  }
}
