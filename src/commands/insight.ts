// MARK: - Insight Command
// Runs a prompt over today's anonymized journals (shared channel only)

import { ChatInputCommandInteraction, MessageFlags, SlashCommandBuilder } from 'discord.js';
import type { CommandContext } from './index';
import { describeError } from '../errors';
import { logger } from '../utils/logger';

export const data = new SlashCommandBuilder()
  .setName('insight')
  .setDescription("Run a prompt over today's anonymized journals")
  .addStringOption(option =>
    option
      .setName('prompt')
      .setDescription('What would you like to know about today’s journals?')
      .setRequired(true)
      .setMaxLength(1000),
  );

export async function execute(interaction: ChatInputCommandInteraction, context: CommandContext): Promise<void> {
  const guildId = interaction.guildId;
  const { sharedChannelId, dailyWordRequirement } = context.config;

  if (!guildId) {
    await interaction.reply({ content: '❌ This command can only be used in a server.', flags: MessageFlags.Ephemeral });
    return;
  }

  if (interaction.channelId !== sharedChannelId) {
    await interaction.reply({
      content: `The /insight command can only be used in <#${sharedChannelId}>!`,
      flags: MessageFlags.Ephemeral,
    });
    return;
  }

  if (!context.insight) {
    await interaction.reply({ content: '❌ Insights are not configured on this bot.', flags: MessageFlags.Ephemeral });
    return;
  }

  try {
    const progress = await context.controller.getProgress(guildId, interaction.user.id);
    if (!progress.hasAccess) {
      await interaction.reply({
        content: `You need to write ${dailyWordRequirement} words in your journal today to use this command!`,
        flags: MessageFlags.Ephemeral,
      });
      return;
    }

    await interaction.deferReply();

    const prompt = interaction.options.getString('prompt', true);
    const result = await context.insight.run(guildId, prompt);

    if (result.status === 'empty') {
      await interaction.editReply('No journal entries found for today!');
      return;
    }

    const [first, ...rest] = result.chunks;
    await interaction.editReply(first);
    for (const chunk of rest) {
      await interaction.followUp(chunk);
    }

    logger.info('Insight command executed', {
      guildId,
      userId: interaction.user.id,
      writers: result.writers,
      chunks: result.chunks.length,
    });
  } catch (error) {
    logger.error('Insight command failed', {
      userId: interaction.user.id,
      error: describeError(error).message,
    });

    const content = '❌ Sorry, there was an error processing your request.';
    if (interaction.deferred || interaction.replied) {
      await interaction.editReply(content);
    } else {
      await interaction.reply({ content, flags: MessageFlags.Ephemeral });
    }
  }
}
