// MARK: - Help Command
// How the journaling game works and which commands exist

import { ChatInputCommandInteraction, EmbedBuilder, MessageFlags, SlashCommandBuilder } from 'discord.js';
import type { CommandContext } from './index';

export const data = new SlashCommandBuilder()
  .setName('help')
  .setDescription('How the daily journaling game works');

export function buildHelpEmbed(dailyWordRequirement: number, sharedChannelId: string, timezone: string): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle('📔 Daily Journaling')
    .setColor(0x4e6cff)
    .setDescription(
      '1. DM the bot to get your private journal channel.\n' +
      `2. Write at least **${dailyWordRequirement} words** there each day.\n` +
      `3. Once you reach the goal you can see <#${sharedChannelId}> until the daily reset (${timezone}).`,
    )
    .addFields(
      { name: '/progress', value: "Today's word count and access status", inline: false },
      { name: '/insight', value: "Ask a question about today's anonymized journals (shared channel only)", inline: false },
      { name: '/admin-access', value: 'Run the reset, reconcile pending access, list pending rows (admins)', inline: false },
    );
}

export async function execute(interaction: ChatInputCommandInteraction, context: CommandContext): Promise<void> {
  const { dailyWordRequirement, sharedChannelId, timezone } = context.config;

  await interaction.reply({
    embeds: [buildHelpEmbed(dailyWordRequirement, sharedChannelId, timezone)],
    flags: MessageFlags.Ephemeral,
  });
}
