// MARK: - Admin Access Command
// Operator controls for the daily reset and pending access rows

import {
  ChatInputCommandInteraction,
  EmbedBuilder,
  MessageFlags,
  PermissionFlagsBits,
  SlashCommandBuilder,
} from 'discord.js';
import type { CommandContext } from './index';
import { describeError } from '../errors';
import { logger } from '../utils/logger';

const MAX_LISTED = 15;

export const data = new SlashCommandBuilder()
  .setName('admin-access')
  .setDescription('Manage shared channel access (admin only)')
  .setDefaultMemberPermissions(PermissionFlagsBits.Administrator)
  .addSubcommand(sub =>
    sub.setName('reset').setDescription('Run the daily reset now for the latest boundary'),
  )
  .addSubcommand(sub =>
    sub.setName('reconcile').setDescription('Retry grants and revokes that are pending'),
  )
  .addSubcommand(sub =>
    sub.setName('pending').setDescription('List members whose access change is pending'),
  );

export async function execute(interaction: ChatInputCommandInteraction, context: CommandContext): Promise<void> {
  const guildId = interaction.guildId;
  if (!guildId) {
    await interaction.reply({ content: '❌ This command can only be used in a server.', flags: MessageFlags.Ephemeral });
    return;
  }

  const subcommand = interaction.options.getSubcommand();
  await interaction.deferReply({ flags: MessageFlags.Ephemeral });

  try {
    if (subcommand === 'reset') {
      const summary = await context.scheduler.resetNow();
      await interaction.editReply(
        `✅ Reset for **${summary.boundaryDate}** complete.\n` +
        `• Revoked: ${summary.revoked}\n• Failed: ${summary.failed}\n• Skipped: ${summary.skipped}`,
      );
    } else if (subcommand === 'reconcile') {
      const summary = await context.scheduler.reconcile();
      await interaction.editReply(
        `✅ Reconciled ${summary.examined} row(s).\n` +
        `• Granted: ${summary.granted}\n• Revoked: ${summary.revoked}\n• Cleared: ${summary.cleared}\n• Failed: ${summary.failed}`,
      );
    } else {
      // Nothing was claimed before the epoch, so this lists pending rows only
      const rows = await context.store.listStatsNeedingReconcile(guildId, new Date(0));
      const lines = rows
        .slice(0, MAX_LISTED)
        .map(row => `• <@${row.discordId}> ${row.date}: ${row.totalWords} words, flag ${row.hasAccess ? 'on' : 'off'}`);

      const embed = new EmbedBuilder()
        .setTitle('⏳ Pending Access Changes')
        .setDescription(lines.length > 0 ? lines.join('\n') : 'Nothing pending.')
        .setColor(0xFFAA00)
        .setFooter({ text: `${rows.length} pending` })
        .setTimestamp();

      await interaction.editReply({ embeds: [embed] });
    }

    logger.info('Admin access command executed', { guildId, subcommand, userId: interaction.user.id });
  } catch (error) {
    logger.error('Admin access command failed', {
      guildId,
      subcommand,
      error: describeError(error).message,
    });
    await interaction.editReply('❌ The operation failed. Check the logs for details.');
  }
}
