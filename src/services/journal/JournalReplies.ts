// MARK: - Journal Replies
// User-facing text for ingestion outcomes and progress checks

import type { DailyProgress, IngestOutcome } from '../access/AccessController';

/**
 * Reply posted under a journal message, or null when nothing should be said
 */
export function buildEntryReply(outcome: IngestOutcome, threshold: number, sharedChannelId: string): string | null {
  if (outcome.status !== 'recorded') {
    return null;
  }

  const total = `**${outcome.totalWords}**`;

  switch (outcome.access) {
    case 'granted':
      return `🎉 Congratulations! You've written ${total} words today and unlocked <#${sharedChannelId}>!`;
    case 'pending':
      return `🎉 You've written ${total} words today and met the requirement, but access to <#${sharedChannelId}> is delayed. It will be granted automatically.`;
    case 'in-progress':
      return `🎉 You've written ${total} words today! Unlocking <#${sharedChannelId}>...`;
    case 'unlocked':
      return `✍️ ${total} words written today. You already have access to <#${sharedChannelId}>.`;
    case 'closed':
      return `📓 Saved. This entry counts toward ${outcome.date}, which has already closed.`;
    default:
      return `✍️ ${total} words written today. **${Math.max(0, threshold - outcome.totalWords)}** more to unlock the shared channel!`;
  }
}

export function buildProgressSummary(progress: DailyProgress, sharedChannelId: string): string {
  const closesAt = Math.floor(progress.closesAt.getTime() / 1000);
  const lines = [`📓 **Journal progress for ${progress.date}**`, `• Words today: **${progress.totalWords}**`];

  if (progress.hasAccess) {
    lines.push(`• Access: unlocked <#${sharedChannelId}>`);
  } else if (progress.accessPending) {
    lines.push('• Access: requirement met, unlock delayed');
  } else {
    lines.push(`• Remaining: **${progress.remaining}** words`);
  }

  lines.push(`• Resets <t:${closesAt}:R>`);
  return lines.join('\n');
}
