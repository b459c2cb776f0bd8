// MARK: - Insight Service
// Runs a free-text prompt over the day's anonymized journal entries

import { JournalCalendar } from './journal/JournalCalendar';
import type { JournalEntryRecord, JournalStore } from './journal/JournalStore';
import { retryStoreCall } from './journal/storeRetry';
import type { InsightGenerator } from './OpenAIService';
import { logger } from '../utils/logger';

export const DISCORD_MESSAGE_LIMIT = 2000;

const SYSTEM_PROMPT =
  'You read anonymized daily journals from members of a writing group. ' +
  'Answer the request using only the journals provided. Refer to writers by their labels and never guess identities.';

export interface AnonymizedJournal {
  alias: string;
  text: string;
}

export type InsightResult =
  | { status: 'empty'; date: string }
  | { status: 'ok'; date: string; writers: number; chunks: string[] };

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Groups entries per author (ordered by first entry), labels them
 * Writer 1..N and masks author names inside every text.
 */
export function anonymizeEntries(entries: JournalEntryRecord[]): AnonymizedJournal[] {
  const sorted = [...entries].sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  const groups = new Map<string, { alias: string; names: Set<string>; texts: string[] }>();

  for (const entry of sorted) {
    let group = groups.get(entry.discordId);
    if (!group) {
      group = { alias: `Writer ${groups.size + 1}`, names: new Set(), texts: [] };
      groups.set(entry.discordId, group);
    }
    group.names.add(entry.displayName);
    group.texts.push(entry.content);
  }

  const replacements: Array<{ pattern: RegExp; alias: string }> = [];
  for (const group of groups.values()) {
    for (const name of group.names) {
      if (name.trim().length < 2) {
        continue;
      }
      replacements.push({
        pattern: new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(name)}(?![\\p{L}\\p{N}_])`, 'giu'),
        alias: group.alias,
      });
    }
  }
  // Longer names first so "annabel" is not masked as "anna" + "bel"
  replacements.sort((a, b) => b.pattern.source.length - a.pattern.source.length);

  return Array.from(groups.values()).map(group => ({
    alias: group.alias,
    text: replacements.reduce(
      (text, { pattern, alias }) => text.replace(pattern, alias),
      group.texts.join('\n\n'),
    ),
  }));
}

export function buildInsightPrompt(journals: AnonymizedJournal[], request: string): string {
  const body = journals
    .map(journal => `${journal.alias}'s journal:\n${journal.text}`)
    .join('\n\n---\n\n');

  return [
    `Journals written today by ${journals.length} writer${journals.length === 1 ? '' : 's'}:`,
    '',
    body,
    '',
    `Request: ${request.trim()}`,
  ].join('\n');
}

/**
 * Splits text into Discord-sized messages, preferring line breaks
 */
export function chunkMessage(text: string, limit = DISCORD_MESSAGE_LIMIT): string[] {
  const chunks: string[] = [];
  let remaining = text;

  while (remaining.length > limit) {
    const newline = remaining.lastIndexOf('\n', limit);
    const cut = newline > 0 ? newline : limit;
    chunks.push(remaining.slice(0, cut));
    remaining = remaining.slice(newline > 0 ? cut + 1 : cut);
  }

  if (remaining.length > 0 || chunks.length === 0) {
    chunks.push(remaining);
  }

  return chunks;
}

export class InsightService {
  constructor(
    private readonly store: JournalStore,
    private readonly generator: InsightGenerator,
    private readonly calendar: JournalCalendar,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async run(guildId: string, request: string): Promise<InsightResult> {
    const date = this.calendar.dateOf(this.now());
    const entries = await retryStoreCall('listEntriesForDate', () => this.store.listEntriesForDate(guildId, date));

    if (entries.length === 0) {
      return { status: 'empty', date };
    }

    const journals = anonymizeEntries(entries);
    const response = await this.generator.generate(SYSTEM_PROMPT, buildInsightPrompt(journals, request));

    logger.info('Insight prompt answered', {
      guildId,
      date,
      writers: journals.length,
      entries: entries.length,
    });

    return { status: 'ok', date, writers: journals.length, chunks: chunkMessage(response.text) };
  }
}
