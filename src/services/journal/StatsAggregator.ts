// MARK: - Stats Aggregator
// Keeps the per-(user, date) word total in step with recorded entries

import type { DailyStatRecord, JournalStore, JournalUserRecord } from './JournalStore';
import { retryStoreCall } from './storeRetry';
import type { StoreRetryOptions } from './storeRetry';
import { logger } from '../../utils/logger';

export class StatsAggregator {
  constructor(
    private readonly store: JournalStore,
    private readonly retry: StoreRetryOptions,
  ) {}

  /**
   * Adds an entry's words to the daily total and returns the updated row.
   * Replaying the same message leaves the total unchanged.
   */
  async recordEntry(
    user: JournalUserRecord,
    date: string,
    messageId: string,
    wordCount: number,
  ): Promise<DailyStatRecord> {
    const stat = await retryStoreCall(
      'incrementDailyTotal',
      () => this.store.incrementDailyTotal({ user, date, messageId, wordCount }),
      this.retry,
    );

    logger.debug('Daily total updated', {
      guildId: user.guildId,
      discordId: user.discordId,
      date,
      wordCount,
      totalWords: stat.totalWords,
    });

    return stat;
  }
}
