// MARK: - Access Controller
// Ingests journal messages and drives shared channel access transitions

import { AccessCallFailedError, DuplicateMessageError, describeError } from '../../errors';
import type { AccessAction } from '../../errors';
import { countWords } from '../journal/WordCounter';
import { JournalCalendar } from '../journal/JournalCalendar';
import { StatsAggregator } from '../journal/StatsAggregator';
import { DEFAULT_STORE_RETRY, retryStoreCall } from '../journal/storeRetry';
import type { StoreRetryOptions } from '../journal/storeRetry';
import type { DailyStatRecord, JournalStore } from '../journal/JournalStore';
import type { ChannelAccessGateway } from './ChannelAccess';
import { decide, stateOf } from './AccessDecider';
import { RetryExhaustedError, withRetry } from '../../utils/retry';
import { logger } from '../../utils/logger';

const DEFAULT_STALE_CLAIM_MS = 5 * 60 * 1000;

export interface JournalMessage {
  guildId: string;
  discordId: string;
  displayName: string;
  channelId: string;
  messageId: string;
  content: string;
  createdAt: Date;
}

/**
 * locked: below the goal. granted: this entry unlocked the channel.
 * unlocked: already had access. in-progress: another entry is unlocking.
 * pending: goal met but the channel call failed. closed: the day is over.
 */
export type AccessStatus = 'locked' | 'granted' | 'unlocked' | 'in-progress' | 'pending' | 'closed';

export type IngestOutcome =
  | { status: 'empty' }
  | { status: 'duplicate'; date: string; totalWords: number }
  | {
    status: 'recorded';
    date: string;
    wordCount: number;
    totalWords: number;
    remaining: number;
    access: AccessStatus;
  };

export type TransitionResult = 'applied' | 'busy' | 'failed' | 'compensated';

export interface ReconcileSummary {
  examined: number;
  granted: number;
  revoked: number;
  cleared: number;
  failed: number;
}

export interface DailyProgress {
  date: string;
  totalWords: number;
  remaining: number;
  hasAccess: boolean;
  accessPending: boolean;
  closesAt: Date;
}

export interface OperatorAlerts {
  notifyWarning(guildId: string, title: string, message: string, context?: Record<string, unknown>): Promise<void>;
}

export interface AccessRetryOptions {
  attempts: number;
  baseDelayMs: number;
  timeoutMs: number;
}

export interface AccessControllerOptions {
  threshold: number;
  accessRetry: AccessRetryOptions;
  storeRetry?: StoreRetryOptions;
  staleClaimMs?: number;
  now?: () => Date;
}

export interface AccessControllerDeps {
  store: JournalStore;
  channelAccess: ChannelAccessGateway;
  calendar: JournalCalendar;
  alerts: OperatorAlerts;
}

export interface AccessMetrics {
  entriesRecorded: number;
  duplicates: number;
  grants: number;
  revokes: number;
  accessFailures: number;
  compensations: number;
}

export class AccessController {
  readonly threshold: number;
  private readonly store: JournalStore;
  private readonly channelAccess: ChannelAccessGateway;
  private readonly calendar: JournalCalendar;
  private readonly alerts: OperatorAlerts;
  private readonly aggregator: StatsAggregator;
  private readonly accessRetry: AccessRetryOptions;
  private readonly storeRetry: StoreRetryOptions;
  private readonly staleClaimMs: number;
  private readonly now: () => Date;
  private readonly metrics: AccessMetrics = {
    entriesRecorded: 0,
    duplicates: 0,
    grants: 0,
    revokes: 0,
    accessFailures: 0,
    compensations: 0,
  };

  constructor(deps: AccessControllerDeps, options: AccessControllerOptions) {
    this.store = deps.store;
    this.channelAccess = deps.channelAccess;
    this.calendar = deps.calendar;
    this.alerts = deps.alerts;
    this.threshold = options.threshold;
    this.accessRetry = options.accessRetry;
    this.storeRetry = options.storeRetry ?? DEFAULT_STORE_RETRY;
    this.staleClaimMs = options.staleClaimMs ?? DEFAULT_STALE_CLAIM_MS;
    this.now = options.now ?? (() => new Date());
    this.aggregator = new StatsAggregator(this.store, this.storeRetry);
  }

  /**
   * Records one journal message and applies any access transition it causes
   */
  async onNewEntry(message: JournalMessage): Promise<IngestOutcome> {
    const wordCount = countWords(message.content);
    if (wordCount === 0) {
      return { status: 'empty' };
    }

    const date = this.calendar.dateOf(message.createdAt);
    const user = await this.persist('upsertUser', () => this.store.upsertUser({
      guildId: message.guildId,
      discordId: message.discordId,
      displayName: message.displayName,
    }));

    try {
      await this.persist('insertEntry', () => this.store.insertEntry({
        user,
        displayName: message.displayName,
        content: message.content,
        wordCount,
        messageId: message.messageId,
        channelId: message.channelId,
        journalDate: date,
        createdAt: message.createdAt,
      }));
    } catch (error) {
      if (!(error instanceof DuplicateMessageError)) {
        throw error;
      }

      // A crash after the insert can leave the message uncounted or its grant
      // unclaimed. The increment is keyed by message id and the decision is
      // a no-op on a settled row, so replaying both converges.
      const stat = await this.aggregator.recordEntry(user, date, message.messageId, wordCount);
      this.metrics.duplicates++;
      const access = await this.applyDecision(stat);
      logger.info('Duplicate journal message ignored', {
        guildId: message.guildId,
        discordId: message.discordId,
        messageId: message.messageId,
        date,
        access,
      });

      return { status: 'duplicate', date, totalWords: stat.totalWords };
    }

    const stat = await this.aggregator.recordEntry(user, date, message.messageId, wordCount);
    this.metrics.entriesRecorded++;

    const access = await this.applyDecision(stat);

    logger.debug('Journal entry recorded', {
      guildId: message.guildId,
      discordId: message.discordId,
      date,
      wordCount,
      totalWords: stat.totalWords,
      access,
    });

    return {
      status: 'recorded',
      date,
      wordCount,
      totalWords: stat.totalWords,
      remaining: Math.max(0, this.threshold - stat.totalWords),
      access,
    };
  }

  /**
   * Forced revoke used by the daily reset
   */
  async revokeAccess(stat: DailyStatRecord): Promise<TransitionResult> {
    return this.transition(stat, 'revoke', true);
  }

  /**
   * Retries rows left pending by failed channel calls or crashed workers
   */
  async reconcile(guildId: string): Promise<ReconcileSummary> {
    const now = this.now();
    const staleBefore = new Date(now.getTime() - this.staleClaimMs);
    const rows = await this.persist('listStatsNeedingReconcile', () =>
      this.store.listStatsNeedingReconcile(guildId, staleBefore),
    );
    const summary: ReconcileSummary = { examined: rows.length, granted: 0, revoked: 0, cleared: 0, failed: 0 };

    for (const row of rows) {
      try {
        let stat = row;

        if (stat.transition) {
          if (stat.transition.claimedAt.getTime() >= staleBefore.getTime()) {
            continue;
          }

          const claimedAt = stat.transition.claimedAt;
          const released = await this.persist('releaseStaleClaim', () => this.store.releaseStaleClaim(stat.id, claimedAt));
          if (!released) {
            continue;
          }

          logger.warn('Released stale access claim', {
            guildId,
            discordId: stat.discordId,
            date: stat.date,
            claimedAt: claimedAt.toISOString(),
          });
          stat = { ...stat, transition: null, accessPending: true };
        }

        const wanted = !stat.closed
          && !this.calendar.hasBoundaryPassed(stat.date, now)
          && stat.totalWords >= this.threshold;

        if (wanted && stat.hasAccess) {
          await this.persist('clearPending', () => this.store.clearPending(stat.id));
          summary.cleared++;
          continue;
        }

        const action: AccessAction = wanted ? 'grant' : 'revoke';
        const result = await this.transition(stat, action, stat.hasAccess);

        if (result === 'applied') {
          if (action === 'grant') {
            summary.granted++;
          } else {
            summary.revoked++;
          }
        } else if (result === 'failed') {
          summary.failed++;
        }
      } catch (error) {
        summary.failed++;
        logger.error('Access reconciliation failed for row', {
          guildId,
          discordId: row.discordId,
          date: row.date,
          error: describeError(error).message,
        });
      }
    }

    if (rows.length > 0) {
      logger.info('Access reconciliation completed', { guildId, ...summary });
    }

    return summary;
  }

  async getProgress(guildId: string, discordId: string): Promise<DailyProgress> {
    const date = this.calendar.dateOf(this.now());
    const stat = await this.persist('findDailyStat', () => this.store.findDailyStat(guildId, discordId, date));
    const totalWords = stat?.totalWords ?? 0;

    return {
      date,
      totalWords,
      remaining: Math.max(0, this.threshold - totalWords),
      hasAccess: stat?.hasAccess ?? false,
      accessPending: stat?.accessPending ?? false,
      closesAt: this.calendar.boundaryOf(date),
    };
  }

  getMetrics(): AccessMetrics {
    return { ...this.metrics };
  }

  private async applyDecision(stat: DailyStatRecord): Promise<AccessStatus> {
    const boundaryFired = stat.closed || this.calendar.hasBoundaryPassed(stat.date, this.now());
    const decision = decide({
      state: stateOf(stat.hasAccess),
      totalWords: stat.totalWords,
      threshold: this.threshold,
      boundaryFired,
    });

    switch (decision) {
      case 'GRANT': {
        const result = await this.transition(stat, 'grant', false);
        if (result === 'applied') {
          return 'granted';
        }
        if (result === 'failed') {
          return 'pending';
        }
        if (result === 'compensated') {
          return 'closed';
        }
        return this.describeCurrent(stat);
      }
      case 'REVOKE':
        if (stat.hasAccess) {
          await this.transition(stat, 'revoke', true);
        }
        return 'closed';
      default:
        if (stat.hasAccess) {
          return 'unlocked';
        }
        return stat.accessPending && stat.totalWords >= this.threshold ? 'pending' : 'locked';
    }
  }

  /**
   * Status of a row whose grant was claimed by a concurrent entry
   */
  private async describeCurrent(stat: DailyStatRecord): Promise<AccessStatus> {
    const current = await this.persist('getDailyStat', () => this.store.getDailyStat(stat.userId, stat.date));
    if (!current) {
      return 'locked';
    }
    if (current.hasAccess) {
      return 'unlocked';
    }
    if (current.closed) {
      return 'closed';
    }
    return current.accessPending ? 'pending' : 'in-progress';
  }

  /**
   * Claim, call the channel, then persist the confirmed flag. The flag is
   * only written after the external call succeeds.
   */
  private async transition(
    stat: DailyStatRecord,
    action: AccessAction,
    expectedAccess: boolean,
  ): Promise<TransitionResult> {
    const claimedAt = this.now();
    const context = { guildId: stat.guildId, discordId: stat.discordId, date: stat.date, action };

    const claimed = await this.persist('claimTransition', () =>
      this.store.claimTransition(stat.id, action, expectedAccess, claimedAt),
    );
    if (!claimed) {
      logger.debug('Access transition not claimed', context);
      return 'busy';
    }

    try {
      await withRetry(
        () => action === 'grant'
          ? this.channelAccess.grant(stat.guildId, stat.discordId)
          : this.channelAccess.revoke(stat.guildId, stat.discordId),
        {
          attempts: this.accessRetry.attempts,
          baseDelayMs: this.accessRetry.baseDelayMs,
          timeoutMs: this.accessRetry.timeoutMs,
          label: `shared-channel-${action}`,
        },
      );
    } catch (error) {
      const cause = error instanceof RetryExhaustedError ? error.lastError : error;
      const failure = new AccessCallFailedError(action, this.accessRetry.attempts, cause);
      await this.persist('failTransition', () => this.store.failTransition(stat.id, claimedAt));
      this.metrics.accessFailures++;

      logger.error('Entry recorded but shared channel access pending', {
        ...context,
        error: failure.message,
      });
      await this.alerts.notifyWarning(
        stat.guildId,
        'Shared channel access pending',
        failure.message,
        { discordId: stat.discordId, date: stat.date, action },
      );
      return 'failed';
    }

    const landed = await this.persist('completeTransition', () =>
      this.store.completeTransition(stat.id, action, claimedAt),
    );

    if (landed) {
      if (action === 'grant') {
        this.metrics.grants++;
        logger.info('Shared channel access granted', { ...context, totalWords: stat.totalWords });
      } else {
        this.metrics.revokes++;
        logger.info('Shared channel access revoked', context);
      }
      return 'applied';
    }

    if (action === 'revoke') {
      logger.warn('Revoke confirmed but claim was lost', context);
      return 'busy';
    }

    const current = await this.persist('getDailyStat', () => this.store.getDailyStat(stat.userId, stat.date));
    if (!current?.closed) {
      logger.warn('Grant confirmed but claim was lost; left for reconciliation', context);
      return 'busy';
    }

    // The reset closed the day while the grant was in flight; undo it
    logger.warn('Grant landed after the daily boundary; revoking', context);
    this.metrics.compensations++;
    await this.transition(current, 'revoke', false);
    return 'compensated';
  }

  private persist<T>(label: string, task: () => Promise<T>): Promise<T> {
    return retryStoreCall(label, task, this.storeRetry);
  }
}
