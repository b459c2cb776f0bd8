// MARK: - Daily Reset Scheduler
// Revokes shared channel access at the daily boundary and retries pending rows

import * as cron from 'node-cron';
import { isValidCron } from 'cron-validator';
import parser from 'cron-parser';
import { describeError, toError } from '../../errors';
import { JournalCalendar } from '../journal/JournalCalendar';
import { retryStoreCall } from '../journal/storeRetry';
import type { JournalStore, ResetStateRecord } from '../journal/JournalStore';
import type { AccessController, ReconcileSummary } from './AccessController';
import { logger } from '../../utils/logger';

export interface ResetSummary {
  boundaryDate: string;
  closed: number;
  revoked: number;
  failed: number;
  skipped: number;
}

export interface SchedulerStatus {
  timezone: string;
  resetCron: string;
  reconcileCron: string;
  running: boolean;
  lastReset: ResetStateRecord | null;
  nextResetAt: Date | null;
}

export interface CriticalAlerts {
  notify(guildId: string, error: Error, context: Record<string, unknown>): Promise<void>;
}

export interface DailyResetSchedulerOptions {
  guildId: string;
  reconcileCron: string;
  now?: () => Date;
}

export class DailyResetScheduler {
  private resetTask: cron.ScheduledTask | null = null;
  private reconcileTask: cron.ScheduledTask | null = null;
  private lastReset: ResetStateRecord | null = null;
  private readonly resetsInFlight = new Map<string, Promise<ResetSummary>>();
  private resetQueue: Promise<void> = Promise.resolve();
  private readonly guildId: string;
  private readonly reconcileCron: string;
  private readonly now: () => Date;

  constructor(
    private readonly store: JournalStore,
    private readonly controller: AccessController,
    private readonly calendar: JournalCalendar,
    private readonly alerts: CriticalAlerts,
    options: DailyResetSchedulerOptions,
  ) {
    this.guildId = options.guildId;
    this.reconcileCron = options.reconcileCron;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Catch up on a missed boundary, then start the reset and reconcile jobs
   */
  async initialize(): Promise<void> {
    const resetCron = this.calendar.cronExpression();

    if (!isValidCron(resetCron)) {
      throw new Error(`Invalid reset cron expression: ${resetCron}`);
    }
    if (!isValidCron(this.reconcileCron)) {
      throw new Error(`Invalid reconcile cron expression: ${this.reconcileCron}`);
    }

    await this.catchUp();

    this.resetTask = cron.schedule(
      resetCron,
      async () => {
        await this.runScheduledReset();
      },
      {
        scheduled: true,
        timezone: this.calendar.timezone,
      },
    );

    this.reconcileTask = cron.schedule(
      this.reconcileCron,
      async () => {
        await this.runScheduledReconcile();
      },
      {
        scheduled: true,
        timezone: this.calendar.timezone,
      },
    );

    logger.info('Daily reset scheduled', {
      guildId: this.guildId,
      cron: resetCron,
      reconcileCron: this.reconcileCron,
      timezone: this.calendar.timezone,
    });
  }

  /**
   * Runs the reset for the latest boundary when the recorded run is older.
   * Several missed boundaries still produce a single run.
   */
  async catchUp(): Promise<ResetSummary | null> {
    const boundary = this.calendar.latestBoundary(this.now());
    const state = await retryStoreCall('getResetState', () => this.store.getResetState(this.guildId));
    this.lastReset = state;

    if (state && state.lastBoundaryAt.getTime() >= boundary.at.getTime()) {
      logger.debug('Daily reset up to date', {
        guildId: this.guildId,
        lastBoundaryDate: state.lastBoundaryDate,
      });
      return null;
    }

    logger.warn('Missed daily reset detected, running catch-up', {
      guildId: this.guildId,
      boundaryDate: boundary.date,
      lastBoundaryDate: state?.lastBoundaryDate ?? null,
    });

    return this.runReset(boundary.date);
  }

  /**
   * Closes every row up to boundaryDate and revokes every row with access.
   * Overlapping calls for one boundary share a run; a second run for the
   * same boundary finds nothing to revoke.
   */
  async runReset(boundaryDate: string): Promise<ResetSummary> {
    const running = this.resetsInFlight.get(boundaryDate);
    if (running) {
      return running;
    }

    // Runs for different boundaries execute one after another in call order
    const run = this.resetQueue.then(() => this.executeReset(boundaryDate));
    this.resetQueue = run.then(
      () => undefined,
      () => undefined,
    );
    this.resetsInFlight.set(boundaryDate, run);

    try {
      return await run;
    } finally {
      this.resetsInFlight.delete(boundaryDate);
    }
  }

  /**
   * Runs the reset for the most recent boundary on demand
   */
  async resetNow(): Promise<ResetSummary> {
    return this.runReset(this.calendar.latestBoundary(this.now()).date);
  }

  async reconcile(): Promise<ReconcileSummary> {
    return this.controller.reconcile(this.guildId);
  }

  getStatus(): SchedulerStatus {
    const resetCron = this.calendar.cronExpression();
    let nextResetAt: Date | null = null;

    try {
      nextResetAt = parser
        .parseExpression(resetCron, { tz: this.calendar.timezone, currentDate: this.now() })
        .next()
        .toDate();
    } catch (error) {
      logger.warn('Could not compute next reset time', { error: describeError(error).message });
    }

    return {
      timezone: this.calendar.timezone,
      resetCron,
      reconcileCron: this.reconcileCron,
      running: this.resetTask !== null,
      lastReset: this.lastReset,
      nextResetAt,
    };
  }

  shutdown(): void {
    this.resetTask?.stop();
    this.reconcileTask?.stop();
    this.resetTask = null;
    this.reconcileTask = null;
    logger.info('Daily reset scheduler stopped', { guildId: this.guildId });
  }

  private async executeReset(boundaryDate: string): Promise<ResetSummary> {
    const ranAt = this.now();
    const closed = await retryStoreCall('closeDates', () => this.store.closeDates(this.guildId, boundaryDate));
    const rows = await retryStoreCall('listStatsWithAccess', () => this.store.listStatsWithAccess(this.guildId));
    const summary: ResetSummary = { boundaryDate, closed, revoked: 0, failed: 0, skipped: 0 };

    for (const stat of rows) {
      try {
        const result = await this.controller.revokeAccess(stat);

        if (result === 'applied') {
          summary.revoked++;
        } else if (result === 'failed') {
          summary.failed++;
        } else {
          summary.skipped++;
        }
      } catch (error) {
        summary.failed++;
        logger.error('Daily reset revoke failed', {
          guildId: this.guildId,
          discordId: stat.discordId,
          date: stat.date,
          error: describeError(error).message,
        });
      }
    }

    const boundaryAt = this.calendar.boundaryOf(boundaryDate);
    await retryStoreCall('recordReset', () => this.store.recordReset(this.guildId, boundaryDate, boundaryAt, ranAt));
    this.lastReset = {
      guildId: this.guildId,
      lastBoundaryDate: boundaryDate,
      lastBoundaryAt: boundaryAt,
      lastRunAt: ranAt,
    };

    logger.info('Daily reset completed', { guildId: this.guildId, ...summary });
    return summary;
  }

  private async runScheduledReset(): Promise<void> {
    const boundary = this.calendar.latestBoundary(this.now());

    try {
      await this.runReset(boundary.date);
    } catch (error) {
      logger.error('Scheduled daily reset failed', {
        guildId: this.guildId,
        boundaryDate: boundary.date,
        error: describeError(error).message,
      });

      await this.alerts.notify(this.guildId, toError(error), {
        context: 'scheduledDailyReset',
        boundaryDate: boundary.date,
      });
    }
  }

  private async runScheduledReconcile(): Promise<void> {
    try {
      await this.reconcile();
    } catch (error) {
      logger.error('Scheduled access reconciliation failed', {
        guildId: this.guildId,
        error: describeError(error).message,
      });
    }
  }
}
