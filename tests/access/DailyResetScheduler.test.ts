import { beforeEach, describe, expect, it, vi } from 'vitest';
import { DailyResetScheduler } from '../../src/services/access/DailyResetScheduler';
import { GUILD_ID, createHarness, journalMessage, words } from '../helpers/fixtures';
import type { Harness } from '../helpers/fixtures';

const { schedule, stop } = vi.hoisted(() => {
  const stop = vi.fn();
  const schedule = vi.fn(
    (_expression: string, _task: () => Promise<void>, _options?: { scheduled?: boolean; timezone?: string }) => ({ stop }),
  );
  return { schedule, stop };
});

vi.mock('node-cron', () => ({ schedule }));

describe('DailyResetScheduler', () => {
  let h: Harness;
  let scheduler: DailyResetScheduler;

  beforeEach(() => {
    schedule.mockClear();
    stop.mockClear();
    h = createHarness();
    scheduler = new DailyResetScheduler(h.store, h.controller, h.calendar, h.alerts, {
      guildId: GUILD_ID,
      reconcileCron: '*/15 * * * *',
      now: () => h.clock.now,
    });
  });

  async function unlockTwoWriters(): Promise<void> {
    await h.controller.onNewEntry(journalMessage('m1', words(550)));
    await h.controller.onNewEntry(journalMessage('m2', words(300), { discordId: 'user-2', displayName: 'Bob' }));
  }

  describe('runReset', () => {
    it('closes the day and revokes everyone with access', async () => {
      await unlockTwoWriters();
      h.clock.now = new Date('2024-05-02T00:00:30Z');

      const summary = await scheduler.runReset('2024-05-01');

      expect(summary).toEqual({ boundaryDate: '2024-05-01', closed: 2, revoked: 1, failed: 0, skipped: 0 });
      expect(h.access.calls.filter(call => call.action === 'revoke')).toEqual([
        { action: 'revoke', guildId: GUILD_ID, discordId: 'user-1' },
      ]);
      expect(h.store.statFor('user-1', '2024-05-01')).toMatchObject({ hasAccess: false, closed: true });
      expect(await h.store.getResetState(GUILD_ID)).toEqual({
        guildId: GUILD_ID,
        lastBoundaryDate: '2024-05-01',
        lastBoundaryAt: new Date('2024-05-02T00:00:00Z'),
        lastRunAt: new Date('2024-05-02T00:00:30Z'),
      });
    });

    it('is a no-op when repeated for the same boundary', async () => {
      await unlockTwoWriters();
      h.clock.now = new Date('2024-05-02T00:00:30Z');
      await scheduler.runReset('2024-05-01');

      const again = await scheduler.runReset('2024-05-01');

      expect(again).toEqual({ boundaryDate: '2024-05-01', closed: 0, revoked: 0, failed: 0, skipped: 0 });
      expect(h.access.count('revoke')).toBe(1);
    });

    it('shares one run between overlapping triggers', async () => {
      await unlockTwoWriters();
      h.clock.now = new Date('2024-05-02T00:00:30Z');

      const [first, second] = await Promise.all([
        scheduler.runReset('2024-05-01'),
        scheduler.runReset('2024-05-01'),
      ]);

      expect(second).toBe(first);
      expect(h.access.count('revoke')).toBe(1);
    });

    it('gives overlapping triggers for different boundaries their own runs', async () => {
      await unlockTwoWriters();
      h.clock.now = new Date('2024-05-02T00:00:30Z');

      const [earlier, latest] = await Promise.all([
        scheduler.runReset('2024-04-30'),
        scheduler.runReset('2024-05-01'),
      ]);

      expect(earlier).toEqual({ boundaryDate: '2024-04-30', closed: 0, revoked: 1, failed: 0, skipped: 0 });
      expect(latest).toEqual({ boundaryDate: '2024-05-01', closed: 2, revoked: 0, failed: 0, skipped: 0 });
      expect(await h.store.getResetState(GUILD_ID)).toMatchObject({ lastBoundaryDate: '2024-05-01' });
    });

    it('starts the next day from zero', async () => {
      await unlockTwoWriters();
      h.clock.now = new Date('2024-05-02T00:00:30Z');
      await scheduler.runReset('2024-05-01');

      h.clock.now = new Date('2024-05-02T08:00:00Z');
      const outcome = await h.controller.onNewEntry(
        journalMessage('m3', words(100), { createdAt: new Date('2024-05-02T08:00:00Z') }),
      );

      expect(outcome).toEqual({
        status: 'recorded',
        date: '2024-05-02',
        wordCount: 100,
        totalWords: 100,
        remaining: 400,
        access: 'locked',
      });
      expect(h.store.statFor('user-1', '2024-05-01')).toMatchObject({ totalWords: 550 });
    });

    it('leaves failed revokes pending for reconciliation', async () => {
      await unlockTwoWriters();
      h.clock.now = new Date('2024-05-02T00:00:30Z');
      h.access.failuresRemaining = 3;

      const summary = await scheduler.runReset('2024-05-01');

      expect(summary).toMatchObject({ revoked: 0, failed: 1 });
      expect(h.store.statFor('user-1', '2024-05-01')).toMatchObject({
        hasAccess: true,
        closed: true,
        accessPending: true,
      });

      const reconciled = await scheduler.reconcile();

      expect(reconciled).toEqual({ examined: 1, granted: 0, revoked: 1, cleared: 0, failed: 0 });
      expect(h.store.statFor('user-1', '2024-05-01')).toMatchObject({ hasAccess: false, accessPending: false });
    });

    it('runs the reset for the latest boundary on demand', async () => {
      await unlockTwoWriters();
      h.clock.now = new Date('2024-05-02T09:00:00Z');

      const summary = await scheduler.resetNow();

      expect(summary).toMatchObject({ boundaryDate: '2024-05-01', revoked: 1 });
    });
  });

  describe('catchUp', () => {
    it('runs one reset for the latest missed boundary', async () => {
      await unlockTwoWriters();
      h.clock.now = new Date('2024-05-03T10:00:00Z');

      const summary = await scheduler.catchUp();

      expect(summary).toEqual({ boundaryDate: '2024-05-02', closed: 2, revoked: 1, failed: 0, skipped: 0 });
      expect(await scheduler.catchUp()).toBeNull();
    });

    it('does nothing when the latest boundary was already handled', async () => {
      await unlockTwoWriters();
      await h.store.recordReset(
        GUILD_ID,
        '2024-05-02',
        new Date('2024-05-03T00:00:00Z'),
        new Date('2024-05-03T00:00:01Z'),
      );
      h.clock.now = new Date('2024-05-03T10:00:00Z');

      expect(await scheduler.catchUp()).toBeNull();
      expect(h.access.count('revoke')).toBe(0);
    });
  });

  describe('initialize', () => {
    it('catches up, then schedules the reset and reconcile jobs in the configured zone', async () => {
      await scheduler.initialize();

      expect(schedule).toHaveBeenCalledTimes(2);
      expect(schedule).toHaveBeenNthCalledWith(1, '0 0 * * *', expect.any(Function), { scheduled: true, timezone: 'UTC' });
      expect(schedule).toHaveBeenNthCalledWith(2, '*/15 * * * *', expect.any(Function), { scheduled: true, timezone: 'UTC' });
      expect(await h.store.getResetState(GUILD_ID)).toMatchObject({ lastBoundaryDate: '2024-04-30' });
      expect(scheduler.getStatus()).toMatchObject({ running: true, resetCron: '0 0 * * *' });

      scheduler.shutdown();

      expect(stop).toHaveBeenCalledTimes(2);
      expect(scheduler.getStatus().running).toBe(false);
    });

    it('alerts operators when a scheduled reset fails', async () => {
      await scheduler.initialize();
      const [, task] = schedule.mock.calls[0];
      h.store.failNext('closeDates', new Error('disk full'));

      await task();

      expect(h.alerts.errors).toHaveLength(1);
      expect(h.alerts.errors[0].error.message).toBe('disk full');
      expect(h.alerts.errors[0].context).toEqual({ context: 'scheduledDailyReset', boundaryDate: '2024-04-30' });
    });
  });

  it('reports the next reset instant', () => {
    expect(scheduler.getStatus()).toEqual({
      timezone: 'UTC',
      resetCron: '0 0 * * *',
      reconcileCron: '*/15 * * * *',
      running: false,
      lastReset: null,
      nextResetAt: new Date('2024-05-02T00:00:00Z'),
    });
  });
});
