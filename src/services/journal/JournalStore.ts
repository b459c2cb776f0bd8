// MARK: - Journal Store Contract
// Persistence seam for users, entries, daily stats and reset bookkeeping

import type { AccessAction } from '../../errors';

export interface JournalUserRecord {
  id: string;
  guildId: string;
  discordId: string;
  displayName: string;
  journalChannelId: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface JournalEntryRecord {
  id: string;
  userId: string;
  guildId: string;
  discordId: string;
  displayName: string;
  content: string;
  wordCount: number;
  messageId: string;
  channelId: string;
  journalDate: string;
  createdAt: Date;
}

export interface AccessTransition {
  action: AccessAction;
  claimedAt: Date;
}

export interface DailyStatRecord {
  id: string;
  userId: string;
  guildId: string;
  discordId: string;
  date: string;
  totalWords: number;
  hasAccess: boolean;
  /** Set once the reset for this date has run; no grant may land afterwards */
  closed: boolean;
  accessPending: boolean;
  transition: AccessTransition | null;
  lastUpdated: Date;
}

export interface ResetStateRecord {
  guildId: string;
  lastBoundaryDate: string;
  lastBoundaryAt: Date;
  lastRunAt: Date;
}

export interface UpsertUserInput {
  guildId: string;
  discordId: string;
  displayName: string;
}

export interface NewEntryInput {
  user: JournalUserRecord;
  displayName: string;
  content: string;
  wordCount: number;
  messageId: string;
  channelId: string;
  journalDate: string;
  createdAt: Date;
}

export interface CountedIncrement {
  user: JournalUserRecord;
  date: string;
  messageId: string;
  wordCount: number;
}

export interface JournalStore {
  /** Creates the user or refreshes the display name (last seen wins) */
  upsertUser(input: UpsertUserInput): Promise<JournalUserRecord>;
  getUser(guildId: string, discordId: string): Promise<JournalUserRecord | null>;
  /**
   * Returns false when onlyIfUnset was requested and a channel is already stored
   */
  setJournalChannel(
    guildId: string,
    discordId: string,
    channelId: string | null,
    options?: { onlyIfUnset?: boolean },
  ): Promise<boolean>;

  /** Throws DuplicateMessageError when messageId was already stored */
  insertEntry(input: NewEntryInput): Promise<JournalEntryRecord>;
  listEntriesForDate(guildId: string, date: string): Promise<JournalEntryRecord[]>;

  /**
   * Adds wordCount to the (user, date) total at most once per messageId,
   * creating the row when missing. Returns the row after the write.
   */
  incrementDailyTotal(input: CountedIncrement): Promise<DailyStatRecord>;
  getDailyStat(userId: string, date: string): Promise<DailyStatRecord | null>;
  findDailyStat(guildId: string, discordId: string, date: string): Promise<DailyStatRecord | null>;

  /**
   * Claims the right to perform an external transition. Succeeds only when
   * no other claim is in flight and hasAccess still equals the expected value.
   */
  claimTransition(statId: string, action: AccessAction, expectedAccess: boolean, claimedAt: Date): Promise<boolean>;
  /**
   * Writes the confirmed flag and releases the claim. A grant is refused
   * once the row is closed; the return value tells whether the write landed.
   */
  completeTransition(statId: string, action: AccessAction, claimedAt: Date): Promise<boolean>;
  /** Releases the claim and flags the row for reconciliation */
  failTransition(statId: string, claimedAt: Date): Promise<void>;
  /** Drops a claim left behind by a crashed worker */
  releaseStaleClaim(statId: string, claimedAt: Date): Promise<boolean>;
  clearPending(statId: string): Promise<void>;

  /** Marks every row with date <= boundaryDate as closed; returns rows touched */
  closeDates(guildId: string, boundaryDate: string): Promise<number>;
  listStatsWithAccess(guildId: string): Promise<DailyStatRecord[]>;
  listStatsNeedingReconcile(guildId: string, staleBefore: Date): Promise<DailyStatRecord[]>;
  countPending(guildId: string): Promise<number>;

  getResetState(guildId: string): Promise<ResetStateRecord | null>;
  recordReset(guildId: string, boundaryDate: string, boundaryAt: Date, ranAt: Date): Promise<void>;
}
