// MARK: - Mongo Journal Store
// JournalStore backed by the mongoose models

import mongoose, { Types } from 'mongoose';
import { JournalUser, IJournalUser } from '../../models/JournalUser';
import { JournalEntry, IJournalEntry } from '../../models/JournalEntry';
import { DailyStat, IDailyStat } from '../../models/DailyStat';
import { ResetState, IResetState } from '../../models/ResetState';
import { DuplicateMessageError, StoreUnavailableError } from '../../errors';
import type { AccessAction } from '../../errors';
import type {
  CountedIncrement,
  DailyStatRecord,
  JournalEntryRecord,
  JournalStore,
  JournalUserRecord,
  NewEntryInput,
  ResetStateRecord,
  UpsertUserInput,
} from './JournalStore';
import { logger } from '../../utils/logger';

export function isDuplicateKeyError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 11000;
}

export function isConnectivityError(error: unknown): boolean {
  if (error instanceof mongoose.mongo.MongoNetworkError || error instanceof mongoose.mongo.MongoServerSelectionError) {
    return true;
  }

  // Operations queued while disconnected
  return error instanceof mongoose.Error && error.message.includes('buffering timed out');
}

function toUser(doc: IJournalUser): JournalUserRecord {
  return {
    id: String(doc._id),
    guildId: doc.guildId,
    discordId: doc.discordId,
    displayName: doc.displayName,
    journalChannelId: doc.journalChannelId ?? null,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

function toEntry(doc: IJournalEntry): JournalEntryRecord {
  return {
    id: String(doc._id),
    userId: doc.user.toString(),
    guildId: doc.guildId,
    discordId: doc.discordId,
    displayName: doc.displayName,
    content: doc.content,
    wordCount: doc.wordCount,
    messageId: doc.messageId,
    channelId: doc.channelId,
    journalDate: doc.journalDate,
    createdAt: doc.createdAt,
  };
}

function toStat(doc: IDailyStat): DailyStatRecord {
  return {
    id: String(doc._id),
    userId: doc.user.toString(),
    guildId: doc.guildId,
    discordId: doc.discordId,
    date: doc.date,
    totalWords: doc.totalWords,
    hasAccess: doc.hasAccess,
    closed: doc.closed,
    accessPending: doc.accessPending,
    transition: doc.transition
      ? { action: doc.transition.action, claimedAt: doc.transition.claimedAt }
      : null,
    lastUpdated: doc.lastUpdated,
  };
}

function toResetState(doc: IResetState): ResetStateRecord {
  return {
    guildId: doc.guildId,
    lastBoundaryDate: doc.lastBoundaryDate,
    lastBoundaryAt: doc.lastBoundaryAt,
    lastRunAt: doc.lastRunAt,
  };
}

export class MongoJournalStore implements JournalStore {
  async upsertUser(input: UpsertUserInput): Promise<JournalUserRecord> {
    return this.run('upsertUser', async () => {
      const now = new Date();
      const doc = await JournalUser.findOneAndUpdate(
        { guildId: input.guildId, discordId: input.discordId },
        {
          $set: { displayName: input.displayName, updatedAt: now },
          $setOnInsert: { journalChannelId: null, createdAt: now },
        },
        { upsert: true, new: true, setDefaultsOnInsert: false },
      );

      if (!doc) {
        throw new Error(`User upsert returned nothing for ${input.discordId}`);
      }

      return toUser(doc);
    });
  }

  async getUser(guildId: string, discordId: string): Promise<JournalUserRecord | null> {
    return this.run('getUser', async () => {
      const doc = await JournalUser.findOne({ guildId, discordId });
      return doc ? toUser(doc) : null;
    });
  }

  async setJournalChannel(
    guildId: string,
    discordId: string,
    channelId: string | null,
    options: { onlyIfUnset?: boolean } = {},
  ): Promise<boolean> {
    return this.run('setJournalChannel', async () => {
      const filter = options.onlyIfUnset
        ? { guildId, discordId, journalChannelId: null }
        : { guildId, discordId };

      const result = await JournalUser.updateOne(filter, {
        $set: { journalChannelId: channelId, updatedAt: new Date() },
      });

      return result.matchedCount > 0;
    });
  }

  async insertEntry(input: NewEntryInput): Promise<JournalEntryRecord> {
    return this.run('insertEntry', async () => {
      try {
        const doc = await JournalEntry.create({
          user: new Types.ObjectId(input.user.id),
          guildId: input.user.guildId,
          discordId: input.user.discordId,
          displayName: input.displayName,
          content: input.content,
          wordCount: input.wordCount,
          messageId: input.messageId,
          channelId: input.channelId,
          journalDate: input.journalDate,
          createdAt: input.createdAt,
        });

        return toEntry(doc);
      } catch (error) {
        if (isDuplicateKeyError(error)) {
          throw new DuplicateMessageError(input.messageId);
        }
        throw error;
      }
    });
  }

  async listEntriesForDate(guildId: string, date: string): Promise<JournalEntryRecord[]> {
    return this.run('listEntriesForDate', async () => {
      const docs = await JournalEntry.find({ guildId, journalDate: date }).sort({ createdAt: 1 });
      return docs.map(toEntry);
    });
  }

  async incrementDailyTotal(input: CountedIncrement): Promise<DailyStatRecord> {
    return this.run('incrementDailyTotal', async () => {
      const user = new Types.ObjectId(input.user.id);
      const filter = { user, date: input.date, countedMessageIds: { $ne: input.messageId } };
      const now = new Date();
      const update = {
        $inc: { totalWords: input.wordCount },
        $push: { countedMessageIds: input.messageId },
        $set: { lastUpdated: now },
      };

      try {
        const created = await DailyStat.findOneAndUpdate(
          filter,
          {
            ...update,
            $setOnInsert: {
              guildId: input.user.guildId,
              discordId: input.user.discordId,
              hasAccess: false,
              closed: false,
              accessPending: false,
              transition: null,
            },
          },
          { upsert: true, new: true, setDefaultsOnInsert: false },
        );

        if (created) {
          return toStat(created);
        }
      } catch (error) {
        // Either a concurrent first write created the row, or the row
        // already counts this message and the upsert tried to insert.
        if (!isDuplicateKeyError(error)) {
          throw error;
        }
      }

      const updated = await DailyStat.findOneAndUpdate(filter, update, { new: true });
      if (updated) {
        return toStat(updated);
      }

      const existing = await DailyStat.findOne({ user, date: input.date });
      if (!existing) {
        throw new Error(`Daily stat missing after increment for ${input.user.discordId} on ${input.date}`);
      }

      logger.debug('Message already counted toward daily total', {
        discordId: input.user.discordId,
        date: input.date,
        messageId: input.messageId,
      });
      return toStat(existing);
    });
  }

  async getDailyStat(userId: string, date: string): Promise<DailyStatRecord | null> {
    return this.run('getDailyStat', async () => {
      const doc = await DailyStat.findOne({ user: new Types.ObjectId(userId), date });
      return doc ? toStat(doc) : null;
    });
  }

  async findDailyStat(guildId: string, discordId: string, date: string): Promise<DailyStatRecord | null> {
    return this.run('findDailyStat', async () => {
      const doc = await DailyStat.findOne({ guildId, discordId, date });
      return doc ? toStat(doc) : null;
    });
  }

  async claimTransition(
    statId: string,
    action: AccessAction,
    expectedAccess: boolean,
    claimedAt: Date,
  ): Promise<boolean> {
    return this.run('claimTransition', async () => {
      const filter = action === 'grant'
        ? { _id: statId, hasAccess: expectedAccess, transition: null, closed: false }
        : { _id: statId, hasAccess: expectedAccess, transition: null };

      const result = await DailyStat.updateOne(filter, {
        $set: { transition: { action, claimedAt }, lastUpdated: claimedAt },
      });

      return result.modifiedCount === 1;
    });
  }

  async completeTransition(statId: string, action: AccessAction, claimedAt: Date): Promise<boolean> {
    return this.run('completeTransition', async () => {
      const claim = { _id: statId, 'transition.action': action, 'transition.claimedAt': claimedAt };
      const filter = action === 'grant' ? { ...claim, closed: false } : claim;

      const result = await DailyStat.updateOne(filter, {
        $set: {
          hasAccess: action === 'grant',
          transition: null,
          accessPending: false,
          lastUpdated: new Date(),
        },
      });

      if (result.modifiedCount === 1) {
        return true;
      }

      await DailyStat.updateOne(claim, { $set: { transition: null, lastUpdated: new Date() } });
      return false;
    });
  }

  async failTransition(statId: string, claimedAt: Date): Promise<void> {
    await this.run('failTransition', async () => {
      await DailyStat.updateOne(
        { _id: statId, 'transition.claimedAt': claimedAt },
        { $set: { transition: null, accessPending: true, lastUpdated: new Date() } },
      );
    });
  }

  async releaseStaleClaim(statId: string, claimedAt: Date): Promise<boolean> {
    return this.run('releaseStaleClaim', async () => {
      const result = await DailyStat.updateOne(
        { _id: statId, 'transition.claimedAt': claimedAt },
        { $set: { transition: null, accessPending: true, lastUpdated: new Date() } },
      );
      return result.modifiedCount === 1;
    });
  }

  async clearPending(statId: string): Promise<void> {
    await this.run('clearPending', async () => {
      await DailyStat.updateOne({ _id: statId }, { $set: { accessPending: false, lastUpdated: new Date() } });
    });
  }

  async closeDates(guildId: string, boundaryDate: string): Promise<number> {
    return this.run('closeDates', async () => {
      const result = await DailyStat.updateMany(
        { guildId, date: { $lte: boundaryDate }, closed: false },
        { $set: { closed: true, lastUpdated: new Date() } },
      );
      return result.modifiedCount;
    });
  }

  async listStatsWithAccess(guildId: string): Promise<DailyStatRecord[]> {
    return this.run('listStatsWithAccess', async () => {
      const docs = await DailyStat.find({ guildId, hasAccess: true });
      return docs.map(toStat);
    });
  }

  async listStatsNeedingReconcile(guildId: string, staleBefore: Date): Promise<DailyStatRecord[]> {
    return this.run('listStatsNeedingReconcile', async () => {
      const docs = await DailyStat.find({
        guildId,
        $or: [
          { accessPending: true },
          { 'transition.claimedAt': { $lt: staleBefore } },
        ],
      });
      return docs.map(toStat);
    });
  }

  async countPending(guildId: string): Promise<number> {
    return this.run('countPending', async () => {
      return await DailyStat.countDocuments({ guildId, accessPending: true });
    });
  }

  async getResetState(guildId: string): Promise<ResetStateRecord | null> {
    return this.run('getResetState', async () => {
      const doc = await ResetState.findOne({ guildId });
      return doc ? toResetState(doc) : null;
    });
  }

  async recordReset(guildId: string, boundaryDate: string, boundaryAt: Date, ranAt: Date): Promise<void> {
    await this.run('recordReset', async () => {
      await ResetState.findOneAndUpdate(
        { guildId },
        { $set: { lastBoundaryDate: boundaryDate, lastBoundaryAt: boundaryAt, lastRunAt: ranAt } },
        { upsert: true },
      );
    });
  }

  private async run<T>(operation: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      if (isConnectivityError(error)) {
        logger.warn('Journal store unreachable', {
          operation,
          error: error instanceof Error ? error.message : String(error),
        });
        throw new StoreUnavailableError(operation, error);
      }
      throw error;
    }
  }
}
