// MARK: - Daily Stat Model
// One row per (user, journal date): running word total and shared channel access

import mongoose, { Schema, Document, Types } from 'mongoose';

export interface IDailyStat extends Document {
  user: Types.ObjectId;
  guildId: string;
  discordId: string;
  date: string;
  totalWords: number;
  hasAccess: boolean;
  closed: boolean;
  accessPending: boolean;
  transition: {
    action: 'grant' | 'revoke';
    claimedAt: Date;
  } | null;
  countedMessageIds: string[];
  lastUpdated: Date;
}

const DailyStatSchema = new Schema<IDailyStat>({
  user: {
    type: Schema.Types.ObjectId,
    ref: 'JournalUser',
    required: true,
  },
  guildId: {
    type: String,
    required: true,
  },
  discordId: {
    type: String,
    required: true,
  },
  date: {
    type: String,
    required: true,
  },
  totalWords: {
    type: Number,
    default: 0,
    min: 0,
  },
  hasAccess: {
    type: Boolean,
    default: false,
  },
  closed: {
    type: Boolean,
    default: false,
  },
  accessPending: {
    type: Boolean,
    default: false,
  },
  transition: {
    type: new Schema({
      action: {
        type: String,
        enum: ['grant', 'revoke'],
        required: true,
      },
      claimedAt: {
        type: Date,
        required: true,
      },
    }, { _id: false }),
    default: null,
  },
  countedMessageIds: [{
    type: String,
  }],
  lastUpdated: {
    type: Date,
    default: Date.now,
  },
}, { collection: 'daily_stats' });

DailyStatSchema.index({ user: 1, date: 1 }, { unique: true });
DailyStatSchema.index({ guildId: 1, hasAccess: 1 });
DailyStatSchema.index({ guildId: 1, accessPending: 1 });
DailyStatSchema.index({ guildId: 1, date: 1 });

export const DailyStat = mongoose.model<IDailyStat>('DailyStat', DailyStatSchema);
