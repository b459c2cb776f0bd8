// MARK: - Journal User Model
// Discord members taking part in the journaling game

import mongoose, { Schema, Document } from 'mongoose';

export interface IJournalUser extends Document {
  guildId: string;
  discordId: string;
  displayName: string;
  journalChannelId: string | null;
  createdAt: Date;
  updatedAt: Date;
}

const JournalUserSchema = new Schema<IJournalUser>({
  guildId: {
    type: String,
    required: true,
  },
  discordId: {
    type: String,
    required: true,
  },
  displayName: {
    type: String,
    required: true,
  },
  journalChannelId: {
    type: String,
    default: null,
  },
  createdAt: {
    type: Date,
    default: Date.now,
  },
  updatedAt: {
    type: Date,
    default: Date.now,
  },
}, { collection: 'journal_users' });

JournalUserSchema.index({ guildId: 1, discordId: 1 }, { unique: true });
JournalUserSchema.index({ guildId: 1, journalChannelId: 1 });

JournalUserSchema.pre('save', function(next) {
  this.updatedAt = new Date();
  next();
});

export const JournalUser = mongoose.model<IJournalUser>('JournalUser', JournalUserSchema);
