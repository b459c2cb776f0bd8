// MARK: - Journal Entry Model
// Immutable record of one authored journal message

import mongoose, { Schema, Document, Types } from 'mongoose';

export interface IJournalEntry extends Document {
  user: Types.ObjectId;
  guildId: string;
  discordId: string;
  displayName: string; // As authored; not relabeled on rename
  content: string;
  wordCount: number;
  messageId: string;
  channelId: string;
  journalDate: string; // YYYY-MM-DD in the configured zone
  createdAt: Date;
}

const JournalEntrySchema = new Schema<IJournalEntry>({
  user: {
    type: Schema.Types.ObjectId,
    ref: 'JournalUser',
    required: true,
    index: true,
  },
  guildId: {
    type: String,
    required: true,
  },
  discordId: {
    type: String,
    required: true,
    index: true,
  },
  displayName: {
    type: String,
    required: true,
  },
  content: {
    type: String,
    required: true,
  },
  wordCount: {
    type: Number,
    required: true,
    min: 0,
  },
  messageId: {
    type: String,
    required: true,
    unique: true,
  },
  channelId: {
    type: String,
    required: true,
  },
  journalDate: {
    type: String,
    required: true,
  },
  createdAt: {
    type: Date,
    required: true,
    index: true,
  },
}, { collection: 'journal_entries' });

JournalEntrySchema.index({ guildId: 1, journalDate: 1, createdAt: 1 });

export const JournalEntry = mongoose.model<IJournalEntry>('JournalEntry', JournalEntrySchema);
