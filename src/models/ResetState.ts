// MARK: - Reset State Model
// Last daily boundary processed per guild, used for missed-run catch-up

import mongoose, { Schema, Document } from 'mongoose';

export interface IResetState extends Document {
  guildId: string;
  lastBoundaryDate: string;
  lastBoundaryAt: Date;
  lastRunAt: Date;
}

const ResetStateSchema = new Schema<IResetState>({
  guildId: {
    type: String,
    required: true,
    unique: true,
  },
  lastBoundaryDate: {
    type: String,
    required: true,
  },
  lastBoundaryAt: {
    type: Date,
    required: true,
  },
  lastRunAt: {
    type: Date,
    required: true,
  },
}, { collection: 'reset_states' });

export const ResetState = mongoose.model<IResetState>('ResetState', ResetStateSchema);
