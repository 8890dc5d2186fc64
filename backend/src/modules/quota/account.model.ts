/**
 * USER ACCOUNT MONGO MODEL
 *
 * UNLIMITED is stored as null in dailyLimit / dailyRemaining.
 */

import mongoose, { Schema } from 'mongoose';
import { TIERS } from './quota.types.js';

export interface UserAccountDoc {
  userId: string;
  email?: string;
  tier: string;
  dailyLimit: number | null;
  dailyRemaining: number | null;
  lastResetDate: string;
  totalAnalyses: number;
  reserved: number;
  active: boolean;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

const UserAccountSchema = new Schema<UserAccountDoc>(
  {
    userId: { type: String, required: true, unique: true, index: true },
    email: { type: String },
    tier: { type: String, enum: [...TIERS], required: true, index: true },

    dailyLimit: { type: Number, default: null }, // null = unlimited
    dailyRemaining: { type: Number, default: null },
    lastResetDate: { type: String, required: true },

    totalAnalyses: { type: Number, default: 0 },
    reserved: { type: Number, default: 0 },
    active: { type: Boolean, default: true, index: true },

    version: { type: Number, default: 0 },
    createdAt: { type: Date, required: true },
    updatedAt: { type: Date, required: true },
  },
  { collection: 'user_accounts', versionKey: false }
);

export const UserAccountModel = mongoose.model<UserAccountDoc>('UserAccount', UserAccountSchema);
