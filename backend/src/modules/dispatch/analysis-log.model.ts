/**
 * ANALYSIS LOG MONGO MODEL
 *
 * One document per settled reservation.
 */

import mongoose, { Schema } from 'mongoose';

export interface AnalysisLogDoc {
  reservationId: string;
  userId: string;
  symbol: string;
  outcome: string; // COMMITTED|RELEASED|EXPIRED|CANCELLED|PRICE_UNAVAILABLE
  refunded: boolean;
  price?: number;
  source?: string;
  reservedAt: Date;
  timestamp: Date;
}

const AnalysisLogSchema = new Schema<AnalysisLogDoc>(
  {
    reservationId: { type: String, required: true, unique: true },
    userId: { type: String, required: true, index: true },
    symbol: { type: String, required: true },
    outcome: { type: String, required: true, index: true },
    refunded: { type: Boolean, default: false },
    price: { type: Number },
    source: { type: String },
    reservedAt: { type: Date, required: true },
    timestamp: { type: Date, required: true, index: true },
  },
  { collection: 'analysis_logs', versionKey: false }
);

export const AnalysisLogModel = mongoose.model<AnalysisLogDoc>('AnalysisLog', AnalysisLogSchema);
