/**
 * Database Indexes
 * Run on startup when STORE_DRIVER=mongo
 */

import { mongoose } from './mongoose.js';

export async function ensureIndexes(): Promise<void> {
  const db = mongoose.connection.db;
  if (!db) {
    console.log('[DB] No database connection, skipping indexes');
    return;
  }

  await db.collection('user_accounts').createIndex({ userId: 1 }, { unique: true });
  await db.collection('user_accounts').createIndex({ tier: 1, active: 1 });
  console.log('[DB] user_accounts indexes created');

  await db.collection('analysis_logs').createIndex({ timestamp: -1 });
  await db.collection('analysis_logs').createIndex({ userId: 1, timestamp: -1 });
  console.log('[DB] analysis_logs indexes created');

  console.log('[DB] Indexes ensured');
}
