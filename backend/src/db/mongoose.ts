/**
 * MongoDB connection (mongoose)
 */

import mongoose from 'mongoose';
import { env } from '../config/env.js';

export { mongoose };

export async function connectMongo(url: string = env.MONGO_URL, dbName: string = env.DB_NAME): Promise<void> {
  if (mongoose.connection.readyState === 1) return;

  await mongoose.connect(url, { dbName });
  console.log(`[DB] Connected to MongoDB (${dbName})`);
}

export async function disconnectMongo(): Promise<void> {
  if (mongoose.connection.readyState === 0) return;

  await mongoose.disconnect();
  console.log('[DB] Disconnected from MongoDB');
}

export function getMongoDb() {
  return mongoose.connection.db;
}
