/**
 * Server entrypoint
 *
 * Run: npx tsx backend/src/server.ts
 */

import 'dotenv/config';
import { buildApp } from './app.js';
import { env } from './config/env.js';
import { connectMongo, disconnectMongo } from './db/mongoose.js';
import { ensureIndexes } from './db/indexes.js';

async function main(): Promise<void> {
  console.log(`[Server] Starting (store: ${env.STORE_DRIVER}, env: ${env.NODE_ENV})`);

  if (env.STORE_DRIVER === 'mongo') {
    console.log('[Server] Connecting to MongoDB...');
    await connectMongo();
    await ensureIndexes();
  }

  const app = buildApp();

  const shutdown = async (signal: string) => {
    console.log(`[Server] Received ${signal}, shutting down...`);
    await app.close();
    await disconnectMongo();
    console.log('[Server] Shutdown complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch(err => {
      console.error('[Server] Shutdown failed:', err);
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  await app.listen({ port: env.PORT, host: env.HOST });
  console.log(`[Server] ✅ Listening on ${env.HOST}:${env.PORT}`);
}

main().catch(err => {
  console.error('[Server] Fatal startup error:', err);
  process.exit(1);
});
