import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { env as defaultEnv, type Env } from './config/env.js';
import { AppError } from './common/errors.js';
import type { Clock, Logger } from './modules/shared/runtime/host.deps.js';
import { createPriceFeed, registerPriceFeedRoutes, type PriceFeedAggregator } from './modules/price-feed/index.js';
import { createAccountStore, createQuotaManager, registerQuotaRoutes, type QuotaManager } from './modules/quota/index.js';
import {
  createAnalysisLogRepository,
  createDispatchGate,
  registerDispatchRoutes,
  type AnalysisDispatchGate,
} from './modules/dispatch/index.js';

export interface AppServices {
  priceFeed: PriceFeedAggregator;
  quota: QuotaManager;
  gate: AnalysisDispatchGate;
}

export interface BuildAppOptions {
  env?: Env;
  /** Prebuilt services; created from env when omitted */
  services?: AppServices;
}

/**
 * Wire the core from env. Store driver decides Mongo vs in-process persistence.
 */
export function createServices(env: Env, logger: Logger, clock?: Clock): AppServices {
  const priceFeed = createPriceFeed(env, logger, clock);
  const quota = createQuotaManager(env, createAccountStore(env), logger, clock);
  const gate = createDispatchGate(env, quota, priceFeed, createAnalysisLogRepository(env), logger, clock);
  return { priceFeed, quota, gate };
}

/**
 * Build Fastify Application
 */
export function buildApp(options: BuildAppOptions = {}): FastifyInstance {
  const env = options.env ?? defaultEnv;

  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL,
    },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(','),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) app.log.error(err);
      else app.log.info({ code: err.code, message: err.message }, 'Request rejected');

      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    app.log.error(err);

    // Fastify validation errors
    if (err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    // Unknown errors
    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: statusCode >= 500 ? 'INTERNAL_ERROR' : (err.code ?? 'BAD_REQUEST'),
      message: env.NODE_ENV === 'production' && statusCode >= 500 ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  const services = options.services ?? createServices(env, app.log);

  app.get('/api/health', async () => ({
    ok: true,
    storeDriver: env.STORE_DRIVER,
    timestamp: new Date().toISOString(),
  }));

  app.register(async (fastify) => {
    await registerPriceFeedRoutes(fastify, services.priceFeed);
    await registerQuotaRoutes(fastify, services.quota);
    await registerDispatchRoutes(fastify, services.gate);
  });

  return app;
}
