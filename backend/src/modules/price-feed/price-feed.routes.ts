/**
 * PRICE FEED ROUTES
 *
 * Endpoints:
 * - GET  /api/prices                   Resolve all symbols (?class=gold|forex)
 * - GET  /api/prices/:symbol           Resolve one symbol (XAUUSD, EUR-USD, GOLD ...)
 * - GET  /api/prices/providers/health  Provider health + cache stats
 * - POST /api/prices/providers/probe   Call every provider for a symbol, bypassing cache
 *
 * AppError subclasses (UNKNOWN_SYMBOL, PRICE_UNAVAILABLE) go to the global handler.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { PriceFeedAggregator } from './price-feed.aggregator.js';
import type { ResolvedPrice, SymbolClass } from './price-feed.types.js';

function toClass(raw: string | undefined): SymbolClass | undefined | null {
  if (raw === undefined || raw === '') return undefined;
  return raw === 'gold' || raw === 'forex' ? raw : null;
}

export function serializePrice(resolved: ResolvedPrice) {
  return {
    symbol: resolved.sample.symbol,
    price: resolved.sample.price,
    currency: resolved.sample.currency,
    source: resolved.sample.source,
    timestamp: new Date(resolved.sample.timestamp).toISOString(),
    fetchedAt: new Date(resolved.fetchedAt).toISOString(),
    stale: resolved.stale,
    cached: resolved.cached,
  };
}

export async function registerPriceFeedRoutes(app: FastifyInstance, aggregator: PriceFeedAggregator): Promise<void> {

  app.get('/api/prices', async (req: FastifyRequest, reply: FastifyReply) => {
    const { class: rawClass } = req.query as { class?: string };
    const symbolClass = toClass(rawClass);

    if (symbolClass === null) {
      return reply.status(400).send({
        ok: false,
        error: 'INVALID_CLASS',
        message: 'class must be gold or forex',
      });
    }

    const results = await aggregator.resolveAll(symbolClass);
    return reply.send({
      ok: true,
      data: results.map(r => (r.ok ? { ok: true, ...serializePrice(r.price) } : r)),
    });
  });

  app.get('/api/prices/providers/health', async (_req: FastifyRequest, reply: FastifyReply) => {
    return reply.send({
      ok: true,
      data: {
        providers: aggregator.providerHealth(),
        cache: aggregator.cacheStats(),
      },
    });
  });

  app.post('/api/prices/providers/probe', async (req: FastifyRequest, reply: FastifyReply) => {
    const body = (req.body ?? {}) as { symbol?: string };

    if (!body.symbol) {
      return reply.status(400).send({
        ok: false,
        error: 'INVALID_REQUEST',
        message: 'symbol is required',
      });
    }

    const results = await aggregator.probe(body.symbol);
    return reply.send({ ok: true, data: results });
  });

  app.get('/api/prices/:symbol', async (req: FastifyRequest, reply: FastifyReply) => {
    const { symbol } = req.params as { symbol: string };
    const resolved = await aggregator.resolve(symbol);
    return reply.send({ ok: true, data: serializePrice(resolved) });
  });
}
