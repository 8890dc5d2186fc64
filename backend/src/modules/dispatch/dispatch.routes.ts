/**
 * ANALYSIS DISPATCH ROUTES
 *
 * Endpoints:
 * - POST /api/analysis/request                   { userId, symbol } → reservation + price, or rejection
 * - POST /api/analysis/:reservationId/commit     LLM produced the analysis
 * - POST /api/analysis/:reservationId/release    LLM failed, refund quota
 * - GET  /api/admin/analysis/logs                Recent settlements (?userId, ?limit)
 *
 * Rejections map to 403 (ACCOUNT_DISABLED), 429 (QUOTA_EXCEEDED),
 * 503 (PRICE_UNAVAILABLE), 409 (CANCELLED).
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { serializePrice } from '../price-feed/price-feed.routes.js';
import type { AnalysisDispatchGate } from './dispatch.gate.js';
import type { RejectionReason, SettleAction } from './dispatch.types.js';

const REJECTION_STATUS: Record<RejectionReason['code'], number> = {
  ACCOUNT_DISABLED: 403,
  QUOTA_EXCEEDED: 429,
  PRICE_UNAVAILABLE: 503,
  CANCELLED: 409,
};

export async function registerDispatchRoutes(app: FastifyInstance, gate: AnalysisDispatchGate): Promise<void> {

  app.post('/api/analysis/request', async (req: FastifyRequest, reply: FastifyReply) => {
    const body = (req.body ?? {}) as { userId?: unknown; symbol?: unknown };

    if (typeof body.userId !== 'string' || typeof body.symbol !== 'string' || !body.userId || !body.symbol) {
      return reply.status(400).send({
        ok: false,
        error: 'INVALID_REQUEST',
        message: 'userId and symbol are required',
      });
    }

    // Client gone before the response was written → cancel
    const ac = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableFinished) ac.abort();
    };
    reply.raw.on('close', onClose);

    try {
      const decision = await gate.requestAnalysis(body.userId, body.symbol, { signal: ac.signal });

      if (decision.status === 'REJECTED') {
        const { code, message, ...details } = decision.reason;
        return reply.status(REJECTION_STATUS[code]).send({ ok: false, error: code, message, ...details });
      }

      return reply.send({
        ok: true,
        data: {
          reservationId: decision.reservationId,
          userId: decision.userId,
          price: serializePrice(decision.price),
          remaining: decision.remaining,
          expiresAt: new Date(decision.expiresAt).toISOString(),
        },
      });
    } finally {
      reply.raw.off('close', onClose);
    }
  });

  const settleHandler = (action: SettleAction) =>
    async (req: FastifyRequest, reply: FastifyReply) => {
      const { reservationId } = req.params as { reservationId: string };
      const result = await gate.settle(reservationId, action);
      return reply.send({
        ok: true,
        data: {
          reservationId: result.reservationId,
          outcome: result.outcome,
          refunded: result.refunded,
          repeated: result.repeated,
          dailyRemaining: result.account?.dailyRemaining ?? null,
        },
      });
    };

  app.post('/api/analysis/:reservationId/commit', settleHandler('commit'));
  app.post('/api/analysis/:reservationId/release', settleHandler('release'));

  app.get('/api/admin/analysis/logs', async (req: FastifyRequest, reply: FastifyReply) => {
    const { userId, limit } = req.query as { userId?: string; limit?: string };
    const n = Math.min(Math.max(parseInt(limit ?? '50', 10) || 50, 1), 500);
    return reply.send({ ok: true, data: await gate.recentAttempts(n, userId) });
  });
}
