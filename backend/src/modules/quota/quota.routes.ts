/**
 * QUOTA ROUTES
 *
 * Endpoints:
 * - POST /api/users                              Register a user ({ userId?, email?, tier? })
 * - GET  /api/users/:userId                      Account + quota view
 * - POST /api/admin/users/:userId/tier           Change tier ({ tier })
 * - POST /api/admin/users/:userId/activate       Re-enable account
 * - POST /api/admin/users/:userId/deactivate     Disable account
 * - GET  /api/admin/stats                        Counts by tier and status
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { QuotaManager } from './quota.manager.js';
import { parseTier } from './tier.policy.js';
import type { UserAccount } from './quota.types.js';

export function serializeAccount(account: UserAccount) {
  return {
    userId: account.userId,
    email: account.email ?? null,
    tier: account.tier,
    dailyLimit: account.dailyLimit,
    dailyRemaining: account.dailyRemaining,
    lastResetDate: account.lastResetDate,
    totalAnalyses: account.totalAnalyses,
    active: account.active,
    createdAt: new Date(account.createdAt).toISOString(),
    updatedAt: new Date(account.updatedAt).toISOString(),
  };
}

export async function registerQuotaRoutes(app: FastifyInstance, quota: QuotaManager): Promise<void> {

  app.post('/api/users', async (req: FastifyRequest, reply: FastifyReply) => {
    const body = (req.body ?? {}) as { userId?: unknown; email?: unknown; tier?: unknown };

    if (body.userId !== undefined && (typeof body.userId !== 'string' || body.userId.trim() === '')) {
      return reply.status(400).send({
        ok: false,
        error: 'INVALID_REQUEST',
        message: 'userId must be a non-empty string',
      });
    }

    const account = await quota.registerUser({
      userId: typeof body.userId === 'string' ? body.userId.trim() : undefined,
      email: typeof body.email === 'string' ? body.email : undefined,
      tier: body.tier === undefined ? undefined : parseTier(body.tier),
    });

    return reply.status(201).send({ ok: true, data: serializeAccount(account) });
  });

  app.get('/api/users/:userId', async (req: FastifyRequest, reply: FastifyReply) => {
    const { userId } = req.params as { userId: string };
    const account = await quota.getAccount(userId);
    return reply.send({ ok: true, data: serializeAccount(account) });
  });

  app.post('/api/admin/users/:userId/tier', async (req: FastifyRequest, reply: FastifyReply) => {
    const { userId } = req.params as { userId: string };
    const body = (req.body ?? {}) as { tier?: unknown };
    const account = await quota.setTier(userId, parseTier(body.tier));
    return reply.send({ ok: true, data: serializeAccount(account) });
  });

  app.post('/api/admin/users/:userId/activate', async (req: FastifyRequest, reply: FastifyReply) => {
    const { userId } = req.params as { userId: string };
    const account = await quota.activate(userId);
    return reply.send({ ok: true, data: serializeAccount(account) });
  });

  app.post('/api/admin/users/:userId/deactivate', async (req: FastifyRequest, reply: FastifyReply) => {
    const { userId } = req.params as { userId: string };
    const account = await quota.deactivate(userId);
    return reply.send({ ok: true, data: serializeAccount(account) });
  });

  app.get('/api/admin/stats', async (_req: FastifyRequest, reply: FastifyReply) => {
    return reply.send({ ok: true, data: await quota.getStats() });
  });
}
