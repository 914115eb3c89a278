import fp from 'fastify-plugin';
import { z } from 'zod';
import { sql } from 'drizzle-orm';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { enqueueBrokerEvent, publishNamesChanged } from '../../infrastructure/index.js';

const brokerEventSchema = z.object({
  category: z.number().int(),
  element: z.number().int(),
}).passthrough();

const namesReloadSchema = z.object({
  reason: z.string().min(1).max(255).default('manual'),
}).default({});

/**
 * Operational routes backed by Redis and Postgres.
 *
 * POST /api/v1/connector/events       — enqueue a broker event for the worker
 * POST /api/v1/connector/names/reload — ask every process to reload names
 * GET  /api/v1/connector/health       — Redis and Postgres connectivity
 */
async function opsRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * Pre-filters, then enqueues onto the broker stream. Events the
   * pre-filter drops are not enqueued at all.
   */
  fastify.post(
    '/api/v1/connector/events',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = brokerEventSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const { category, element } = parsed.data;
      if (!fastify.connector.engines.get().filter(category, element)) {
        return reply.status(200).send({ status: 'filtered' });
      }

      const entryId = await enqueueBrokerEvent(fastify.redis, category, element, parsed.data);
      return reply.status(202).send({ status: 'queued', entry_id: entryId });
    },
  );

  // ── POST /api/v1/connector/names/reload ──────────────────
  fastify.post(
    '/api/v1/connector/names/reload',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = namesReloadSchema.safeParse(request.body ?? undefined);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const published = await publishNamesChanged(fastify.redis, fastify.log, parsed.data.reason);
      if (!published) {
        return reply.status(503).send({ status: 'unavailable' });
      }
      return reply.status(202).send({ status: 'reload_requested' });
    },
  );

  /**
   * Health check — Redis via PING, Postgres via `select 1`.
   * Either one failing reports degraded with 503.
   */
  fastify.get(
    '/api/v1/connector/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      let redis: 'ok' | 'unreachable' = 'ok';
      let database: 'ok' | 'unreachable' = 'ok';

      try {
        await fastify.redis.ping();
      } catch (err: unknown) {
        fastify.log.error({ err }, 'Redis health check failed');
        redis = 'unreachable';
      }

      try {
        await fastify.db.execute(sql`select 1`);
      } catch (err: unknown) {
        fastify.log.error({ err }, 'Database health check failed');
        database = 'unreachable';
      }

      const healthy = redis === 'ok' && database === 'ok';
      return reply.status(healthy ? 200 : 503).send({
        status: healthy ? 'ok' : 'degraded',
        redis,
        database,
      });
    },
  );
}

export default fp(opsRoutes, {
  name: 'ops-routes',
  dependencies: ['redis', 'db', 'engine'],
  fastify: '5.x',
});
