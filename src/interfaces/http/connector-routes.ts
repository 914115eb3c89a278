import fp from 'fastify-plugin';
import { z } from 'zod';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { describeConfig } from '../../application/index.js';

const filterBodySchema = z.object({
  category: z.number().int(),
  element: z.number().int(),
});

/**
 * Classification engine routes.
 *
 * POST /api/v1/connector/filter — pre-filter check on (category, element)
 * POST /api/v1/connector/write  — classify one decoded broker event
 * GET  /api/v1/connector/config — effective configuration
 * POST /api/v1/connector/reload — rebuild the engine from the parameter file
 */
async function connectorRoutes(fastify: FastifyInstance): Promise<void> {

  // ── POST /api/v1/connector/filter ────────────────────────
  fastify.post(
    '/api/v1/connector/filter',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = filterBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const { category, element } = parsed.data;
      const accepted = fastify.connector.engines.get().filter(category, element);
      return reply.status(200).send({ accepted });
    },
  );

  /**
   * Runs the payload through decode, acceptance and mapping.
   * An undecodable payload is a client error; a rejected event is not.
   */
  fastify.post(
    '/api/v1/connector/write',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const result = fastify.connector.engines.get().ingest(request.body);

      switch (result.status) {
        case 'undecodable':
          return reply.status(400).send({ accepted: false, error: 'Undecodable event', issues: result.issues });
        case 'rejected':
          return reply.status(200).send({ accepted: false, failures: result.failures });
        case 'accepted':
          return reply.status(200).send({ accepted: true, alert: result.alert });
      }
    },
  );

  // ── GET /api/v1/connector/config ─────────────────────────
  fastify.get(
    '/api/v1/connector/config',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send(describeConfig(fastify.connector.engines.get().config));
    },
  );

  // ── POST /api/v1/connector/reload ────────────────────────
  fastify.post(
    '/api/v1/connector/reload',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const engine = fastify.connector.reload();
      return reply.status(200).send({ status: 'reloaded', config: describeConfig(engine.config) });
    },
  );
}

export default fp(connectorRoutes, {
  name: 'connector-routes',
  dependencies: ['engine'],
  fastify: '5.x',
});
