import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { createDbClient, DEFAULT_DATABASE_URL } from './client.js';
import type { Database } from './client.js';

/**
 * Fastify plugin that manages the Drizzle/postgres.js connection lifecycle.
 *
 * Decorates `fastify.db` for the name cache loader and the health route.
 * Closes the connection pool on server shutdown.
 */
async function dbPlugin(fastify: FastifyInstance): Promise<void> {
  const databaseUrl = process.env['DATABASE_URL'] ?? DEFAULT_DATABASE_URL;

  const { sql, db } = createDbClient(databaseUrl);

  fastify.decorate('db', db);

  fastify.addHook('onClose', async () => {
    await sql.end();
    fastify.log.info('Database disconnected');
  });
}

export default fp(dbPlugin, {
  name: 'db',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.db` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    db: Database;
  }
}
