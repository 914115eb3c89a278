import { fastify as createServer } from 'fastify';
import { pino } from 'pino';
import type { Logger } from 'pino';

import { EngineStore } from './application/index.js';
import type { ClassificationEngine } from './application/index.js';
import {
  redisPlugin,
  dbPlugin,
  enginePlugin,
  InMemoryNameCache,
  loadNames,
  loadEngine,
  applyConfiguredLevel,
  startNameSubscriber,
  DEFAULT_REDIS_URL,
} from './infrastructure/index.js';
import { connectorRoutes, opsRoutes } from './interfaces/http/index.js';

/**
 * Bootstrap Fastify server.
 *
 * Order:
 * 1) Infrastructure plugins
 * 2) Name cache + classification engine
 * 3) HTTP routes
 * 4) Register shutdown hooks
 * 5) listen()
 * 6) Name change subscriber
 */
async function main(log: Logger): Promise<void> {

  const fastify = createServer({ loggerInstance: log });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(redisPlugin);
  await fastify.register(dbPlugin);

  // --------------------------------------------------
  // Names + engine
  // --------------------------------------------------

  const names = new InMemoryNameCache();
  await loadNames(fastify.db, names, log);

  const build = (): ClassificationEngine => {
    const engine = loadEngine(names, log);
    applyConfiguredLevel(log, engine);
    return engine;
  };

  await fastify.register(enginePlugin, {
    engines: new EngineStore(build()),
    reload: build,
  });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(connectorRoutes);
  await fastify.register(opsRoutes);

  // --------------------------------------------------
  // Shutdown
  // --------------------------------------------------

  const ac = new AbortController();
  let cleanupSubscriber: null | (() => Promise<void>) = null;

  /**
   * IMPORTANT:
   * onClose MUST be registered BEFORE listen()
   */
  fastify.addHook('onClose', async () => {
    ac.abort();
    if (cleanupSubscriber) {
      await cleanupSubscriber();
    }
  });

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  const host = process.env['HOST'] ?? '0.0.0.0';
  const port = Number(process.env['PORT'] ?? 3000);

  await fastify.listen({ host, port });

  // --------------------------------------------------
  // Name change subscriber (after listen)
  // --------------------------------------------------

  const redisUrl = process.env['REDIS_URL'] ?? DEFAULT_REDIS_URL;

  cleanupSubscriber = await startNameSubscriber(redisUrl, fastify.db, log, names, ac.signal);

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      log.info({ signal }, 'Shutting down server...');
      fastify.close().then(
        () => process.exit(0),
        (err: unknown) => {
          log.error({ err }, 'Error during shutdown');
          process.exit(1);
        },
      );
    });
  }
}

const log = pino({ level: process.env['LOG_LEVEL'] ?? 'info' });

main(log).catch((err: unknown) => {
  log.fatal({ err }, 'Fatal: failed to start server');
  process.exit(1);
});
