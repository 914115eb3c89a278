import { Redis } from 'ioredis';
import { pino } from 'pino';
import { EngineStore } from './application/index.js';
import type { ClassificationEngine } from './application/index.js';
import { createDbClient, DEFAULT_DATABASE_URL } from './infrastructure/db/index.js';
import { DEFAULT_REDIS_URL } from './infrastructure/redis/index.js';
import { InMemoryNameCache, loadNames } from './infrastructure/names/index.js';
import { startConsumer, startNameSubscriber } from './infrastructure/worker/index.js';
import { applyConfiguredLevel, loadEngine } from './infrastructure/engine-factory.js';

/**
 * Standalone worker process that consumes broker events from Redis Streams,
 * classifies them and hands accepted alerts to delivery.
 *
 * Runs independently of the Fastify HTTP server — can be scaled
 * horizontally by launching multiple instances with different WORKER_ID values.
 *
 * SIGHUP re-reads the connector parameter file and swaps the engine.
 */
const log = pino({ level: process.env['LOG_LEVEL'] ?? 'info' });

const redisUrl = process.env['REDIS_URL'] ?? DEFAULT_REDIS_URL;
const databaseUrl = process.env['DATABASE_URL'] ?? DEFAULT_DATABASE_URL;

const redis = new Redis(redisUrl, {
  maxRetriesPerRequest: null,
  enableReadyCheck: true,
  lazyConnect: true,
});

const { sql, db } = createDbClient(databaseUrl);

// Abort controller for graceful shutdown
const ac = new AbortController();

let cleanupSubscriber: null | (() => Promise<void>) = null;

async function main(): Promise<void> {
  await redis.connect();
  log.info('Redis connected');

  // Name tables are owned by the monitoring configuration; create them
  // empty for local dev so the first load does not fail.
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS hosts (
      host_id  INTEGER PRIMARY KEY,
      name     VARCHAR(255) NOT NULL
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS services (
      host_id      INTEGER NOT NULL,
      service_id   INTEGER NOT NULL,
      description  VARCHAR(255) NOT NULL,
      PRIMARY KEY (host_id, service_id)
    )
  `);

  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_services_service_id ON services (service_id)`);

  log.info('Database ready (hosts + services tables)');

  const names = new InMemoryNameCache();
  await loadNames(db, names, log);

  const build = (): ClassificationEngine => {
    const engine = loadEngine(names, log);
    applyConfiguredLevel(log, engine);
    return engine;
  };

  const engines = new EngineStore(build());

  process.on('SIGHUP', () => {
    log.info('SIGHUP received, reloading connector configuration');
    engines.set(build());
  });

  cleanupSubscriber = await startNameSubscriber(redisUrl, db, log, names, ac.signal);

  await startConsumer(redis, log, ac.signal, engines);
}

// Graceful shutdown on SIGINT / SIGTERM
function shutdown(): void {
  log.info('Shutting down worker...');
  ac.abort();

  // Give in-flight operations a moment, then force exit
  setTimeout(() => {
    void closeConnections().then(() => process.exit(0));
  }, 3000);
}

async function closeConnections(): Promise<void> {
  if (cleanupSubscriber) {
    await cleanupSubscriber();
  }
  await redis.quit().catch((err: unknown) => {
    log.warn({ err }, 'Failed to close Redis connection');
  });
  await sql.end().catch((err: unknown) => {
    log.warn({ err }, 'Failed to close database connection');
  });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main().catch((err: unknown) => {
  log.fatal({ err }, 'Worker crashed');
  process.exit(1);
});
