import type { Logger } from 'pino';
import type { Database } from '../db/index.js';
import { findAllHosts, findAllServices } from '../db/index.js';
import type { InMemoryNameCache } from './in-memory-name-cache.js';

/**
 * Reads every host and service name from Postgres and swaps them into
 * the cache. Errors propagate: at startup a failed load is fatal, on a
 * reload the caller keeps the previous snapshot.
 */
export async function loadNames(db: Database, cache: InMemoryNameCache, log: Logger): Promise<void> {
  const [hostRows, serviceRows] = await Promise.all([
    findAllHosts(db),
    findAllServices(db),
  ]);

  cache.replace(hostRows, serviceRows);

  log.info(
    { hostCount: hostRows.length, serviceCount: serviceRows.length },
    'Name cache loaded from database',
  );
}
