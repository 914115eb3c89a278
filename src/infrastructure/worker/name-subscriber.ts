import { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { Database } from '../db/index.js';
import { loadNames } from '../names/index.js';
import type { InMemoryNameCache } from '../names/index.js';
import { NAMES_CHANNEL } from '../redis/index.js';

/**
 * Subscribes to the "names_changed" Pub/Sub channel and reloads host and
 * service names from Postgres whenever a notification arrives.
 *
 * ioredis requires a dedicated connection for subscriptions — once a client
 * enters subscriber mode it cannot issue regular commands.
 *
 * Lookups keep using the previous snapshot while a reload is in flight.
 *
 * Returns a cleanup function that unsubscribes and disconnects.
 */
export async function startNameSubscriber(
  redisUrl: string,
  db: Database,
  log: Logger,
  cache: InMemoryNameCache,
  signal: AbortSignal,
): Promise<() => Promise<void>> {
  const sub = new Redis(redisUrl, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    lazyConnect: true,
  });

  await sub.connect();
  log.info('Name subscriber Redis connection established');

  // Guard against concurrent reloads (e.g. several publishers at once)
  let reloading = false;

  sub.on('message', (channel: string, message: string) => {
    if (channel !== NAMES_CHANNEL) return;
    if (signal.aborted) return;

    // Errors are caught inside reloadNames
    void reloadNames(db, log, cache, message, () => reloading, (v) => { reloading = v; });
  });

  await sub.subscribe(NAMES_CHANNEL);
  log.info({ channel: NAMES_CHANNEL }, 'Subscribed to name change notifications');

  return async () => {
    await sub.unsubscribe(NAMES_CHANNEL).catch((err: unknown) => {
      log.warn({ err }, 'Failed to unsubscribe from name change notifications');
    });
    await sub.quit().catch((err: unknown) => {
      log.warn({ err }, 'Failed to close name subscriber connection');
    });
    log.info('Name subscriber disconnected');
  };
}

/**
 * Reloads names from Postgres into the cache.
 *
 * Exported for unit testing — callers outside this module should use
 * `startNameSubscriber()` instead.
 */
export async function reloadNames(
  db: Database,
  log: Logger,
  cache: InMemoryNameCache,
  rawMessage: string,
  getReloading: () => boolean,
  setReloading: (v: boolean) => void,
): Promise<void> {
  if (getReloading()) {
    log.debug('Name reload already in progress, skipping');
    return;
  }

  setReloading(true);
  try {
    log.info({ reason: messageReason(rawMessage) }, 'Name change detected, reloading names from database');
    await loadNames(db, cache, log);
  } catch (err: unknown) {
    log.error({ err }, 'Failed to reload names from database');
  } finally {
    setReloading(false);
  }
}

/** Best-effort extraction of the `reason` field; non-JSON messages still trigger a reload. */
function messageReason(rawMessage: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(rawMessage);
    if (typeof parsed === 'object' && parsed !== null && 'reason' in parsed && typeof parsed.reason === 'string') {
      return parsed.reason;
    }
  } catch {
    return undefined;
  }
  return undefined;
}
