import type { Redis } from 'ioredis';
import type { FastifyBaseLogger } from 'fastify';

export const NAMES_CHANNEL = 'names_changed';

export interface NamesChangedPayload {
  ts: string;
  reason: string;
}

/**
 * Publishes a notification on the "names_changed" Pub/Sub channel so
 * every connector process reloads its name cache.
 *
 * Best-effort: publish failures are logged but never propagated.
 */
export async function publishNamesChanged(
  redis: Redis,
  log: FastifyBaseLogger,
  reason: string,
): Promise<boolean> {
  try {
    const payload: NamesChangedPayload = {
      ts: new Date().toISOString(),
      reason,
    };
    await redis.publish(NAMES_CHANNEL, JSON.stringify(payload));
    log.debug({ channel: NAMES_CHANNEL, reason }, 'Published names change notification');
    return true;
  } catch (err: unknown) {
    log.error({ err, reason }, 'Failed to publish names change notification');
    return false;
  }
}
