import type { Redis } from 'ioredis';

export const BROKER_STREAM_KEY = 'broker_events';

/**
 * Appends a broker event to the Redis Stream.
 *
 * `category` and `element` travel as their own fields so the consumer can
 * pre-filter without parsing the JSON payload.
 *
 * @returns The stream entry ID assigned by Redis.
 */
export async function enqueueBrokerEvent(
  redis: Redis,
  category: number,
  element: number,
  payload: unknown,
): Promise<string> {
  const entryId = await redis.xadd(
    BROKER_STREAM_KEY,
    '*',
    'category', String(category),
    'element', String(element),
    'payload', JSON.stringify(payload),
  );

  // xadd only returns null with NOMKSTREAM
  return entryId ?? '';
}
