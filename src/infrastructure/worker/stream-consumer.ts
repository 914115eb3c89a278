import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { EngineStore, ClassificationEngine } from '../../application/index.js';
import { BROKER_STREAM_KEY } from '../redis/index.js';

const GROUP_NAME = 'alert_connector';
const CONSUMER_NAME = process.env['WORKER_ID'] ?? 'connector-1';

// How long to block waiting for new messages (ms)
const BLOCK_MS = 5000;
// Max messages to read per iteration
const BATCH_SIZE = 100;

/**
 * Ensures the consumer group exists on the stream.
 *
 * Start ID "$" = only events arriving after group creation.
 * Crash recovery goes through processPending(), which re-reads this
 * consumer's own pending entries.
 *
 * Ignores BUSYGROUP errors (group already exists).
 */
async function ensureConsumerGroup(redis: Redis, log: Logger): Promise<void> {
  try {
    await redis.xgroup('CREATE', BROKER_STREAM_KEY, GROUP_NAME, '$', 'MKSTREAM');
    log.info({ group: GROUP_NAME, stream: BROKER_STREAM_KEY }, 'Consumer group created (from $)');
  } catch (err: unknown) {
    if (err instanceof Error && err.message.includes('BUSYGROUP')) {
      log.debug({ group: GROUP_NAME }, 'Consumer group already exists');
      return;
    }
    throw err;
  }
}

/** Decoded stream entry; the payload stays a JSON string until the pre-filter passes. */
export interface BrokerStreamEntry {
  readonly category: number;
  readonly element: number;
  readonly payload: string;
}

/**
 * Parses a raw Redis Stream entry.
 * Stream entries arrive as flat [field, value, field, value, ...] arrays.
 * Returns null when category or element is missing or not an integer.
 */
export function parseStreamEntry(fields: readonly string[]): BrokerStreamEntry | null {
  const map = new Map<string, string>();
  for (let i = 0; i < fields.length; i += 2) {
    const key = fields[i];
    const value = fields[i + 1];
    if (key !== undefined && value !== undefined) {
      map.set(key, value);
    }
  }

  const category = Number(map.get('category'));
  const element = Number(map.get('element'));
  if (!Number.isInteger(category) || !Number.isInteger(element)) {
    return null;
  }

  return { category, element, payload: map.get('payload') ?? '{}' };
}

export type EntryOutcome = 'malformed' | 'filtered' | 'rejected' | 'accepted';

/**
 * Runs one stream entry through the engine.
 *
 * 1. Pre-filter on (category, element) — the payload is not parsed yet.
 * 2. Parse the JSON payload; the stream's category/element win over
 *    whatever the payload carries.
 * 3. Hand it to `write()`.
 */
export function handleBrokerEntry(
  engine: ClassificationEngine,
  log: Logger,
  fields: readonly string[],
): EntryOutcome {
  const entry = parseStreamEntry(fields);
  if (entry === null) {
    log.warn({ fields }, 'Stream entry without valid category/element, dropping');
    return 'malformed';
  }

  if (!engine.filter(entry.category, entry.element)) {
    return 'filtered';
  }

  let payload: unknown;
  try {
    payload = JSON.parse(entry.payload);
  } catch (err: unknown) {
    log.warn({ err, category: entry.category, element: entry.element }, 'Stream entry payload is not JSON, dropping');
    return 'malformed';
  }

  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    log.warn({ category: entry.category, element: entry.element }, 'Stream entry payload is not an object, dropping');
    return 'malformed';
  }

  const accepted = engine.write({ ...payload, category: entry.category, element: entry.element });
  return accepted ? 'accepted' : 'rejected';
}

/** Dependencies bundled for internal functions. */
interface ConsumerDeps {
  redis: Redis;
  log: Logger;
  engines: EngineStore;
}

/**
 * Main consumer loop.
 *
 * 1. XREADGROUP with BLOCK — waits for new messages on the stream.
 * 2. For each message: classify with the current engine → XACK.
 *
 * Every handled entry is acknowledged, filtered and rejected ones included.
 *
 * The loop runs until `signal` is aborted (graceful shutdown).
 */
export async function startConsumer(
  redis: Redis,
  log: Logger,
  signal: AbortSignal,
  engines: EngineStore,
): Promise<void> {
  const deps: ConsumerDeps = { redis, log, engines };

  await ensureConsumerGroup(redis, log);

  log.info(
    { consumer: CONSUMER_NAME, group: GROUP_NAME, stream: BROKER_STREAM_KEY },
    'Consumer started',
  );

  await processPending(deps);

  while (!signal.aborted) {
    try {
      const response = await redis.xreadgroup(
        'GROUP', GROUP_NAME, CONSUMER_NAME,
        'COUNT', BATCH_SIZE,
        'BLOCK', BLOCK_MS,
        'STREAMS', BROKER_STREAM_KEY,
        '>',  // only new, undelivered messages
      );

      // null = timeout with no new messages
      if (response === null) continue;

      for (const [streamId, fields] of streamEntries(response)) {
        await processEntry(deps, streamId, fields);
      }
    } catch (err: unknown) {
      if (signal.aborted) break;
      log.error({ err }, 'Consumer loop error — retrying in 1s');
      await sleep(1000);
    }
  }

  log.info('Consumer stopped');
}

/**
 * Flattens an XREADGROUP reply — [stream, [[id, fields], ...]][] — into
 * [id, fields] pairs. Pending entries that were deleted come back with
 * nil fields; they are returned with an empty field list.
 */
export function streamEntries(response: unknown): Array<[string, string[]]> {
  const result: Array<[string, string[]]> = [];
  if (!Array.isArray(response)) return result;

  for (const stream of response) {
    const entries: unknown = Array.isArray(stream) ? stream[1] : undefined;
    if (!Array.isArray(entries)) continue;

    for (const entry of entries) {
      if (!Array.isArray(entry)) continue;
      const streamId: unknown = entry[0];
      const fields: unknown = entry[1];
      if (typeof streamId !== 'string') continue;

      result.push([
        streamId,
        Array.isArray(fields) ? fields.filter((f): f is string => typeof f === 'string') : [],
      ]);
    }
  }
  return result;
}

/**
 * Processes pending (previously delivered but unacknowledged) entries
 * left over from a crash or restart.
 */
async function processPending(deps: ConsumerDeps): Promise<void> {
  deps.log.info('Checking for pending entries...');

  const response = await deps.redis.xreadgroup(
    'GROUP', GROUP_NAME, CONSUMER_NAME,
    'COUNT', BATCH_SIZE,
    'STREAMS', BROKER_STREAM_KEY,
    '0',  // '0' = re-read pending entries for this consumer
  );

  if (response === null) return;

  let count = 0;
  for (const [streamId, fields] of streamEntries(response)) {
    if (fields.length === 0) continue; // already acked, skip nil entries
    await processEntry(deps, streamId, fields);
    count++;
  }

  if (count > 0) {
    deps.log.info({ count }, 'Recovered pending entries');
  }
}

/**
 * Classifies one entry, then acknowledges it.
 *
 * If classification throws, the entry is left unacknowledged so it stays
 * in the pending list for inspection and redelivery.
 */
async function processEntry(
  deps: ConsumerDeps,
  streamId: string,
  fields: string[],
): Promise<void> {
  let outcome: EntryOutcome;
  try {
    outcome = handleBrokerEntry(deps.engines.get(), deps.log, fields);
  } catch (err: unknown) {
    deps.log.error({ err, streamId }, 'Failed to classify broker event');
    return;
  }

  await deps.redis.xack(BROKER_STREAM_KEY, GROUP_NAME, streamId);
  deps.log.debug({ streamId, outcome }, 'Broker event processed');
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
