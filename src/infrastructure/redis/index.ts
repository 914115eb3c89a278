export { default as redisPlugin, DEFAULT_REDIS_URL } from './redis-plugin.js';
export { enqueueBrokerEvent, BROKER_STREAM_KEY } from './event-producer.js';
export { publishNamesChanged, NAMES_CHANNEL } from './names-notifier.js';
export type { NamesChangedPayload } from './names-notifier.js';
