export { redisPlugin, enqueueBrokerEvent, publishNamesChanged, BROKER_STREAM_KEY, NAMES_CHANNEL, DEFAULT_REDIS_URL } from './redis/index.js';
export type { NamesChangedPayload } from './redis/index.js';
export { createDbClient, findAllHosts, findAllServices, hosts, services, dbPlugin, DEFAULT_DATABASE_URL } from './db/index.js';
export type { Database, HostRow, ServiceRow } from './db/index.js';
export { startConsumer, handleBrokerEntry, parseStreamEntry, streamEntries, startNameSubscriber, reloadNames } from './worker/index.js';
export type { BrokerStreamEntry, EntryOutcome } from './worker/index.js';
export { InMemoryNameCache, loadNames } from './names/index.js';
export type { HostEntry, ServiceEntry } from './names/index.js';
export { createLogSink, createWebhookSink, createSinks, createAlertDispatcher } from './delivery/index.js';
export type { AlertSink, DeliveryResult } from './delivery/index.js';
export { loadConnectorParameters, defaultParameterPath } from './config/index.js';
export { buildEngine, loadEngine, applyConfiguredLevel } from './engine-factory.js';
export { default as enginePlugin } from './engine-plugin.js';
export type { EnginePluginOptions, ConnectorDecoration } from './engine-plugin.js';
