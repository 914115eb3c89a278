export { startConsumer, handleBrokerEntry, parseStreamEntry, streamEntries } from './stream-consumer.js';
export type { BrokerStreamEntry, EntryOutcome } from './stream-consumer.js';
export { startNameSubscriber, reloadNames } from './name-subscriber.js';
