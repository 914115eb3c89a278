export { InMemoryNameCache } from './in-memory-name-cache.js';
export type { HostEntry, ServiceEntry } from './in-memory-name-cache.js';
export { loadNames } from './name-loader.js';
