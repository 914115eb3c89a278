export { hosts, services } from './schema.js';
export { createDbClient, DEFAULT_DATABASE_URL } from './client.js';
export type { Database } from './client.js';
export { findAllHosts, findAllServices } from './name-repository.js';
export type { HostRow, ServiceRow } from './name-repository.js';
export { default as dbPlugin } from './db-plugin.js';
