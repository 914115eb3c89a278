import type { Database } from './client.js';
import { hosts, services } from './schema.js';

/** Row shape returned by host queries. */
export type HostRow = typeof hosts.$inferSelect;

/** Row shape returned by service queries. */
export type ServiceRow = typeof services.$inferSelect;

export async function findAllHosts(db: Database): Promise<HostRow[]> {
  return db.select().from(hosts);
}

export async function findAllServices(db: Database): Promise<ServiceRow[]> {
  return db.select().from(services);
}
