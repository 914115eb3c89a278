import { pgTable, integer, varchar, primaryKey, index } from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for the `hosts` table.
 *
 * Read-only for this service: rows are owned by the monitoring
 * configuration and only looked up to turn host ids into names.
 */
export const hosts = pgTable('hosts', {
  host_id: integer('host_id').primaryKey(),
  name: varchar('name', { length: 255 }).notNull(),
});

/**
 * Drizzle schema for the `services` table.
 *
 * A service id is only unique within its host, so the key is the pair.
 */
export const services = pgTable('services', {
  host_id: integer('host_id').notNull(),
  service_id: integer('service_id').notNull(),
  description: varchar('description', { length: 255 }).notNull(),
}, (table) => [
  primaryKey({ columns: [table.host_id, table.service_id] }),
  index('idx_services_service_id').on(table.service_id),
]);
