import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

/** Single row (id = 1) written once at construction */
export const registryState = sqliteTable('registry_state', {
  id: integer('id').primaryKey(),
  owner: text('owner').notNull(),
  paused: integer('paused', { mode: 'boolean' }).notNull().default(false),
  /** Highest id ever assigned; never rolled back */
  taskCounter: integer('task_counter').notNull().default(0),
  liveCount: integer('live_count').notNull().default(0),
});
