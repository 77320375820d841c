import { pgTable, uuid, varchar, timestamp, index } from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for the `repo_events` table.
 *
 * `timestamp` keeps the event's ISO-8601 string exactly as constructed;
 * ordering by it matches chronological order for UTC strings.
 * `created_at` breaks ties between events sharing a timestamp.
 */
export const repoEvents = pgTable('repo_events', {
  id: uuid('id').primaryKey(),
  request_id: varchar('request_id', { length: 255 }).notNull(),
  author: varchar('author', { length: 255 }).notNull(),
  action: varchar('action', { length: 32 }).notNull(),
  from_branch: varchar('from_branch', { length: 255 }),
  to_branch: varchar('to_branch', { length: 255 }).notNull(),
  timestamp: varchar('timestamp', { length: 64 }).notNull(),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_repo_events_timestamp').on(table.timestamp),
  index('idx_repo_events_action').on(table.action),
]);

export type RepoEventRow = typeof repoEvents.$inferSelect;
