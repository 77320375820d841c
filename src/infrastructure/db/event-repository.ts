import { randomUUID } from 'node:crypto';
import { desc, eq } from 'drizzle-orm';
import type { EventDocument } from '../../domain/index.js';
import type { Database } from './client.js';
import { repoEvents } from './schema.js';
import type { RepoEventRow } from './schema.js';

/**
 * Inserts an event into PostgreSQL.
 * Generates a UUID for `id`; duplicates of `request_id` are allowed.
 */
export async function insertEvent(
  db: Database,
  event: Omit<EventDocument, 'id'>,
): Promise<string> {
  const id = randomUUID();
  await db.insert(repoEvents).values({
    id,
    request_id: event.request_id,
    author: event.author,
    action: event.action,
    from_branch: event.from_branch,
    to_branch: event.to_branch,
    timestamp: event.timestamp,
  });
  return id;
}

/**
 * Fetches the newest events.
 * Ordering: timestamp DESC, then insertion time DESC.
 */
export async function queryLatestEvents(db: Database, limit: number): Promise<RepoEventRow[]> {
  return db
    .select()
    .from(repoEvents)
    .orderBy(desc(repoEvents.timestamp), desc(repoEvents.created_at))
    .limit(limit);
}

/**
 * Fetches a single event by id.
 * Returns undefined if not found.
 */
export async function findEventById(db: Database, id: string): Promise<RepoEventRow | undefined> {
  const rows = await db
    .select()
    .from(repoEvents)
    .where(eq(repoEvents.id, id))
    .limit(1);

  return rows[0];
}

/** Deletes every event. Returns the number of rows removed. */
export async function deleteAllEvents(db: Database): Promise<number> {
  const rows = await db.delete(repoEvents).returning({ id: repoEvents.id });
  return rows.length;
}
