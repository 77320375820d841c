import type { BaseLogger } from 'pino';
import type { Event, StoredEvent } from '../../domain/index.js';
import { StoreError, toStorage } from '../../domain/index.js';
import type { EventStore } from '../../application/event-store.js';
import type { Database } from './client.js';
import type { RepoEventRow } from './schema.js';
import {
  insertEvent,
  queryLatestEvents,
  findEventById,
  deleteAllEvents,
} from './event-repository.js';

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

function toStoredEvent(row: RepoEventRow): StoredEvent {
  return {
    id: row.id,
    request_id: row.request_id,
    author: row.author,
    action: row.action,
    from_branch: row.from_branch,
    to_branch: row.to_branch,
    timestamp: row.timestamp,
  };
}

/**
 * EventStore backed by PostgreSQL via Drizzle.
 *
 * Read and delete failures are logged and degrade to "no data";
 * insert failures are rethrown as StoreError.
 */
export class PostgresEventStore implements EventStore {
  constructor(
    private readonly db: Database,
    private readonly log: BaseLogger,
  ) {}

  async insert(event: Event): Promise<string> {
    try {
      return await insertEvent(this.db, toStorage(event));
    } catch (err: unknown) {
      this.log.error({ err, request_id: event.request_id }, 'Error saving event');
      throw new StoreError('Failed to save event', { cause: err });
    }
  }

  async listLatest(limit: number): Promise<StoredEvent[]> {
    try {
      const rows = await queryLatestEvents(this.db, limit);
      return rows.map(toStoredEvent);
    } catch (err: unknown) {
      this.log.error({ err }, 'Error fetching events');
      return [];
    }
  }

  async getById(id: string): Promise<StoredEvent | null> {
    if (!UUID_RE.test(id)) return null;

    try {
      const row = await findEventById(this.db, id);
      return row === undefined ? null : toStoredEvent(row);
    } catch (err: unknown) {
      this.log.error({ err, event_id: id }, 'Error fetching event by ID');
      return null;
    }
  }

  async deleteAll(): Promise<number> {
    try {
      return await deleteAllEvents(this.db);
    } catch (err: unknown) {
      this.log.error({ err }, 'Error deleting events');
      return 0;
    }
  }
}
