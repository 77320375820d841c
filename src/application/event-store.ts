import type { Event, StoredEvent } from '../domain/index.js';

/**
 * Persistence port for events.
 *
 * Implementations absorb store unavailability on the read side
 * (empty list, `null`, zero) and surface it on writes: `insert`
 * rejects with a StoreError so a lost event is never reported as saved.
 */
export interface EventStore {
  /** Persists one event and resolves to its assigned id. */
  insert(event: Event): Promise<string>;

  /** Latest events, newest `timestamp` first. */
  listLatest(limit: number): Promise<StoredEvent[]>;

  /** Resolves `null` for unknown or malformed ids. */
  getById(id: string): Promise<StoredEvent | null>;

  /** Removes every event; resolves to the number removed. */
  deleteAll(): Promise<number>;
}
