import { randomUUID } from 'node:crypto';
import type { Event, StoredEvent } from '../../domain/index.js';
import { toStorage } from '../../domain/index.js';
import type { EventStore } from '../../application/event-store.js';

interface Entry {
  seq: number;
  event: StoredEvent;
}

/**
 * In-memory event store.
 *
 * Same contract as the Postgres store, held in a Map for the life of
 * the process. Used by the test suite and by `STORE_DRIVER=memory`.
 */
export class InMemoryEventStore implements EventStore {
  private readonly entries: Map<string, Entry> = new Map();
  private seq = 0;

  async insert(event: Event): Promise<string> {
    const id = randomUUID();
    this.entries.set(id, {
      seq: this.seq++,
      event: { ...toStorage(event), id },
    });
    return id;
  }

  async listLatest(limit: number): Promise<StoredEvent[]> {
    return [...this.entries.values()]
      .sort((a, b) => {
        if (a.event.timestamp !== b.event.timestamp) {
          return a.event.timestamp < b.event.timestamp ? 1 : -1;
        }
        return b.seq - a.seq;
      })
      .slice(0, Math.max(limit, 0))
      .map((entry) => ({ ...entry.event }));
  }

  async getById(id: string): Promise<StoredEvent | null> {
    const entry = this.entries.get(id);
    return entry === undefined ? null : { ...entry.event };
  }

  async deleteAll(): Promise<number> {
    const count = this.entries.size;
    this.entries.clear();
    return count;
  }

  /** Number of stored events. */
  size(): number {
    return this.entries.size;
  }
}
