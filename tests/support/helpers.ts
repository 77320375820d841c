import pino from 'pino';
import { vi } from 'vitest';
import type { EventStore } from '../../src/application/index.js';
import type { Event } from '../../src/domain/index.js';
import { StoreError } from '../../src/domain/index.js';

/** Real pino instance that writes nothing; spy on its methods as needed. */
export function silentLogger() {
  return pino({ level: 'silent' });
}

/**
 * Factory for creating test events with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeEvent(overrides: Partial<Event> = {}): Event {
  return {
    request_id: overrides.request_id ?? 'abc123',
    author: overrides.author ?? 'alice',
    action: overrides.action ?? 'PUSH',
    from_branch: overrides.from_branch ?? null,
    to_branch: overrides.to_branch ?? 'main',
    timestamp: overrides.timestamp ?? '2024-03-07T14:30:00',
  };
}

/** Store whose backing connection is gone: writes reject, reads are empty. */
export function unavailableStore(): EventStore {
  return {
    insert: vi.fn(async (_event: Event): Promise<string> => {
      throw new StoreError('Failed to save event');
    }),
    listLatest: vi.fn(async () => []),
    getById: vi.fn(async () => null),
    deleteAll: vi.fn(async () => 0),
  };
}
