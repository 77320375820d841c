import type { EventInput } from '../domain/index.js';
import { createEvent } from '../domain/index.js';
import type { EventStore } from './event-store.js';
import type { UseCaseLogger } from './logger.js';
import type { TestEventInput } from './webhook-schema.js';

export const SAMPLE_EVENTS: readonly EventInput[] = [
  { request_id: 'abc123', author: 'john_doe', action: 'PUSH', to_branch: 'main' },
  { request_id: 'def456', author: 'jane_smith', action: 'PULL_REQUEST', to_branch: 'main', from_branch: 'feature-branch' },
  { request_id: 'ghi789', author: 'bob_wilson', action: 'MERGE', to_branch: 'main', from_branch: 'develop' },
];

export interface SampleEventsResult {
  deleted: number;
  eventIds: string[];
}

/**
 * Use case: reset the store to the canned sample set.
 * Inserts that fail are logged and left out of `eventIds`.
 */
export async function createSampleEvents(store: EventStore, log: UseCaseLogger): Promise<SampleEventsResult> {
  const deleted = await store.deleteAll();
  log.info({ deleted }, 'Deleted existing events');

  const eventIds: string[] = [];
  for (const input of SAMPLE_EVENTS) {
    try {
      eventIds.push(await store.insert(createEvent(input)));
    } catch (err: unknown) {
      log.warn({ err, request_id: input.request_id }, 'Failed to insert sample event');
    }
  }

  return { deleted, eventIds };
}

/**
 * Use case: persist one event straight from request fields, bypassing
 * the webhook parsers. Throws ValidationError for an unknown action and
 * StoreError when the insert fails.
 */
export async function createTestEvent(store: EventStore, input: TestEventInput): Promise<string> {
  const event = createEvent({
    request_id: input.request_id ?? 'test-123',
    author: input.author ?? 'test-user',
    action: input.action ?? 'PUSH',
    to_branch: input.to_branch ?? 'main',
    from_branch: input.from_branch ?? null,
  });

  return store.insert(event);
}
