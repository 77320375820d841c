import { ValidationError } from './errors.js';

/**
 * Core domain types for repository activity events.
 *
 * An Event is built transiently from a webhook payload, handed to an
 * event store (which assigns `id`), and never mutated afterwards.
 */

export const EVENT_ACTIONS = ['PUSH', 'PULL_REQUEST', 'MERGE'] as const;

export type EventAction = (typeof EVENT_ACTIONS)[number];

/** Canonical Event entity. `id` is present only once persisted. */
export interface Event {
  readonly id?: string;
  readonly request_id: string;
  readonly author: string;
  readonly action: EventAction;
  readonly from_branch: string | null;
  readonly to_branch: string;
  readonly timestamp: string; // ISO-8601, UTC
}

/** Fields accepted by `createEvent`. */
export interface EventInput {
  id?: string;
  request_id: string;
  author: string;
  action: string;
  to_branch: string;
  from_branch?: string | null;
  timestamp?: string | null;
}

/**
 * Plain key/value form written to and read from a store.
 * `action` is a bare string here: rows may predate this service.
 */
export interface EventDocument {
  id?: string;
  request_id: string;
  author: string;
  action: string;
  from_branch: string | null;
  to_branch: string;
  timestamp: string;
}

/** A persisted event as returned by an event store. */
export type StoredEvent = EventDocument & { id: string };

export function isEventAction(value: unknown): value is EventAction {
  return typeof value === 'string' && (EVENT_ACTIONS as readonly string[]).includes(value);
}

/**
 * Builds an Event, defaulting `timestamp` to the current UTC instant.
 * Throws ValidationError when `action` is not a known action.
 */
export function createEvent(input: EventInput, now: () => Date = () => new Date()): Event {
  const { action } = input;
  if (!isEventAction(action)) {
    throw new ValidationError(`Action must be one of ${EVENT_ACTIONS.join(', ')}`);
  }

  const event: Event = {
    request_id: input.request_id,
    author: input.author,
    action,
    from_branch: input.from_branch ?? null,
    to_branch: input.to_branch,
    timestamp: input.timestamp ?? now().toISOString(),
  };

  return input.id === undefined ? event : { id: input.id, ...event };
}

export function toStorage(event: Event): EventDocument {
  const doc: EventDocument = {
    request_id: event.request_id,
    author: event.author,
    action: event.action,
    from_branch: event.from_branch,
    to_branch: event.to_branch,
    timestamp: event.timestamp,
  };
  if (event.id !== undefined) doc.id = event.id;
  return doc;
}

/** Rebuilds an Event from its stored form, re-validating `action`. */
export function fromStorage(doc: EventDocument): Event {
  return createEvent(doc);
}
