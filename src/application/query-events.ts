import type { StoredEvent } from '../domain/index.js';
import type { EventStore } from './event-store.js';
import { formatTimestamp, formatEventMessage } from './format-event.js';

export const DEFAULT_LIMIT = 50;
export const MAX_LIMIT = 100;

export interface ListEventsParams {
  limit?: number | undefined;
}

/** Stored event plus its rendered display fields. */
export interface FormattedEvent {
  id: string;
  request_id: string;
  author: string;
  action: string;
  from_branch: string | null;
  to_branch: string;
  timestamp: string;
  formatted_timestamp: string;
  message: string;
}

export function formatEvent(event: StoredEvent): FormattedEvent {
  return {
    id: event.id,
    request_id: event.request_id,
    author: event.author,
    action: event.action,
    from_branch: event.from_branch,
    to_branch: event.to_branch,
    timestamp: event.timestamp,
    formatted_timestamp: formatTimestamp(event.timestamp),
    message: formatEventMessage(event),
  };
}

/** Clamps a requested limit to [0, 100], defaulting to 50. */
export function clampLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) return DEFAULT_LIMIT;
  return Math.min(Math.max(Math.trunc(limit), 0), MAX_LIMIT);
}

/**
 * Use case: list the latest events, formatted for display.
 * An empty or unavailable store yields an empty list, never an error.
 */
export async function listEvents(store: EventStore, params: ListEventsParams) {
  const limit = clampLimit(params.limit);
  const rows = await store.listLatest(limit);
  const events = rows.slice(0, limit).map(formatEvent);

  return {
    status: 'success' as const,
    count: events.length,
    events,
  };
}

/**
 * Use case: fetch a single event by ID.
 * Returns null if not found.
 */
export async function getEvent(store: EventStore, eventId: string) {
  const row = await store.getById(eventId);
  if (row === null) return null;

  return {
    status: 'success' as const,
    event: formatEvent(row),
  };
}
