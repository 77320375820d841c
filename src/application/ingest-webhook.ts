import type { Event } from '../domain/index.js';
import type { EventStore } from './event-store.js';
import type { UseCaseLogger } from './logger.js';
import type { PayloadParser } from './payload-parsers.js';
import { parsePushEvent, parsePullRequestOpened, parseMergeEvent } from './payload-parsers.js';

export interface IngestDeps {
  store: EventStore;
  log: UseCaseLogger;
}

/** One inbound webhook call: the `X-GitHub-Event` value plus the JSON body. */
export interface WebhookDelivery {
  eventType: string | undefined;
  payload: unknown;
}

export type IngestOutcome =
  | { status: 'success'; eventId: string; event: Event }
  | { status: 'ignored'; message: string }
  | { status: 'rejected'; error: string }
  | { status: 'failed'; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Routing table:
 *
 *   push                              → push parser
 *   pull_request, action=opened       → pull-request-opened parser
 *   pull_request, action=closed,
 *     pull_request.merged=true        → merge parser
 *   anything else                     → null (ignored)
 */
export function selectParser(
  eventType: string | undefined,
  payload: Record<string, unknown>,
): PayloadParser | null {
  if (eventType === 'push') return parsePushEvent;
  if (eventType !== 'pull_request') return null;

  const action = payload['action'];
  if (action === 'opened') return parsePullRequestOpened;

  const pr = payload['pull_request'];
  if (action === 'closed' && isRecord(pr) && pr['merged'] === true) {
    return parseMergeEvent;
  }
  return null;
}

/**
 * Use case: ingest one webhook delivery.
 *
 * Rejects a missing or empty body before routing. Parsers that decline
 * a payload produce `ignored`; only a failed insert produces `failed`.
 */
export async function ingestWebhook(
  deps: IngestDeps,
  delivery: WebhookDelivery,
): Promise<IngestOutcome> {
  const { store, log } = deps;
  const { eventType, payload } = delivery;

  if (!isRecord(payload) || Object.keys(payload).length === 0) {
    return { status: 'rejected', error: 'No payload received' };
  }

  log.info({ event_type: eventType }, 'Received GitHub event');

  const ignored: IngestOutcome = {
    status: 'ignored',
    message: `Event type ${eventType ?? 'unknown'} not processed`,
  };

  const parser = selectParser(eventType, payload);
  if (parser === null) {
    return ignored;
  }

  const parsed = parser(payload);
  if (parsed.status === 'not_applicable') {
    log.debug({ event_type: eventType, reason: parsed.reason, issues: parsed.issues }, 'Webhook ignored');
    return ignored;
  }

  try {
    const eventId = await store.insert(parsed.event);
    log.info({ event_id: eventId, action: parsed.event.action }, 'Saved event');
    return { status: 'success', eventId, event: parsed.event };
  } catch (err: unknown) {
    log.error({ err, event_type: eventType }, 'Failed to save event');
    return { status: 'failed', error: 'Failed to save event' };
  }
}
