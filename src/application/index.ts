export type { EventStore } from './event-store.js';
export type { UseCaseLogger } from './logger.js';
export { pushPayloadSchema, pullRequestPayloadSchema, testEventSchema } from './webhook-schema.js';
export type { PushPayload, PullRequestPayload, TestEventInput } from './webhook-schema.js';
export { parsePushEvent, parsePullRequestOpened, parseMergeEvent } from './payload-parsers.js';
export type { ParseOutcome, PayloadParser } from './payload-parsers.js';
export { ingestWebhook, selectParser } from './ingest-webhook.js';
export type { IngestDeps, IngestOutcome, WebhookDelivery } from './ingest-webhook.js';
export { formatTimestamp, formatEventMessage, parseIsoTimestamp } from './format-event.js';
export { listEvents, getEvent, formatEvent, clampLimit, DEFAULT_LIMIT, MAX_LIMIT } from './query-events.js';
export type { ListEventsParams, FormattedEvent } from './query-events.js';
export { createSampleEvents, createTestEvent, SAMPLE_EVENTS } from './sample-events.js';
export type { SampleEventsResult } from './sample-events.js';
