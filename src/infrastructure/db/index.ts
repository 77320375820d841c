export { repoEvents } from './schema.js';
export type { RepoEventRow } from './schema.js';
export { createDbClient } from './client.js';
export type { DbClientOptions } from './client.js';
export type { Database, DbClient, SqlConnection } from './client.js';
export { ensureSchema } from './ensure-schema.js';
export { insertEvent, queryLatestEvents, findEventById, deleteAllEvents } from './event-repository.js';
export { PostgresEventStore } from './postgres-event-store.js';
