export {
  createDbClient,
  ensureSchema,
  repoEvents,
  insertEvent,
  queryLatestEvents,
  findEventById,
  deleteAllEvents,
  PostgresEventStore,
} from './db/index.js';
export type { Database, DbClient, SqlConnection, RepoEventRow } from './db/index.js';
export { InMemoryEventStore } from './memory/index.js';
export { loadConfig, ConfigError, DEFAULT_DATABASE_URL } from './config/index.js';
export type { ServerConfig, StoreDriver } from './config/index.js';
export { default as storePlugin } from './store-plugin.js';
export type { StorePluginOptions } from './store-plugin.js';
