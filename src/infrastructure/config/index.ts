export { loadConfig, ConfigError, DEFAULT_DATABASE_URL } from './config.js';
export type { ServerConfig, StoreDriver } from './config.js';
