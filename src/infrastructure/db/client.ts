import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';

export interface DbClientOptions {
  /** Pool size. Each request runs a single statement, so a few connections suffice. */
  maxConnections?: number;
  /** Seconds a connection may sit idle before it is closed. */
  idleTimeout?: number;
  /** Seconds to wait for a connection before the store reports the database unavailable. */
  connectTimeout?: number;
}

/**
 * Opens the `repo_events` database lazily: postgres.js connects on the
 * first query, so a database that is down does not block startup.
 */
export function createDbClient(databaseUrl: string, options: DbClientOptions = {}) {
  const sql = postgres(databaseUrl, {
    max: options.maxConnections ?? 5,
    idle_timeout: options.idleTimeout ?? 30,
    connect_timeout: options.connectTimeout ?? 5,
  });

  return { sql, db: drizzle(sql, { schema }) };
}

export type DbClient = ReturnType<typeof createDbClient>;
export type Database = DbClient['db'];
export type SqlConnection = DbClient['sql'];
