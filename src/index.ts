import pino from 'pino';
import type { Logger } from 'pino';
import type { EventStore } from './application/index.js';
import {
  loadConfig,
  createDbClient,
  ensureSchema,
  PostgresEventStore,
  InMemoryEventStore,
} from './infrastructure/index.js';
import type { ServerConfig } from './infrastructure/index.js';
import { buildServer } from './server.js';

interface StoreHandle {
  store: EventStore;
  close?: () => Promise<void>;
}

/**
 * Constructs the event store named by STORE_DRIVER.
 *
 * A database that cannot be prepared is logged, not fatal: the store
 * then degrades to empty reads and failed writes until it recovers.
 */
async function openStore(config: ServerConfig, log: Logger): Promise<StoreHandle> {
  if (config.storeDriver === 'memory') {
    log.warn('Using in-memory event store; events are lost on restart');
    return { store: new InMemoryEventStore() };
  }

  const { sql, db } = createDbClient(config.databaseUrl);

  try {
    await ensureSchema(sql);
    log.info('Database ready (repo_events table)');
  } catch (err: unknown) {
    log.error({ err }, 'Failed to prepare database schema');
  }

  return {
    store: new PostgresEventStore(db, log),
    close: async () => {
      await sql.end();
    },
  };
}

/**
 * Bootstrap.
 *
 * Order:
 * 1) Config + logger
 * 2) Event store
 * 3) Fastify instance (routes, shutdown hook)
 * 4) listen()
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const log = pino({ level: config.logLevel });

  const { store, close } = await openStore(config, log);

  const fastify = await buildServer({
    store,
    log,
    serviceName: config.serviceName,
    closeStore: close,
  });

  const shutdown = (signal: string): void => {
    log.info({ signal }, 'Shutting down server...');
    void fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await fastify.listen({
    host: config.host,
    port: config.port,
  });
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
