import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { EventStore } from '../application/event-store.js';

export interface StorePluginOptions {
  store: EventStore;
  /** Releases the store's connection; runs when the server closes. */
  close?: (() => Promise<void>) | undefined;
}

/**
 * Fastify plugin that exposes an already-constructed event store.
 *
 * Decorates `fastify.eventStore` for use by routes. The store itself is
 * built by the entry point; this plugin only hands it to Fastify and
 * runs `close` on server shutdown.
 */
async function storePlugin(fastify: FastifyInstance, opts: StorePluginOptions): Promise<void> {
  fastify.decorate('eventStore', opts.store);

  const { close } = opts;
  if (close !== undefined) {
    fastify.addHook('onClose', async () => {
      await close();
      fastify.log.info('Event store disconnected');
    });
  }
}

export default fp(storePlugin, {
  name: 'event-store',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.eventStore` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    eventStore: EventStore;
  }
}
