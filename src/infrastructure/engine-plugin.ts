import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { ClassificationEngine, EngineStore } from '../application/index.js';

export interface EnginePluginOptions {
  engines: EngineStore;
  /** Rebuilds the engine from the current parameter file. */
  reload: () => ClassificationEngine;
}

/**
 * Fastify plugin that exposes the live classification engine.
 *
 * Decorates `fastify.connector` with the engine store and a reload
 * function that builds a fresh engine and swaps it in.
 */
async function enginePlugin(fastify: FastifyInstance, options: EnginePluginOptions): Promise<void> {
  fastify.decorate('connector', {
    engines: options.engines,
    reload(): ClassificationEngine {
      const next = options.reload();
      options.engines.set(next);
      fastify.log.info('Classification engine reloaded');
      return next;
    },
  });
}

export default fp(enginePlugin, {
  name: 'engine',
  fastify: '5.x',
});

export interface ConnectorDecoration {
  engines: EngineStore;
  reload(): ClassificationEngine;
}

/** Extend Fastify's type system so `fastify.connector` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    connector: ConnectorDecoration;
  }
}
