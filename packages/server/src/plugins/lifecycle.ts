// Lifecycle plugin: shares the catalog and the session workflow across routes
import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import type { NodeCatalog, WorkflowGraph } from '@nodepatch/core';
import { GraphSession } from '../session/graph-session.js';

declare module 'fastify' {
  interface FastifyInstance {
    catalog: NodeCatalog;
    session: GraphSession;
  }
}

export interface LifecyclePluginOptions {
  catalog: NodeCatalog;
  graph?: WorkflowGraph;
}

/**
 * Lifecycle plugin - decorates the instance with the catalog and a fresh
 * session, and drops WebSocket listeners on shutdown.
 */
const lifecyclePlugin: FastifyPluginAsync<LifecyclePluginOptions> = async (fastify, options) => {
  const session = new GraphSession(options.graph);

  fastify.decorate('catalog', options.catalog);
  fastify.decorate('session', session);

  fastify.addHook('onReady', async () => {
    fastify.log.info(
      { classes: options.catalog.size, nodes: Object.keys(session.graph.nodes).length },
      'Catalog and session workflow ready',
    );
  });

  fastify.addHook('onClose', async () => {
    fastify.log.info({ listeners: session.listenerCount }, 'Closing session');
    session.clearListeners();
  });
};

export const lifecycle = fp(lifecyclePlugin, {
  name: 'nodepatch-lifecycle',
  fastify: '5.x',
});
