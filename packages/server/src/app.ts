// Fastify application factory
import Fastify from 'fastify';
import cors from '@fastify/cors';
import websocket from '@fastify/websocket';
import type { NodeCatalog, WorkflowGraph } from '@nodepatch/core';
import { handleError } from './http-errors.js';
import { lifecycle } from './plugins/lifecycle.js';
import { agentRoutes } from './routes/agent.js';
import { codecRoutes } from './routes/codec.js';
import { graphRoutes } from './routes/graph.js';
import { nodeRoutes } from './routes/nodes.js';
import { pipelineRoutes } from './routes/pipeline.js';
import { websocketHandler } from './websocket/handler.js';

export interface ServerOptions {
  catalog: NodeCatalog;
  /** Initial session workflow; empty when omitted. */
  graph?: WorkflowGraph;
  /** `false` silences request logs (tests). */
  logger?: boolean | { level: string };
}

export async function createServer(options: ServerOptions) {
  const app = Fastify({ logger: options.logger ?? true });

  // Register plugins
  await app.register(cors, {
    origin: true,
    credentials: true,
  });
  await app.register(websocket);

  app.setErrorHandler(handleError);

  // Catalog and session workflow
  await app.register(lifecycle, { catalog: options.catalog, graph: options.graph });

  // Register REST routes
  await app.register(nodeRoutes, { prefix: '/api/v1/nodes' });
  await app.register(codecRoutes, { prefix: '/api/v1/codec' });
  await app.register(pipelineRoutes, { prefix: '/api/v1' });
  await app.register(graphRoutes, { prefix: '/api/v1/graph' });
  await app.register(agentRoutes, { prefix: '/api/v1/agent' });

  // Register WebSocket handler (/api/v1/graph/updates)
  await app.register(websocketHandler, { prefix: '/api/v1/graph' });

  // Health check
  app.get('/health', async () => ({ status: 'ok', classes: app.catalog.size }));

  return app;
}
