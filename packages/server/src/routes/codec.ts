// Graph codec routes: compact text <-> graph JSON <-> native workflow
import type { FastifyPluginAsync } from 'fastify';
import {
  decodeGraph,
  encodeGraph,
  exportWorkflow,
  importWorkflow,
  parseWorkflowGraph,
} from '@nodepatch/core';
import { EncodeBodySchema, ImportBodySchema, TextBodySchema } from '../types/messages.js';

export const codecRoutes: FastifyPluginAsync = async (fastify) => {
  // POST /api/v1/codec/encode { graph } -> { text }
  fastify.post('/encode', async (request) => {
    const body = EncodeBodySchema.parse(request.body);
    const graph = parseWorkflowGraph(body.graph);
    return { text: encodeGraph(graph, fastify.catalog) };
  });

  // POST /api/v1/codec/decode { text } -> { graph }
  fastify.post('/decode', async (request) => {
    const body = TextBodySchema.parse(request.body);
    return { graph: decodeGraph(body.text, fastify.catalog) };
  });

  // POST /api/v1/codec/import { workflow } -> { text, graph }
  fastify.post('/import', async (request) => {
    const body = ImportBodySchema.parse(request.body);
    const graph = importWorkflow(body.workflow, fastify.catalog);
    return { text: encodeGraph(graph, fastify.catalog), graph };
  });

  // POST /api/v1/codec/export { text } -> { workflow }
  fastify.post('/export', async (request) => {
    const body = TextBodySchema.parse(request.body);
    const graph = decodeGraph(body.text, fastify.catalog);
    return { workflow: exportWorkflow(graph, fastify.catalog) };
  });
};
