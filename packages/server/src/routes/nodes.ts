// Catalog routes
import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { filterCatalog, listModels, parseSearchTerms } from '@nodepatch/core';

const NodesQuerySchema = z.object({
  q: z.string().optional(),
});

export const nodeRoutes: FastifyPluginAsync = async (fastify) => {
  // GET /api/v1/nodes?q=sampler,vae: all classes, or those matching the search terms
  fastify.get('/', async (request) => {
    const { q } = NodesQuerySchema.parse(request.query);
    const catalog = q ? filterCatalog(fastify.catalog, parseSearchTerms(q)) : fastify.catalog;
    return { count: catalog.size, nodes: catalog.definitions() };
  });

  // GET /api/v1/nodes/models: model files offered by loader widgets
  fastify.get('/models', async () => ({ models: listModels(fastify.catalog) }));

  // GET /api/v1/nodes/:type: one class definition
  fastify.get('/:type', async (request, reply) => {
    const { type } = z.object({ type: z.string() }).parse(request.params);
    const def = fastify.catalog.get(type);
    if (!def) {
      return reply.status(404).send({ ok: false, error: `Unknown node class "${type}"` });
    }
    return def;
  });
};
