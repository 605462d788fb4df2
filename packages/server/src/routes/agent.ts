// Agent surface: tool definitions and context text for the session workflow
import type { FastifyPluginAsync } from 'fastify';
import { parseSearchTerms } from '@nodepatch/core';
import { BRIEF_JSON_SCHEMA, GRAPH_TOOLS, buildAgentContext } from '@nodepatch/agent';
import { ContextBodySchema } from '../types/messages.js';

export const agentRoutes: FastifyPluginAsync = async (fastify) => {
  // GET /api/v1/agent/tools: function-calling definitions
  fastify.get('/tools', async () => ({ tools: GRAPH_TOOLS }));

  // GET /api/v1/agent/brief-schema: JSON Schema of a Change Brief
  fastify.get('/brief-schema', async () => BRIEF_JSON_SCHEMA);

  // POST /api/v1/agent/context { query?, brief?, focus?, groups?, models? }: context text for the session workflow
  fastify.post('/context', async (request) => {
    const body = ContextBodySchema.parse(request.body ?? {});
    return buildAgentContext({
      graph: fastify.session.graph,
      catalog: fastify.catalog,
      terms: body.query ? parseSearchTerms(body.query) : [],
      focus: body.focus ? parseSearchTerms(body.focus) : undefined,
      groups: body.groups,
      models: body.models,
      brief: body.brief,
    });
  });
};
