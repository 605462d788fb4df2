// Session workflow routes: read, load, validate, apply a brief
import type { FastifyPluginAsync } from 'fastify';
import {
  appendGroups,
  compile,
  decodeGraph,
  encodeGraph,
  encodeLinkLine,
  execute,
  extractSubgraph,
  listGroups,
  nodesInGroup,
  parseSearchTerms,
  subgraphOf,
  validateGraph,
} from '@nodepatch/core';
import { ApplyBodySchema, ExtractBodySchema, TextBodySchema, briefText } from '../types/messages.js';

export const graphRoutes: FastifyPluginAsync = async (fastify) => {
  // GET /api/v1/graph: current session workflow
  fastify.get('/', async () => {
    const graph = fastify.session.graph;
    return {
      text: encodeGraph(graph, fastify.catalog),
      nodes: Object.keys(graph.nodes).length,
      links: graph.links.length,
    };
  });

  // POST /api/v1/graph/load { text }: replace the session workflow
  fastify.post('/load', async (request) => {
    const body = TextBodySchema.parse(request.body);
    const graph = decodeGraph(body.text, fastify.catalog);
    fastify.session.commit(graph);
    request.log.info({ nodes: Object.keys(graph.nodes).length }, 'Session workflow loaded');
    return { ok: true, text: encodeGraph(graph, fastify.catalog) };
  });

  // GET /api/v1/graph/validate
  fastify.get('/validate', async () => validateGraph(fastify.session.graph, fastify.catalog));

  // GET /api/v1/graph/groups: layout groups with their member nodes
  fastify.get('/groups', async () => ({ groups: listGroups(fastify.session.graph) }));

  // POST /api/v1/graph/extract { focus?, groups? }: selected nodes and the links leaving them
  fastify.post('/extract', async (request, reply) => {
    const body = ExtractBodySchema.parse(request.body ?? {});
    const graph = fastify.session.graph;
    const ids = new Set(Object.keys(extractSubgraph(graph, parseSearchTerms(body.focus ?? '')).graph.nodes));
    for (const title of body.groups ?? []) {
      const members = nodesInGroup(graph, title);
      if (!members) {
        return reply.status(404).send({ ok: false, error: `Unknown group "${title}"` });
      }
      for (const id of members) ids.add(id);
    }
    const selection = subgraphOf(graph, ids);
    return {
      text: encodeGraph(selection.graph, fastify.catalog),
      nodes: Object.keys(selection.graph.nodes).length,
      boundary: selection.boundary.map(encodeLinkLine),
    };
  });

  // POST /api/v1/graph/apply { brief }: compile, execute and commit as one step
  fastify.post('/apply', async (request, reply) => {
    const body = ApplyBodySchema.parse(request.body);
    const before = fastify.session.graph;

    const compiled = compile(briefText(body.brief), before, fastify.catalog);
    if (!compiled.ok) {
      request.log.info({ rule: compiled.error.rule }, 'Brief rejected');
      return reply.status(422).send({ ok: false, error: compiled.error.toJSON() });
    }
    const executed = execute(compiled.operations, before, fastify.catalog);
    if (!executed.ok) {
      request.log.warn({ rule: executed.error.rule }, 'Compiled operations failed to execute');
      return reply.status(422).send({ ok: false, error: executed.error.toJSON() });
    }

    appendGroups(executed.graph, compiled.groups);
    fastify.session.commit(executed.graph);
    request.log.info({ operations: compiled.operations.length }, 'Brief applied');
    return {
      ok: true,
      operations: compiled.operations,
      summary: compiled.summary,
      groups: compiled.groups,
      text: encodeGraph(executed.graph, fastify.catalog),
    };
  });
};
