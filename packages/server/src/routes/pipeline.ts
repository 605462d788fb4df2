// Compile and execute routes (stateless: against the given text, else the session workflow)
import type { FastifyPluginAsync } from 'fastify';
import {
  OPERATION_LIST_VERSION,
  compile,
  decodeGraph,
  encodeGraph,
  execute,
  parseOperationList,
} from '@nodepatch/core';
import { CompileBodySchema, ExecuteBodySchema, briefText } from '../types/messages.js';

export const pipelineRoutes: FastifyPluginAsync = async (fastify) => {
  const graphFor = (text: string | undefined) =>
    text === undefined ? fastify.session.graph : decodeGraph(text, fastify.catalog);

  // POST /api/v1/compile { brief, text? } -> { operations, summary, groups }
  fastify.post('/compile', async (request, reply) => {
    const body = CompileBodySchema.parse(request.body);
    const result = compile(briefText(body.brief), graphFor(body.text), fastify.catalog);
    if (!result.ok) {
      request.log.info({ rule: result.error.rule }, 'Brief rejected');
      return reply.status(422).send({ ok: false, error: result.error.toJSON() });
    }
    return {
      ok: true,
      operations: result.operations,
      summary: result.summary,
      groups: result.groups,
    };
  });

  // POST /api/v1/execute { operations, text? } -> { text }
  fastify.post('/execute', async (request, reply) => {
    const body = ExecuteBodySchema.parse(request.body);
    // a bare array is taken as the operations of a version 1 list
    const operations = parseOperationList(
      Array.isArray(body.operations)
        ? { version: OPERATION_LIST_VERSION, operations: body.operations }
        : body.operations,
    );
    const result = execute(operations, graphFor(body.text), fastify.catalog);
    if (!result.ok) {
      request.log.info({ rule: result.error.rule }, 'Operation list rejected');
      return reply.status(422).send({ ok: false, error: result.error.toJSON() });
    }
    return { ok: true, text: encodeGraph(result.graph, fastify.catalog) };
  });
};
