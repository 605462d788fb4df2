// Maps thrown errors to HTTP responses
import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { NodepatchError } from '@nodepatch/core';

/**
 * Request bodies that fail their schema -> 400 with the issues.
 * Codec, catalog, compile and execution errors -> 422 with the error's JSON.
 * Anything else is logged and answered with 500.
 */
export function handleError(error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply) {
  if (error instanceof ZodError) {
    return reply.status(400).send({
      ok: false,
      error: 'Invalid request body',
      issues: error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    });
  }
  if (error instanceof NodepatchError) {
    return reply.status(422).send({ ok: false, error: error.toJSON() });
  }
  if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
    return reply.status(error.statusCode).send({ ok: false, error: error.message });
  }
  request.log.error({ err: error }, 'Unhandled error');
  return reply.status(500).send({ ok: false, error: 'Internal server error' });
}
