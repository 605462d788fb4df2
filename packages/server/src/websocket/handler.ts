// WebSocket handler pushing the session workflow after every commit
import type { FastifyPluginAsync } from 'fastify';
import type { WebSocket } from '@fastify/websocket';
import { encodeGraph } from '@nodepatch/core';
import { buildErrorMessage, buildGraphMessage } from '../types/messages.js';
import { wsSendAsync } from './send-utils.js';

/**
 * WebSocket handler plugin - registers the /updates endpoint.
 * Clients only listen; edits go through the HTTP routes.
 */
export const websocketHandler: FastifyPluginAsync = async (fastify) => {
  fastify.get('/updates', { websocket: true }, (socket: WebSocket) => {
    fastify.log.info({ listeners: fastify.session.listenerCount + 1 }, 'WebSocket client connected');

    const unsubscribe = fastify.session.onUpdate((graph) => {
      try {
        wsSendAsync(socket, buildGraphMessage(encodeGraph(graph, fastify.catalog)), fastify.log);
      } catch (error) {
        fastify.log.error({ err: error }, 'Could not encode committed workflow');
        wsSendAsync(
          socket,
          buildErrorMessage(error instanceof Error ? error.message : 'Unknown error'),
          fastify.log,
        );
      }
    });

    socket.on('close', () => {
      unsubscribe();
      fastify.log.info('WebSocket client disconnected');
    });

    socket.on('error', (error: Error) => {
      fastify.log.error({ err: error }, 'WebSocket error');
    });
  });
};
