// WebSocket send utilities
import type { WebSocket } from '@fastify/websocket';
import type { FastifyBaseLogger } from 'fastify';
import type { ServerMessage } from '../types/messages.js';

// WebSocket ready states
const WS_OPEN = 1;

/**
 * Check if a WebSocket connection is open.
 */
export function isWsConnected(ws: WebSocket): boolean {
  return ws.readyState === WS_OPEN;
}

/**
 * Send a message without waiting for it to flush.
 * Send failures are logged; the client may have gone away mid-send.
 */
export function wsSendAsync(ws: WebSocket, payload: ServerMessage, log: FastifyBaseLogger): void {
  if (!isWsConnected(ws)) {
    return;
  }

  ws.send(JSON.stringify(payload), (error?: Error) => {
    if (error) {
      log.warn({ err: error }, 'WebSocket send failed');
    }
  });
}
