// @nodepatch/server - Fastify-based HTTP and WebSocket server
export { createServer, type ServerOptions } from './app.js';
export { loadConfig, ConfigSchema, type ServerConfig } from './config.js';
export { GraphSession, type GraphUpdateListener } from './session/graph-session.js';
export * from './types/messages.js';
