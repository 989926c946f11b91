/**
 * API Module
 *
 * Exports the Fastify-based REST + WebSocket server.
 */

export {
  createServer,
  startServer,
  defaultServerConfig,
  VERSION,
  type ServerConfig,
  type ServerContext,
  type FastifyInstance,
} from './server.js';
