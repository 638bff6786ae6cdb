/**
 * Health route — liveness plus the agents and transports being served.
 */
import type { FastifyInstance } from 'fastify';
import type { RouteDependencies } from '../types.js';

/** Register the GET /health route. */
export function healthRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): void {
  fastify.get('/health', () => ({
    status: 'ok',
    timestamp: new Date().toISOString(),
    agents: deps.engines.names(),
    transports: {
      websocket: true,
      http: deps.settings.httpTransportEnabled,
    },
  }));
}
