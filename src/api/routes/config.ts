/**
 * Public configuration route: the settings a client needs to pace itself.
 * Never exposes keys or connection strings.
 */
import type { FastifyInstance } from 'fastify';
import type { RouteDependencies } from '../types.js';
import { sendSuccess } from '../error-handler.js';

export interface PublicConfig {
  websocket_path: string;
  http_transport_enabled: boolean;
  stream_timeout_seconds: number;
  heartbeat_interval_seconds: number;
  enable_hitl: boolean;
}

export function toPublicConfig(settings: RouteDependencies['settings']): PublicConfig {
  return {
    websocket_path: '/ws',
    http_transport_enabled: settings.httpTransportEnabled,
    stream_timeout_seconds: settings.streamTimeoutSeconds,
    heartbeat_interval_seconds: settings.heartbeatIntervalSeconds,
    enable_hitl: settings.hitlEnabled,
  };
}

/** Register the GET /config/public route. */
export function configRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): void {
  const config = toPublicConfig(deps.settings);

  fastify.get('/config/public', async (_request, reply) =>
    sendSuccess(reply.header('Cache-Control', 'public, max-age=300'), config),
  );
}
