/**
 * Route registration — registers all API route plugins with Fastify.
 * The HTTP chat transport is registered only when enabled.
 */
import type { FastifyInstance } from 'fastify';
import type { RouteDependencies } from '../types.js';
import { healthRoutes } from './health.js';
import { configRoutes } from './config.js';
import { chatStreamRoutes } from './chat-stream.js';
import { chatRoutes } from './chat.js';
import { agentRoutes } from './agents.js';
import { maintenanceRoutes } from './maintenance.js';

/** Register all API routes on the Fastify instance. */
export async function registerRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): Promise<void> {
  await fastify.register(healthRoutes, deps);
  await fastify.register(configRoutes, deps);
  await fastify.register(chatStreamRoutes, deps);
  if (deps.settings.httpTransportEnabled) {
    await fastify.register(chatRoutes, deps);
  }
  await fastify.register(agentRoutes, deps);
  await fastify.register(maintenanceRoutes, deps);
}
