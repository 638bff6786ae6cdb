/**
 * Maintenance routes — run checkpoint cleanup on demand.
 */
import type { FastifyInstance } from 'fastify';
import type { RouteDependencies } from '../types.js';
import { sendSuccess } from '../error-handler.js';

// ─── Route Plugin ───────────────────────────────────────────────

/** Register maintenance routes. */
export function maintenanceRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): void {
  const { maintenance, logger } = deps;

  // POST /maintenance/checkpoints/cleanup: one maintenance pass now
  fastify.post('/maintenance/checkpoints/cleanup', async (_request, reply) => {
    const report = await maintenance.runNow();
    logger.info('Checkpoint maintenance run on demand', {
      component: 'maintenance',
      ...report,
    });
    return sendSuccess(reply, {
      false_errors_removed: report.falseErrorsRemoved,
      checkpoints_deleted: report.checkpointsDeleted,
      duration_ms: report.durationMs,
    });
  });
}
