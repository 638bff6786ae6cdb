/**
 * MaintenanceScheduler — periodic checkpoint maintenance.
 *
 * Every interval it removes false `__error__` writes left by completed runs
 * and deletes checkpoints past their retention period. A pass that fails is
 * logged and the next one runs on schedule.
 */
import type { CheckpointStore } from '@/infrastructure/repositories/checkpoint-repository.js';
import type { Logger } from '@/observability/logger.js';
import { cleanupExpiredCheckpoints, cleanupFalseErrors } from '@/streaming/checkpoint-race-guard.js';

// ─── Types ──────────────────────────────────────────────────────

export interface MaintenanceSchedulerOptions {
  store: CheckpointStore;
  logger: Logger;
  retentionDays: number;
  /** Interval between passes in milliseconds. 0 disables the timer; `runNow` still works. */
  intervalMs: number;
}

export interface MaintenanceReport {
  falseErrorsRemoved: number;
  checkpointsDeleted: number;
  durationMs: number;
}

export interface MaintenanceScheduler {
  /** Start the periodic loop. */
  start(): void;
  /** Stop the loop and wait for a pass in progress. */
  stop(): Promise<void>;
  /** Run one maintenance pass now. Concurrent calls share the pass in progress. */
  runNow(): Promise<MaintenanceReport>;
}

// ─── Factory ────────────────────────────────────────────────────

export function createMaintenanceScheduler(options: MaintenanceSchedulerOptions): MaintenanceScheduler {
  const { store, logger, retentionDays, intervalMs } = options;

  let interval: ReturnType<typeof setInterval> | null = null;
  let inFlight: Promise<MaintenanceReport> | null = null;

  async function runPass(): Promise<MaintenanceReport> {
    const startedAt = Date.now();
    const falseErrorsRemoved = await cleanupFalseErrors(store, logger);
    const checkpointsDeleted = await cleanupExpiredCheckpoints(store, retentionDays, logger);
    const report = { falseErrorsRemoved, checkpointsDeleted, durationMs: Date.now() - startedAt };

    logger.debug('Checkpoint maintenance pass finished', {
      component: 'maintenance-scheduler',
      ...report,
    });
    return report;
  }

  function runNow(): Promise<MaintenanceReport> {
    if (inFlight) return inFlight;
    const pass = runPass().finally(() => {
      inFlight = null;
    });
    inFlight = pass;
    return pass;
  }

  async function tick(): Promise<void> {
    try {
      await runNow();
    } catch (error) {
      logger.error('Checkpoint maintenance failed', {
        component: 'maintenance-scheduler',
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return {
    start(): void {
      if (interval || intervalMs <= 0) return;
      interval = setInterval(() => void tick(), intervalMs);
      interval.unref();
      logger.info('Checkpoint maintenance scheduled', {
        component: 'maintenance-scheduler',
        intervalMs,
        retentionDays,
      });
    },

    async stop(): Promise<void> {
      if (interval) {
        clearInterval(interval);
        interval = null;
      }
      if (inFlight) {
        await inFlight.catch(() => undefined);
      }
    },

    runNow,
  };
}
