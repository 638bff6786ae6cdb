/**
 * CheckpointRaceGuard — absorbs the benign race between a run's logical
 * completion and the engine's persistence finalization.
 *
 * Per run, a cancellation or error observed within the grace window after
 * completion is a false positive: it is logged at debug level and never
 * reaches the client. The maintenance half deletes the `__error__` writes
 * such races leave behind in the checkpoint store.
 */
import type { CheckpointStore } from '@/infrastructure/repositories/checkpoint-repository.js';
import { ERROR_CHANNEL } from '@/infrastructure/repositories/checkpoint-repository.js';
import type { Logger } from '@/observability/logger.js';
import { redactError } from '@/security/secret-redaction.js';

// ─── Per-Run Guard ──────────────────────────────────────────────

export type LateSignalClass = 'suppressed' | 'late' | 'before_completion';

export interface RaceGuardOptions {
  graceWindowMs: number;
  logger: Logger;
  /** Correlation fields added to every log entry. */
  context: { threadId: string; traceId?: string };
  /** Millisecond clock. Defaults to Date.now. */
  now?: () => number;
}

export interface RunRaceGuard {
  /** Record logical completion. Idempotent; the first call fixes the completion time. */
  markComplete(): void;
  isComplete(): boolean;
  /** Milliseconds of grace left; 0 before completion or once the window has passed. */
  remainingGraceMs(): number;
  /** Classify a cancellation/error signal observed now. */
  classifyLateSignal(): LateSignalClass;
  /**
   * Classify and log a post-completion signal.
   * Returns the classification; `before_completion` signals are not logged here.
   */
  report(signal: unknown, source: string): LateSignalClass;
}

export function createRunRaceGuard(options: RaceGuardOptions): RunRaceGuard {
  const { graceWindowMs, logger, context } = options;
  const now = options.now ?? Date.now;
  let completedAt: number | undefined;

  const classifyLateSignal = (): LateSignalClass => {
    if (completedAt === undefined) return 'before_completion';
    return now() - completedAt <= graceWindowMs ? 'suppressed' : 'late';
  };

  return {
    markComplete(): void {
      completedAt ??= now();
    },

    isComplete(): boolean {
      return completedAt !== undefined;
    },

    remainingGraceMs(): number {
      if (completedAt === undefined) return 0;
      return Math.max(0, completedAt + graceWindowMs - now());
    },

    classifyLateSignal,

    report(signal: unknown, source: string): LateSignalClass {
      const classification = classifyLateSignal();
      if (classification === 'before_completion') return classification;

      const { message, errorType } = redactError(signal);
      const elapsedMs = completedAt === undefined ? 0 : now() - completedAt;
      const entry = {
        component: 'checkpoint-race-guard',
        ...context,
        source,
        errorType,
        error: message,
        elapsedMs,
        graceWindowMs,
      };

      if (classification === 'suppressed') {
        logger.debug('Post-completion race suppressed', entry);
      } else {
        logger.error('Post-completion error after grace window', entry);
      }
      return classification;
    },
  };
}

// ─── Maintenance ────────────────────────────────────────────────

/**
 * Delete `__error__` writes that belong to checkpoints of runs that completed
 * naturally. Returns the number of writes deleted.
 */
export async function cleanupFalseErrors(store: CheckpointStore, logger: Logger): Promise<number> {
  const errorWrites = await store.listWritesByChannel(ERROR_CHANNEL);
  if (errorWrites.length === 0) return 0;

  const falseErrors: string[] = [];
  for (const write of errorWrites) {
    const checkpoint = await store.getCheckpoint(write.threadId, write.checkpointId);
    if (checkpoint?.metadata.status === 'completed') falseErrors.push(write.id);
  }

  const removed = await store.deleteWrites(falseErrors);
  if (removed > 0) {
    logger.info('Cleaned up false error entries from successful runs', {
      component: 'checkpoint-race-guard',
      removedCount: removed,
      scannedCount: errorWrites.length,
    });
  }
  return removed;
}

/** Delete checkpoints older than `retentionDays`. Returns the number deleted. */
export async function cleanupExpiredCheckpoints(
  store: CheckpointStore,
  retentionDays: number,
  logger: Logger,
  now: Date = new Date(),
): Promise<number> {
  const cutoff = new Date(now.getTime() - retentionDays * 24 * 60 * 60 * 1000);
  const deleted = await store.deleteOlderThan(cutoff);
  if (deleted > 0) {
    logger.info('Cleaned up old checkpoints', {
      component: 'checkpoint-race-guard',
      deletedCount: deleted,
      cutoff: cutoff.toISOString(),
      retentionDays,
    });
  }
  return deleted;
}
