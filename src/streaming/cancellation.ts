/**
 * CancellationScope — the explicit cancellation token of one run.
 *
 * Wraps an AbortController whose signal is handed to the engine, records
 * the first cause of cancellation, and notifies listeners the coordinator
 * registers around each pull from the event source.
 */
import { TimeoutExceededError } from '@/core/errors.js';

import type { TimeoutScope } from './timeout-hierarchy.js';

// ─── Types ──────────────────────────────────────────────────────

export type CancellationCause =
  /** Client disconnect, explicit abort, or a failed delivery. */
  | { type: 'disconnect' }
  | { type: 'timeout'; scope: string; timeoutMs: number };

// ─── Scope ──────────────────────────────────────────────────────

export type CancellationListener = (cause: CancellationCause) => void;

export class CancellationScope {
  private readonly controller = new AbortController();
  private readonly listeners = new Set<CancellationListener>();
  private readonly detachers: (() => void)[] = [];
  private cause: CancellationCause | undefined;
  private deadline: NodeJS.Timeout | undefined;

  /** Signal handed to the engine; aborts on cancellation. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isCancelled(): boolean {
    return this.cause !== undefined;
  }

  get reason(): CancellationCause | undefined {
    return this.cause;
  }

  /** Cancel with `cause`. Only the first call has any effect. */
  cancel(cause: CancellationCause): void {
    if (this.cause) return;
    this.cause = cause;
    this.clearDeadline();
    this.controller.abort(
      cause.type === 'timeout'
        ? new TimeoutExceededError(cause.scope, cause.timeoutMs)
        : new Error('Agent execution was cancelled'),
    );
    for (const listener of [...this.listeners]) listener(cause);
    this.listeners.clear();
  }

  /**
   * Call `listener` once on cancellation. Runs it immediately if the scope
   * is already cancelled. Returns an unsubscribe function.
   */
  onCancel(listener: CancellationListener): () => void {
    if (this.cause) {
      listener(this.cause);
      return () => undefined;
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Cancel when `signal` aborts. An abort whose reason is a
   * TimeoutExceededError (a connection deadline) counts as a timeout.
   */
  link(signal: AbortSignal | undefined): void {
    if (!signal) return;
    const onAbort = (): void => {
      this.cancel(causeFromReason(signal.reason));
    };
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    this.detachers.push(() => signal.removeEventListener('abort', onAbort));
  }

  /** Cancel with a timeout cause once the scope's deadline passes. */
  startDeadline(scope: TimeoutScope): void {
    if (this.cause) return;
    this.clearDeadline();
    this.deadline = setTimeout(() => {
      this.cancel({ type: 'timeout', scope: scope.name, timeoutMs: scope.deadlineMs });
    }, scope.deadlineMs);
  }

  clearDeadline(): void {
    if (this.deadline) {
      clearTimeout(this.deadline);
      this.deadline = undefined;
    }
  }

  /** Release timers and listeners. Does not cancel. */
  dispose(): void {
    this.clearDeadline();
    this.listeners.clear();
    for (const detach of this.detachers.splice(0)) detach();
  }
}

// ─── Helpers ────────────────────────────────────────────────────

export function causeFromReason(reason: unknown): CancellationCause {
  if (reason instanceof TimeoutExceededError) {
    return { type: 'timeout', scope: reason.scope, timeoutMs: reason.timeoutMs };
  }
  return { type: 'disconnect' };
}

/** Human-readable text of the terminal event for a cause. */
export function describeCancellation(cause: CancellationCause): string {
  if (cause.type === 'timeout') {
    return `Agent execution was cancelled: ${cause.scope} timeout of ${String(cause.timeoutMs / 1000)}s exceeded`;
  }
  return 'Agent execution was cancelled';
}
