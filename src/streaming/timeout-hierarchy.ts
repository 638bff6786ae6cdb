/**
 * TimeoutHierarchy — the nested deadline scopes of a run.
 *
 *   connection (request/response transports only)
 *     └─ stream (one run, wall clock)
 *          └─ tool (one tool invocation)
 *               └─ web_search (network-bound tool calls)
 *
 * Ordering is checked once at startup; a violating configuration never serves traffic.
 */
import type { TimeoutSettings } from '@/config/schema.js';
import { MAX_TIMER_SECONDS } from '@/config/schema.js';
import type { TimeoutInvariantViolation } from '@/core/errors.js';
import { ConfigInvariantError, TimeoutExceededError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

// ─── Types ──────────────────────────────────────────────────────

export type TimeoutScopeName = 'connection' | 'stream' | 'tool' | 'web_search';

export interface TimeoutScope {
  readonly name: TimeoutScopeName;
  readonly deadlineMs: number;
}

export interface TimeoutHierarchy {
  readonly connection: TimeoutScope;
  readonly stream: TimeoutScope;
  readonly tool: TimeoutScope;
  readonly webSearch: TimeoutScope;
}

// ─── Construction & Validation ──────────────────────────────────

const seconds = (value: number): number => Math.round(value * 1000);

/** Build the scopes from settings without checking their ordering. */
export function createTimeoutHierarchy(settings: TimeoutSettings): TimeoutHierarchy {
  return {
    connection: { name: 'connection', deadlineMs: seconds(settings.requestTimeoutSeconds) },
    stream: { name: 'stream', deadlineMs: seconds(settings.streamTimeoutSeconds) },
    tool: { name: 'tool', deadlineMs: seconds(settings.toolTimeoutSeconds) },
    webSearch: { name: 'web_search', deadlineMs: seconds(settings.webSearchTimeoutSeconds) },
  };
}

const TIMER_SETTINGS = [
  'streamTimeoutSeconds',
  'requestTimeoutSeconds',
  'toolTimeoutSeconds',
  'webSearchTimeoutSeconds',
] as const;

/** Every ordering rule the settings break, and every timeout too long for a timer. Empty when the hierarchy is valid. */
export function findTimeoutViolations(settings: TimeoutSettings): TimeoutInvariantViolation[] {
  const violations: TimeoutInvariantViolation[] = [];
  const check = (
    setting: keyof TimeoutSettings,
    value: number,
    limit: keyof TimeoutSettings,
    limitValue: number,
    strict: boolean,
  ): void => {
    const holds = strict ? value < limitValue : value <= limitValue;
    if (!holds) {
      violations.push({
        setting,
        limit,
        value,
        limitValue,
        rule: strict ? 'less than' : 'at most',
      });
    }
  };

  check('toolTimeoutSeconds', settings.toolTimeoutSeconds, 'streamTimeoutSeconds', settings.streamTimeoutSeconds, true);
  check('webSearchTimeoutSeconds', settings.webSearchTimeoutSeconds, 'streamTimeoutSeconds', settings.streamTimeoutSeconds, true);
  check('webSearchTimeoutSeconds', settings.webSearchTimeoutSeconds, 'toolTimeoutSeconds', settings.toolTimeoutSeconds, false);
  if (settings.httpTransportEnabled) {
    check('requestTimeoutSeconds', settings.requestTimeoutSeconds, 'streamTimeoutSeconds', settings.streamTimeoutSeconds, true);
  }

  // Node clamps longer timer delays to 1 ms
  for (const setting of TIMER_SETTINGS) {
    if (settings[setting] > MAX_TIMER_SECONDS) {
      violations.push({
        setting,
        limit: 'maxTimerSeconds',
        value: settings[setting],
        limitValue: MAX_TIMER_SECONDS,
        rule: 'at most',
      });
    }
  }
  return violations;
}

/**
 * Validate the ordering and build the hierarchy.
 * The WebSocket transport is exempt from `connection`, so that rule only
 * applies while the HTTP transport is enabled.
 */
export function validateTimeoutHierarchy(
  settings: TimeoutSettings,
): Result<TimeoutHierarchy, ConfigInvariantError> {
  const violations = findTimeoutViolations(settings);
  if (violations.length > 0) return err(new ConfigInvariantError(violations));
  return ok(createTimeoutHierarchy(settings));
}

// ─── Deadlines ──────────────────────────────────────────────────

/**
 * Run `operation` under a scope's deadline.
 *
 * The operation receives a signal that aborts when the deadline passes or
 * `parentSignal` aborts. The returned promise rejects with
 * TimeoutExceededError on expiry, or with the parent's reason on abort,
 * without waiting for an operation that ignores its signal.
 */
export function withDeadline<T>(
  scope: TimeoutScope,
  operation: (signal: AbortSignal) => Promise<T>,
  parentSignal?: AbortSignal,
): Promise<T> {
  if (parentSignal?.aborted) {
    return Promise.reject(abortReason(parentSignal));
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const onParentAbort = (): void => {
      const reason = parentSignal ? abortReason(parentSignal) : new Error('Aborted');
      controller.abort(reason);
      reject(reason);
    };

    const timer = setTimeout(() => {
      const timeout = new TimeoutExceededError(scope.name, scope.deadlineMs);
      controller.abort(timeout);
      reject(timeout);
    }, scope.deadlineMs);

    parentSignal?.addEventListener('abort', onParentAbort, { once: true });

    const cleanup = (): void => {
      clearTimeout(timer);
      parentSignal?.removeEventListener('abort', onParentAbort);
    };

    void Promise.resolve()
      .then(() => operation(controller.signal))
      .then(
        (value) => {
          cleanup();
          resolve(value);
        },
        (error: unknown) => {
          cleanup();
          reject(error);
        },
      );
  });
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error('Aborted');
}
