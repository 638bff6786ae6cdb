// ─── Branded ID Types ────────────────────────────────────────────
// Branded types prevent accidentally passing a TraceId where a ThreadId is expected.

declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

export type ThreadId = Brand<string, 'ThreadId'>;
export type TraceId = Brand<string, 'TraceId'>;
export type RequestId = Brand<string, 'RequestId'>;
export type CheckpointId = Brand<string, 'CheckpointId'>;

// ─── JSON ───────────────────────────────────────────────────────

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

// ─── Run Lifecycle ──────────────────────────────────────────────

/**
 * Lifecycle of one run. `completed`, `cancelled` and `error` are terminal:
 * no transition leaves them.
 */
export type RunState = 'pending' | 'streaming' | 'completed' | 'cancelled' | 'error';

/** Why a run stopped early, as reported in the terminal `on_error` event. */
export type TerminalReason = 'client_disconnect_or_timeout' | 'timeout' | 'engine_error';

// ─── Run Session ────────────────────────────────────────────────

/**
 * Bookkeeping for one client-initiated run.
 * Owned by the coordinator task driving the run; never shared across runs.
 */
export interface RunSession {
  readonly threadId: ThreadId;
  readonly requestId?: RequestId;
  /** Correlation ID. Taken from the engine's event metadata when it reports one. */
  traceId: TraceId;
  state: RunState;
  /** Sequence number of the last WireEvent produced for this run. */
  sequence: number;
  /** Raw engine events pulled from the source, including one whose delivery failed. */
  eventsPulled: number;
  /** Raw engine events accounted to the client: delivered, or filtered by the normalizer. */
  eventsReceived: number;
  /** Distinct raw event kinds, in first-seen order. */
  readonly kindsSeen: Set<string>;
  /** Index of the current model-output shard (bumped on every model completion). */
  shardIndex: number;
  readonly startedAt: Date;
  completedAt?: Date;
}
