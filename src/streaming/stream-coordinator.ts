/**
 * StreamCoordinator — drives one run from the engine's event source to a
 * transport sink.
 *
 * One task per run owns the engine iterator and the RunSession. Each raw
 * event is normalized and delivered (awaited) before the next is pulled, so
 * nothing produced is ever buffered and dropped. Every run that does not
 * complete ends with exactly one terminal `on_error` event, and `run()`
 * always resolves.
 */
import { randomUUID } from 'node:crypto';

import { TimeoutExceededError } from '@/core/errors.js';
import type {
  JsonValue,
  RequestId,
  RunSession,
  RunState,
  TerminalReason,
  ThreadId,
  TraceId,
} from '@/core/types.js';
import type { AgentEngine, RawEngineEvent } from '@/engine/types.js';
import type { Logger } from '@/observability/logger.js';
import { redactError } from '@/security/secret-redaction.js';

import type { CancellationCause } from './cancellation.js';
import { CancellationScope, describeCancellation } from './cancellation.js';
import type { RunRaceGuard } from './checkpoint-race-guard.js';
import { createRunRaceGuard } from './checkpoint-race-guard.js';
import { normalizeEvent } from './event-normalizer.js';
import type { TimeoutHierarchy } from './timeout-hierarchy.js';
import type { ErrorPayload, WireEvent, WireEventMetadata } from './wire-events.js';
import { withMetadata } from './wire-events.js';

// ─── Types ──────────────────────────────────────────────────────

export interface RunRequest {
  threadId: ThreadId;
  message: string;
  requestId?: RequestId;
  /** Correlation ID; generated when omitted. */
  traceId?: TraceId;
  /** Engine to run; the registry default when omitted. */
  agentName?: string;
}

/** Delivers one event to the client. A rejection counts as a disconnect. */
export type EventSink = (event: WireEvent) => Promise<void> | void;

export type { TerminalReason };

export type TerminalRunState = Extract<RunState, 'completed' | 'cancelled' | 'error'>;

export interface RunOutcome {
  state: TerminalRunState;
  threadId: ThreadId;
  traceId: TraceId;
  requestId?: RequestId;
  /** Raw engine events pulled from the source. */
  eventsPulled: number;
  /** Raw engine events the client received, delivered or filtered. A failed delivery is not counted. */
  eventsReceived: number;
  /** WireEvents the sink accepted, the terminal event included. */
  eventsDelivered: number;
  eventKinds: string[];
  reason?: TerminalReason;
  /** Text of the terminal `on_error` event. */
  error?: string;
  /** HITL interrupt reported by the root chain when the run paused for approval. */
  interrupt?: JsonValue;
  durationMs: number;
}

/** Where the coordinator gets engines from. */
export interface EngineResolver {
  get(agentName?: string): Promise<AgentEngine>;
}

export interface StreamCoordinatorOptions {
  engines: EngineResolver;
  timeouts: Pick<TimeoutHierarchy, 'stream'>;
  /** How long after completion late engine failures count as persistence races. */
  graceWindowMs: number;
  logger: Logger;
  /** Millisecond clock. Defaults to Date.now. */
  now?: () => number;
}

export interface StreamCoordinator {
  run(request: RunRequest, sink: EventSink, signal?: AbortSignal): Promise<RunOutcome>;
}

type PullResult =
  | { type: 'event'; event: RawEngineEvent }
  | { type: 'done' }
  | { type: 'failed'; error: unknown };

type Ending =
  | { type: 'completed' }
  | { type: 'cancelled'; cause: CancellationCause }
  | { type: 'error'; error: unknown };

const COMPONENT = 'stream-coordinator';

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  pending: ['streaming', 'cancelled', 'error'],
  streaming: ['completed', 'cancelled', 'error'],
  completed: [],
  cancelled: [],
  error: [],
};

// ─── Helpers ────────────────────────────────────────────────────

function pull(iterator: AsyncIterator<RawEngineEvent>): Promise<PullResult> {
  return Promise.resolve()
    .then(() => iterator.next())
    .then(
      (result): PullResult => (result.done ? { type: 'done' } : { type: 'event', event: result.value }),
      (error: unknown): PullResult => ({ type: 'failed', error }),
    );
}

function metadataFor(session: RunSession): WireEventMetadata {
  const metadata: WireEventMetadata = {
    thread_id: session.threadId,
    trace_id: session.traceId,
    seq: session.sequence,
    shard: session.shardIndex,
  };
  if (session.requestId) metadata.request_id = session.requestId;
  return metadata;
}

function reasonFor(cause: CancellationCause): TerminalReason {
  return cause.type === 'timeout' ? 'timeout' : 'client_disconnect_or_timeout';
}

// ─── Factory ────────────────────────────────────────────────────

export function createStreamCoordinator(options: StreamCoordinatorOptions): StreamCoordinator {
  const { engines, timeouts, graceWindowMs, logger } = options;
  const now = options.now ?? Date.now;

  return {
    async run(request: RunRequest, sink: EventSink, signal?: AbortSignal): Promise<RunOutcome> {
      const startedAt = now();
      const session: RunSession = {
        threadId: request.threadId,
        requestId: request.requestId,
        traceId: request.traceId ?? (randomUUID() as TraceId),
        state: 'pending',
        sequence: 0,
        eventsPulled: 0,
        eventsReceived: 0,
        kindsSeen: new Set<string>(),
        shardIndex: 0,
        startedAt: new Date(startedAt),
      };
      const scope = new CancellationScope();
      scope.link(signal);
      const guard = createRunRaceGuard({
        graceWindowMs,
        logger,
        context: { threadId: session.threadId, traceId: session.traceId },
        now,
      });

      let iterator: AsyncIterator<RawEngineEvent> | undefined;
      let traceReported = false;
      let eventsDelivered = 0;
      let interrupt: JsonValue | undefined;

      const logContext = (): { component: string; threadId: string; traceId: string } => ({
        component: COMPONENT,
        threadId: session.threadId,
        traceId: session.traceId,
      });

      const transition = (next: RunState): void => {
        if (!TRANSITIONS[session.state].includes(next)) {
          logger.error('Illegal run state transition', {
            ...logContext(),
            from: session.state,
            to: next,
          });
          return;
        }
        session.state = next;
      };

      const deliver = async (event: WireEvent): Promise<void> => {
        session.sequence += 1;
        try {
          await sink(withMetadata(event, metadataFor(session)));
        } catch (error) {
          session.sequence -= 1;
          throw error;
        }
        eventsDelivered += 1;
      };

      const record = (raw: RawEngineEvent): void => {
        session.eventsPulled += 1;
        session.eventsReceived += 1;
        if (typeof raw.event === 'string') session.kindsSeen.add(raw.event);
        const reported = raw.metadata?.['trace_id'];
        if (!traceReported && typeof reported === 'string' && reported) {
          session.traceId = reported as TraceId;
          traceReported = true;
        }
      };

      /** Next raw event, or the cancellation cause if the scope is cancelled first. */
      const pullOrCancel = (
        source: AsyncIterator<RawEngineEvent>,
      ): Promise<PullResult | { type: 'cancelled'; cause: CancellationCause }> => {
        const cause = scope.reason;
        if (cause) return Promise.resolve({ type: 'cancelled', cause });

        return new Promise((resolve) => {
          let settled = false;
          const unsubscribe = scope.onCancel((cancelCause) => {
            if (settled) return;
            settled = true;
            resolve({ type: 'cancelled', cause: cancelCause });
          });
          void pull(source).then((result) => {
            unsubscribe();
            if (!settled) {
              settled = true;
              resolve(result);
            } else if (result.type === 'failed') {
              logger.debug('Engine event source failed after cancellation', {
                ...logContext(),
                error: redactError(result.error).message,
              });
            }
          });
        });
      };

      /** Next raw event, or `expired` once `ms` have passed. */
      const pullWithin = (
        source: AsyncIterator<RawEngineEvent>,
        ms: number,
      ): Promise<PullResult | { type: 'expired' }> =>
        new Promise((resolve) => {
          let settled = false;
          const timer = setTimeout(() => {
            settled = true;
            resolve({ type: 'expired' });
          }, ms);
          void pull(source).then((result) => {
            clearTimeout(timer);
            if (!settled) {
              settled = true;
              resolve(result);
            } else if (result.type === 'failed') {
              guard.report(result.error, 'engine');
            }
          });
        });

      const closeIterator = (source: AsyncIterator<RawEngineEvent> | undefined, onError: (error: unknown) => void): void => {
        if (!source?.return) return;
        void Promise.resolve()
          .then(() => source.return?.())
          .catch(onError);
      };

      const failureEnding = (error: unknown): Ending => {
        const cause = scope.reason;
        if (cause) return { type: 'cancelled', cause };
        if (error instanceof TimeoutExceededError) {
          return {
            type: 'cancelled',
            cause: { type: 'timeout', scope: error.scope, timeoutMs: error.timeoutMs },
          };
        }
        return { type: 'error', error };
      };

      // ─── Streaming ──────────────────────────────────────────

      const drive = async (): Promise<Ending> => {
        const early = scope.reason;
        if (early) return { type: 'cancelled', cause: early };

        let source: AsyncIterator<RawEngineEvent>;
        try {
          const engine = await engines.get(request.agentName);
          source = engine
            .streamEvents(
              { message: request.message },
              { threadId: session.threadId, signal: scope.signal, traceId: session.traceId },
            )
            [Symbol.asyncIterator]();
        } catch (error) {
          return failureEnding(error);
        }
        iterator = source;
        transition('streaming');
        scope.startDeadline(timeouts.stream);

        let depth = 0;
        for (;;) {
          const next = await pullOrCancel(source);
          if (next.type === 'cancelled') return { type: 'cancelled', cause: next.cause };
          if (next.type === 'failed') return failureEnding(next.error);
          if (next.type === 'done') {
            guard.markComplete();
            return { type: 'completed' };
          }

          const raw = next.event;
          record(raw);
          if (raw.event === 'on_chain_start') depth += 1;
          let rootEnded = false;
          if (raw.event === 'on_chain_end') {
            depth = Math.max(0, depth - 1);
            rootEnded = depth === 0;
          }
          if (rootEnded) guard.markComplete();

          const wire = normalizeEvent(raw, logger);
          if (!wire) {
            if (rootEnded) return { type: 'completed' };
            continue;
          }
          if (rootEnded && wire.kind === 'on_chain_end' && 'interrupt' in wire.payload) {
            interrupt = wire.payload.interrupt;
          }

          try {
            await deliver(wire);
          } catch (error) {
            if (guard.isComplete()) {
              guard.report(error, 'delivery');
              return { type: 'completed' };
            }
            // The client never saw this event
            session.eventsReceived -= 1;
            logger.debug('Event delivery failed, treating as disconnect', {
              ...logContext(),
              error: redactError(error).message,
            });
            // A deadline that fired while the delivery was pending still wins
            return { type: 'cancelled', cause: scope.reason ?? { type: 'disconnect' } };
          }

          if (wire.kind === 'on_chat_model_end') session.shardIndex += 1;
          if (rootEnded) return { type: 'completed' };
        }
      };

      /** Keep pulling for the grace window so the engine can finish persisting. Nothing is delivered. */
      const drain = async (): Promise<void> => {
        const source = iterator;
        if (!source) return;

        let discarded = 0;
        for (;;) {
          const remaining = guard.remainingGraceMs();
          if (remaining <= 0) break;
          const next = await pullWithin(source, remaining);
          if (next.type === 'done') return;
          if (next.type === 'failed') {
            guard.report(next.error, 'engine');
            return;
          }
          if (next.type === 'expired') break;
          discarded += 1;
        }

        logger.debug('Engine still running after grace window, closing event source', {
          ...logContext(),
          discardedEvents: discarded,
          graceWindowMs,
        });
        closeIterator(source, (error) => {
          guard.report(error, 'close');
        });
      };

      const emitTerminal = async (payload: ErrorPayload): Promise<void> => {
        try {
          await deliver({ kind: 'on_error', payload });
        } catch (error) {
          logger.warn('Terminal event delivery failed', {
            ...logContext(),
            error: redactError(error).message,
          });
        }
      };

      // ─── Termination ────────────────────────────────────────

      let ending: Ending;
      try {
        ending = await drive();
      } catch (error) {
        ending = failureEnding(error);
      }

      let reason: TerminalReason | undefined;
      let errorText: string | undefined;

      try {
        switch (ending.type) {
          case 'completed': {
            transition('completed');
            scope.clearDeadline();
            await drain();
            break;
          }

          case 'cancelled': {
            scope.cancel(ending.cause);
            transition('cancelled');
            reason = reasonFor(ending.cause);
            errorText = describeCancellation(ending.cause);
            const eventsReceived = session.eventsReceived;
            await emitTerminal({ error: errorText, reason, events_received: eventsReceived });
            logger.warn('Agent run cancelled', {
              ...logContext(),
              requestId: session.requestId,
              eventsReceived,
              eventsPulled: session.eventsPulled,
              eventKinds: [...session.kindsSeen],
              reason,
            });
            closeIterator(iterator, (error) => {
              logger.debug('Engine event source close failed after cancellation', {
                ...logContext(),
                error: redactError(error).message,
              });
            });
            break;
          }

          case 'error': {
            transition('error');
            reason = 'engine_error';
            errorText = 'Agent execution failed';
            const { message, errorType } = redactError(ending.error);
            logger.error('Agent run failed', {
              ...logContext(),
              eventsReceived: session.eventsReceived,
              eventKinds: [...session.kindsSeen],
              errorType,
              error: message,
            });
            await emitTerminal({ error: errorText, reason, events_received: session.eventsReceived });
            closeIterator(iterator, (error) => {
              logger.debug('Engine event source close failed after error', {
                ...logContext(),
                error: redactError(error).message,
              });
            });
            break;
          }
        }
      } finally {
        scope.dispose();
      }

      session.completedAt = new Date(now());
      const outcome: RunOutcome = {
        state: ending.type,
        threadId: session.threadId,
        traceId: session.traceId,
        eventsPulled: session.eventsPulled,
        eventsReceived: session.eventsReceived,
        eventsDelivered,
        eventKinds: [...session.kindsSeen],
        durationMs: now() - startedAt,
      };
      if (session.requestId) outcome.requestId = session.requestId;
      if (reason) outcome.reason = reason;
      if (errorText) outcome.error = errorText;
      if (interrupt !== undefined) outcome.interrupt = interrupt;
      return outcome;
    },
  };
}
