/**
 * HTTP chat routes.
 *
 * `POST /chat` buffers every WireEvent of the run and answers once it ends.
 * `POST /chat/stream` forwards each event as a Server-Sent Events frame.
 * Both run under the `connection` deadline: on expiry `/chat` answers 504
 * and `/chat/stream` ends with an `event: error` frame carrying the same body.
 */
import type { ServerResponse } from 'node:http';
import type { FastifyInstance, FastifyReply } from 'fastify';
import { TimeoutExceededError } from '@/core/errors.js';
import { redactError } from '@/security/secret-redaction.js';
import type { EventSink, RunOutcome } from '@/streaming/stream-coordinator.js';
import { withDeadline } from '@/streaming/timeout-hierarchy.js';
import type { WireEvent } from '@/streaming/wire-events.js';
import { toWireMessage } from '@/streaming/wire-events.js';
import type { ChatResponse, RouteDependencies } from '../types.js';
import { errorBody, gatewayTimeoutBody, sendError, sendSuccess } from '../error-handler.js';
import {
  chatRequestSchema,
  extractAssistantResponse,
  extractToolCalls,
  toRunRequest,
} from './chat-setup.js';

const SSE_HEADERS = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  Connection: 'keep-alive',
  'X-Accel-Buffering': 'no',
} as const;

// ─── Helpers ────────────────────────────────────────────────────

/** AbortController that aborts when the client goes away before the reply ends. */
function abortOnDisconnect(reply: FastifyReply): AbortController {
  const controller = new AbortController();
  reply.raw.on('close', () => {
    if (!reply.raw.writableEnded) controller.abort();
  });
  return controller;
}

function waitForDrain(stream: ServerResponse): Promise<void> {
  return new Promise((resolve, reject) => {
    const onDrain = (): void => {
      cleanup();
      resolve();
    };
    const onClose = (): void => {
      cleanup();
      reject(new Error('SSE stream closed'));
    };
    const cleanup = (): void => {
      stream.off('drain', onDrain);
      stream.off('close', onClose);
    };
    stream.once('drain', onDrain);
    stream.once('close', onClose);
  });
}

/** Format one Server-Sent Events frame. */
export function formatSseFrame(event: string, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

// ─── Route Plugin ───────────────────────────────────────────────

/** Register the POST /chat and POST /chat/stream routes. */
export function chatRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): void {
  const { coordinator, timeouts, logger } = deps;

  fastify.post('/chat', async (request, reply) => {
    const body = chatRequestSchema.parse(request.body);
    const disconnect = abortOnDisconnect(reply);

    const events: WireEvent[] = [];
    const sink: EventSink = (event) => {
      events.push(event);
    };

    let outcome: RunOutcome;
    try {
      outcome = await withDeadline(
        timeouts.connection,
        (signal) => coordinator.run(toRunRequest(body), sink, signal),
        disconnect.signal,
      );
    } catch (error) {
      if (disconnect.signal.aborted && !(error instanceof TimeoutExceededError)) {
        logger.info('Client disconnected before the run finished', {
          component: 'chat',
          threadId: body.thread_id,
        });
        return sendError(reply, 'CLIENT_CLOSED_REQUEST', 'Client closed the request', 499);
      }
      throw error;
    }

    const response: ChatResponse = {
      thread_id: outcome.threadId,
      trace_id: outcome.traceId,
      state: outcome.state,
      response: extractAssistantResponse(events),
      tool_calls: extractToolCalls(events),
      events: events.map(toWireMessage),
    };
    if (outcome.interrupt !== undefined) response.interrupt = outcome.interrupt;

    return sendSuccess(reply, response);
  });

  fastify.post('/chat/stream', async (request, reply) => {
    const body = chatRequestSchema.parse(request.body);

    reply.hijack();
    const raw = reply.raw;
    raw.writeHead(200, { ...reply.getHeaders(), ...SSE_HEADERS });
    raw.flushHeaders();
    const disconnect = abortOnDisconnect(reply);

    const writeFrame = async (event: string, data: unknown): Promise<void> => {
      if (raw.writableEnded || raw.destroyed) throw new Error('SSE stream closed');
      if (!raw.write(formatSseFrame(event, data))) await waitForDrain(raw);
    };
    const writeFinalFrame = async (data: unknown): Promise<void> => {
      try {
        await writeFrame('error', data);
      } catch (error) {
        logger.debug('Final SSE frame not delivered', {
          component: 'chat',
          error: redactError(error).message,
        });
      }
    };

    const heartbeat = setInterval(() => {
      if (!raw.writableEnded && !raw.destroyed) raw.write(': heartbeat\n\n');
    }, deps.settings.heartbeatIntervalSeconds * 1000);

    const sink: EventSink = (event) => writeFrame(event.kind, toWireMessage(event));
    const run: { promise?: Promise<RunOutcome> } = {};

    try {
      const outcome = await withDeadline(
        timeouts.connection,
        (signal) => {
          run.promise = coordinator.run(toRunRequest(body), sink, signal);
          return run.promise;
        },
        disconnect.signal,
      );
      logger.info('SSE run finished', {
        component: 'chat',
        threadId: outcome.threadId,
        traceId: outcome.traceId,
        state: outcome.state,
        eventsDelivered: outcome.eventsDelivered,
      });
    } catch (error) {
      if (error instanceof TimeoutExceededError) {
        // The coordinator writes its terminal event first.
        await run.promise;
        await writeFinalFrame(gatewayTimeoutBody(error));
      } else if (!disconnect.signal.aborted) {
        const { message, errorType } = redactError(error);
        logger.error('SSE run failed', { component: 'chat', errorType, error: message });
        await writeFinalFrame(errorBody('INTERNAL_ERROR', 'Agent execution failed'));
      }
    } finally {
      clearInterval(heartbeat);
      if (!raw.writableEnded) raw.end();
    }
  });
}
