/**
 * WebSocket chat streaming route.
 *
 * Accepts a WebSocket connection at /ws, receives chat envelopes and streams
 * every WireEvent of the run back as one JSON message, in order.
 *
 * Protocol:
 *   Client → Server: { type: "chat", message, thread_id, request_id?, agent? }
 *   Server → Client: { event, data, metadata } per WireEvent, or
 *                    { type: "error", code, error, request_id? }
 *
 * Only one run may be active per connection. A second message while a run
 * is in progress receives a BUSY error. Closing the socket aborts the run.
 * The connection is kept alive with pings; a missed pong terminates it.
 */
import type { FastifyInstance } from 'fastify';
import type { RawData, WebSocket } from 'ws';
import { redactError } from '@/security/secret-redaction.js';
import type { EventSink } from '@/streaming/stream-coordinator.js';
import { serializeWireEvent } from '@/streaming/wire-events.js';
import type { RouteDependencies } from '../types.js';
import { parseClientMessage, toRunRequest } from './chat-setup.js';

// ─── Socket Interface ───────────────────────────────────────────

/** Minimal WebSocket interface consumed by the route handler. */
export interface ChatSocket {
  isOpen(): boolean;
  /** Resolves once the frame is written; rejects if the socket is gone. */
  send(data: string): Promise<void>;
  ping(): void;
  terminate(): void;
  onMessage(listener: (text: string) => void): void;
  onPong(listener: () => void): void;
  onClose(listener: () => void): void;
  onError(listener: (error: Error) => void): void;
}

/** Error message sent to the client. */
export interface SocketErrorMessage {
  type: 'error';
  code: string;
  error: string;
  request_id?: string;
}

function rawDataToText(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  if (Buffer.isBuffer(data)) return data.toString('utf-8');
  return Buffer.from(data).toString('utf-8');
}

/** Adapt a `ws` socket to ChatSocket. */
export function adaptWebSocket(socket: WebSocket): ChatSocket {
  return {
    isOpen: () => socket.readyState === socket.OPEN,
    send: (data) =>
      new Promise((resolve, reject) => {
        if (socket.readyState !== socket.OPEN) {
          reject(new Error('WebSocket is not open'));
          return;
        }
        socket.send(data, (error) => {
          if (error) reject(error);
          else resolve();
        });
      }),
    ping: () => {
      socket.ping();
    },
    terminate: () => {
      socket.terminate();
    },
    onMessage: (listener) => {
      socket.on('message', (data) => {
        listener(rawDataToText(data));
      });
    },
    onPong: (listener) => {
      socket.on('pong', listener);
    },
    onClose: (listener) => {
      socket.on('close', listener);
    },
    onError: (listener) => {
      socket.on('error', listener);
    },
  };
}

// ─── Connection Handler ─────────────────────────────────────────

type SocketDeps = Pick<RouteDependencies, 'coordinator' | 'settings' | 'logger'>;

/** Set up event handlers on a single WebSocket connection. */
export function setupSocket(socket: ChatSocket, deps: SocketDeps): void {
  const { coordinator, logger } = deps;
  let active: AbortController | null = null;
  let closed = false;
  let alive = true;

  const sendError = (code: string, error: string, requestId?: string): void => {
    const message: SocketErrorMessage = { type: 'error', code, error };
    if (requestId) message.request_id = requestId;
    if (!socket.isOpen()) return;
    socket.send(JSON.stringify(message)).catch((sendFailure: unknown) => {
      logger.debug('Error message not delivered', {
        component: 'chat-stream',
        error: redactError(sendFailure).message,
      });
    });
  };

  const heartbeat = setInterval(() => {
    if (!alive) {
      logger.warn('WebSocket missed heartbeat, terminating', { component: 'chat-stream' });
      socket.terminate();
      return;
    }
    alive = false;
    socket.ping();
  }, deps.settings.heartbeatIntervalSeconds * 1000);

  socket.onPong(() => {
    alive = true;
  });

  socket.onMessage((text) => {
    const parsed = parseClientMessage(text);
    if (!parsed.ok) {
      logger.debug('Rejected client message', {
        component: 'chat-stream',
        code: parsed.error.code,
      });
      sendError(parsed.error.code, parsed.error.message, parsed.error.requestId);
      return;
    }

    const envelope = parsed.value;
    if (active) {
      sendError('BUSY', 'Agent run already in progress', envelope.request_id);
      return;
    }

    const controller = new AbortController();
    active = controller;
    const sink: EventSink = (event) => socket.send(serializeWireEvent(event));

    coordinator
      .run(toRunRequest(envelope), sink, controller.signal)
      .then((outcome) => {
        logger.info('WebSocket run finished', {
          component: 'chat-stream',
          threadId: outcome.threadId,
          traceId: outcome.traceId,
          state: outcome.state,
          eventsDelivered: outcome.eventsDelivered,
        });
      })
      .catch((error: unknown) => {
        const { message, errorType } = redactError(error);
        logger.error('WebSocket run failed', { component: 'chat-stream', errorType, error: message });
        sendError('INTERNAL_ERROR', 'Agent execution failed', envelope.request_id);
      })
      .finally(() => {
        if (active === controller) active = null;
      });
  });

  socket.onClose(() => {
    if (closed) return;
    closed = true;
    clearInterval(heartbeat);
    active?.abort();
  });

  socket.onError((error: Error) => {
    logger.error('WebSocket error', {
      component: 'chat-stream',
      error: redactError(error).message,
    });
  });
}

// ─── Route Plugin ───────────────────────────────────────────────

/** Register the WebSocket /ws route. */
export function chatStreamRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): void {
  fastify.get('/ws', { websocket: true }, (socket) => {
    setupSocket(adaptWebSocket(socket), deps);
  });
}
