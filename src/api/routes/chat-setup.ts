/**
 * Shared chat setup module.
 * Request validation and response extraction used by both the WebSocket
 * transport and the HTTP chat routes.
 */
import { z } from 'zod';
import type { ZodIssue } from 'zod';
import type { Result } from '@/core/result.js';
import { ok, err } from '@/core/result.js';
import type { RequestId, ThreadId } from '@/core/types.js';
import type { RunRequest } from '@/streaming/stream-coordinator.js';
import type { WireEvent } from '@/streaming/wire-events.js';
import { isDegradedPayload } from '@/streaming/wire-events.js';
import type { ChatToolCall } from '../types.js';

// ─── Zod Schemas ────────────────────────────────────────────────

const threadIdSchema = z.string().trim().min(1).max(256);
const messageSchema = z.string().trim().min(1).max(100_000);
const agentSchema = z.string().trim().min(1).optional();

/** WebSocket message envelope for a chat request. */
export const chatEnvelopeSchema = z.object({
  type: z.literal('chat'),
  message: messageSchema,
  thread_id: threadIdSchema,
  request_id: z.string().trim().min(1).max(256).optional(),
  agent: agentSchema,
});

export type ChatEnvelope = z.infer<typeof chatEnvelopeSchema>;

/** Body of `POST /chat` and `POST /chat/stream`. */
export const chatRequestSchema = z.object({
  thread_id: threadIdSchema,
  message: messageSchema,
  agent: agentSchema,
});

export type ChatRequestBody = z.infer<typeof chatRequestSchema>;

/** Just enough of any client message to route it. */
const envelopeHeaderSchema = z.object({
  type: z.string(),
  request_id: z.unknown().optional(),
});

// ─── Client Message Parsing ─────────────────────────────────────

export type ClientMessageErrorCode = 'INVALID_JSON' | 'VALIDATION_ERROR' | 'UNKNOWN_MESSAGE_TYPE';

/** A client message the socket answers with an error and otherwise ignores. */
export interface ClientMessageError {
  code: ClientMessageErrorCode;
  message: string;
  requestId?: string;
}

/** Render zod issues as `path: message` pairs. */
export function formatIssues(issues: readonly ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/** Parse one raw WebSocket text frame into a chat envelope. */
export function parseClientMessage(raw: string): Result<ChatEnvelope, ClientMessageError> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return err({ code: 'INVALID_JSON', message: 'Invalid JSON format' });
  }

  const header = envelopeHeaderSchema.safeParse(json);
  if (!header.success) {
    return err({ code: 'VALIDATION_ERROR', message: `Validation error: ${formatIssues(header.error.issues)}` });
  }

  const rawRequestId = header.data.request_id;
  const requestId = typeof rawRequestId === 'string' && rawRequestId.trim() ? rawRequestId.trim() : undefined;
  const withRequestId = (error: ClientMessageError): ClientMessageError =>
    requestId ? { ...error, requestId } : error;

  if (header.data.type !== 'chat') {
    return err(withRequestId({
      code: 'UNKNOWN_MESSAGE_TYPE',
      message: `Unknown message type: ${header.data.type}`,
    }));
  }

  const envelope = chatEnvelopeSchema.safeParse(json);
  if (!envelope.success) {
    return err(withRequestId({
      code: 'VALIDATION_ERROR',
      message: `Validation error: ${formatIssues(envelope.error.issues)}`,
    }));
  }
  return ok(envelope.data);
}

/** Build the coordinator request for a validated envelope or HTTP body. */
export function toRunRequest(body: ChatEnvelope | ChatRequestBody): RunRequest {
  const request: RunRequest = {
    threadId: body.thread_id as ThreadId,
    message: body.message,
  };
  if ('request_id' in body && body.request_id) request.requestId = body.request_id as RequestId;
  if (body.agent) request.agentName = body.agent;
  return request;
}

// ─── Response Extraction ────────────────────────────────────────

/** Text streamed by the last model call of a run. */
export function extractAssistantResponse(events: readonly WireEvent[]): string {
  let text = '';
  for (const event of events) {
    if (event.kind === 'on_chat_model_start') {
      text = '';
    } else if (event.kind === 'on_chat_model_stream' && !isDegradedPayload(event.payload)) {
      const content = event.payload.chunk.content;
      if (typeof content === 'string') text += content;
    }
  }
  return text;
}

/** Tool invocations of a run, each start paired with its completion. */
export function extractToolCalls(events: readonly WireEvent[]): ChatToolCall[] {
  const calls: ChatToolCall[] = [];
  const open: ChatToolCall[] = [];

  for (const event of events) {
    if (event.kind !== 'on_tool_call' || isDegradedPayload(event.payload)) continue;
    const payload = event.payload;

    if (payload.status === 'running') {
      const call: ChatToolCall = { name: payload.name, input: payload.input };
      if (payload.id) call.id = payload.id;
      calls.push(call);
      open.push(call);
      continue;
    }

    const index = open.findIndex((call) =>
      payload.id && call.id ? call.id === payload.id : call.name === payload.name,
    );
    const started = index >= 0 ? open.splice(index, 1)[0] : undefined;
    const call: ChatToolCall = started ?? { name: payload.name };
    if (!started) {
      if (payload.id) call.id = payload.id;
      calls.push(call);
    }
    call.output = payload.output;
    if (payload.error) call.error = true;
  }

  return calls;
}
