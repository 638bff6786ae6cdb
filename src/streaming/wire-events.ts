/**
 * WireEvent — the canonical, JSON-safe unit of progress delivered to clients.
 *
 * The kind set is closed. Legacy tool event names are accepted by the
 * normalizer as input only and never appear here.
 */

import type { JsonObject, JsonValue, TerminalReason } from '@/core/types.js';

export type { JsonObject, JsonValue };

// ─── Kinds ──────────────────────────────────────────────────────

export const WIRE_EVENT_KINDS = [
  'on_chain_start',
  'on_chain_end',
  'on_chat_model_start',
  'on_chat_model_stream',
  'on_chat_model_end',
  'on_tool_call',
  'on_error',
] as const;

export type WireEventKind = (typeof WIRE_EVENT_KINDS)[number];

// ─── Payloads ───────────────────────────────────────────────────

export interface NamedPayload {
  name?: string;
}

export interface ChainEndPayload extends NamedPayload {
  /** HITL interrupt values reported by the engine when a run pauses for approval. */
  interrupt?: JsonValue;
}

export interface MessageChunkPayload {
  content: JsonValue;
  id?: string;
  additional_kwargs?: JsonObject;
  response_metadata?: JsonObject;
}

export interface ChatModelStreamPayload {
  chunk: MessageChunkPayload;
}

export interface ChatModelEndPayload extends NamedPayload {
  output?: JsonValue;
}

export type ToolCallPayload =
  | { status: 'running'; name: string; input: JsonValue; id?: string }
  | { status: 'completed'; name: string; output: JsonValue; id?: string; error?: true };

export interface ErrorPayload {
  error: string;
  reason?: TerminalReason;
  events_received?: number;
}

/** Replaces the payload of an event that could not be normalized. */
export interface DegradedPayload {
  status: 'error';
  message: string;
}

export interface WireEventMetadata {
  thread_id: string;
  trace_id?: string;
  request_id?: string;
  seq: number;
  shard: number;
}

// ─── Events ─────────────────────────────────────────────────────

interface WireEventOf<K extends WireEventKind, P> {
  readonly kind: K;
  readonly payload: P;
  readonly metadata?: WireEventMetadata;
}

export type WireEvent =
  | WireEventOf<'on_chain_start', NamedPayload | DegradedPayload>
  | WireEventOf<'on_chain_end', ChainEndPayload | DegradedPayload>
  | WireEventOf<'on_chat_model_start', NamedPayload | DegradedPayload>
  | WireEventOf<'on_chat_model_stream', ChatModelStreamPayload | DegradedPayload>
  | WireEventOf<'on_chat_model_end', ChatModelEndPayload | DegradedPayload>
  | WireEventOf<'on_tool_call', ToolCallPayload | DegradedPayload>
  | WireEventOf<'on_error', ErrorPayload>;

/** Shape of one server→client message. */
export interface WireMessage {
  event: WireEventKind;
  data: WireEvent['payload'];
  metadata?: WireEventMetadata;
}

// ─── Helpers ────────────────────────────────────────────────────

/** True for the payload the normalizer substitutes when an event fails to normalize. */
export function isDegradedPayload(payload: WireEvent['payload']): payload is DegradedPayload {
  return 'status' in payload && payload.status === 'error';
}

/** Attach correlation metadata, returning a new event. */
export function withMetadata(event: WireEvent, metadata: WireEventMetadata): WireEvent {
  return { ...event, metadata };
}

/** Wire representation: `{event, data, metadata?}`. */
export function toWireMessage(event: WireEvent): WireMessage {
  const message: WireMessage = { event: event.kind, data: event.payload };
  if (event.metadata) message.metadata = event.metadata;
  return message;
}

export function serializeWireEvent(event: WireEvent): string {
  return JSON.stringify(toWireMessage(event));
}
