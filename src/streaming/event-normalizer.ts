/**
 * EventNormalizer — maps one raw engine event to one canonical WireEvent.
 *
 * Pure apart from logging. Never throws: unknown kinds return `null`
 * (counted by the coordinator, not delivered) and events that fail to
 * normalize keep their wire kind with a degraded payload.
 */
import type { RawEngineEvent } from '@/engine/types.js';
import type { Logger } from '@/observability/logger.js';

import { serializeChunk, summarizeValue, toSafeValue } from './safe-value.js';
import type { JsonValue, NamedPayload, WireEvent, WireEventKind } from './wire-events.js';

// ─── Kind Mapping ───────────────────────────────────────────────

type RawEventClass =
  | 'chain_start'
  | 'chain_end'
  | 'model_start'
  | 'model_stream'
  | 'model_end'
  | 'tool_start'
  | 'tool_end'
  | 'tool_error';

/** Wire kinds a raw event can map to. `on_error` is reserved for terminal events. */
export type RelayedKind = Exclude<WireEventKind, 'on_error'>;

/** Tool event names from older engine versions. Accepted as input, never emitted. */
export const LEGACY_TOOL_EVENT_NAMES = [
  'tool_execution_started',
  'tool_execution_completed',
  'on_tool_call_start',
  'on_tool_call_end',
] as const;

const RAW_EVENT_CLASSES: ReadonlyMap<string, RawEventClass> = new Map<string, RawEventClass>([
  ['on_chain_start', 'chain_start'],
  ['on_chain_end', 'chain_end'],
  ['on_chat_model_start', 'model_start'],
  ['on_llm_start', 'model_start'],
  ['on_chat_model_stream', 'model_stream'],
  ['on_llm_stream', 'model_stream'],
  ['on_chat_model_end', 'model_end'],
  ['on_llm_end', 'model_end'],
  ['on_tool_start', 'tool_start'],
  ['on_tool_call_start', 'tool_start'],
  ['tool_execution_started', 'tool_start'],
  ['on_tool_end', 'tool_end'],
  ['on_tool_call_end', 'tool_end'],
  ['tool_execution_completed', 'tool_end'],
  ['on_tool_error', 'tool_error'],
]);

const WIRE_KIND: Record<RawEventClass, RelayedKind> = {
  chain_start: 'on_chain_start',
  chain_end: 'on_chain_end',
  model_start: 'on_chat_model_start',
  model_stream: 'on_chat_model_stream',
  model_end: 'on_chat_model_end',
  tool_start: 'on_tool_call',
  tool_end: 'on_tool_call',
  tool_error: 'on_tool_call',
};

export const DEGRADED_EVENT_MESSAGE = 'Event serialization failed.';

/** Key under which the engine reports HITL interrupts in a chain's output. */
export const INTERRUPT_KEY = '__interrupt__';

/** Wire kind for a raw kind, or undefined when the raw kind is not relayed. */
export function wireKindOf(rawKind: string): RelayedKind | undefined {
  const eventClass = RAW_EVENT_CLASSES.get(rawKind);
  return eventClass ? WIRE_KIND[eventClass] : undefined;
}

// ─── Normalizer ─────────────────────────────────────────────────

export function normalizeEvent(raw: RawEngineEvent, logger?: Logger): WireEvent | null {
  let kind: RelayedKind | undefined;
  try {
    const rawKind = raw.event;
    const eventClass = typeof rawKind === 'string' ? RAW_EVENT_CLASSES.get(rawKind) : undefined;
    if (!eventClass) return null;
    kind = WIRE_KIND[eventClass];
    return buildEvent(eventClass, raw);
  } catch (error) {
    logger?.error('Event normalization failed', {
      component: 'event-normalizer',
      eventKind: safeKind(raw),
      eventKeys: safeKeys(raw),
      errorType: error instanceof Error ? error.name : typeof error,
    });
    if (!kind) return null;
    return { kind, payload: { status: 'error', message: DEGRADED_EVENT_MESSAGE } };
  }
}

function buildEvent(eventClass: RawEventClass, raw: RawEngineEvent): WireEvent {
  const data = raw.data ?? {};

  switch (eventClass) {
    case 'chain_start':
      return { kind: 'on_chain_start', payload: named(raw) };

    case 'chain_end': {
      const output = data['output'];
      const payload: { name?: string; interrupt?: JsonValue } = named(raw);
      if (isRecord(output) && INTERRUPT_KEY in output) {
        payload.interrupt = toSafeValue(output[INTERRUPT_KEY]);
      }
      return { kind: 'on_chain_end', payload };
    }

    case 'model_start':
      return { kind: 'on_chat_model_start', payload: named(raw) };

    case 'model_stream':
      return { kind: 'on_chat_model_stream', payload: { chunk: serializeChunk(data['chunk']) } };

    case 'model_end': {
      const payload: { name?: string; output?: JsonValue } = named(raw);
      if (data['output'] !== undefined) payload.output = toSafeValue(data['output']);
      return { kind: 'on_chat_model_end', payload };
    }

    case 'tool_start':
      return {
        kind: 'on_tool_call',
        payload: {
          status: 'running',
          name: toolName(raw),
          input: toSafeValue(data['input'] ?? data['args'] ?? {}),
          ...runId(raw),
        },
      };

    case 'tool_end':
      return {
        kind: 'on_tool_call',
        payload: {
          status: 'completed',
          name: toolName(raw),
          output: toSafeValue(data['output'] ?? data['result'] ?? null),
          ...runId(raw),
        },
      };

    case 'tool_error':
      return {
        kind: 'on_tool_call',
        payload: {
          status: 'completed',
          name: toolName(raw),
          output: describeToolError(data['error']),
          error: true,
          ...runId(raw),
        },
      };
  }
}

// ─── Helpers ────────────────────────────────────────────────────

function named(raw: RawEngineEvent): NamedPayload {
  return typeof raw.name === 'string' && raw.name ? { name: raw.name } : {};
}

function toolName(raw: RawEngineEvent): string {
  if (typeof raw.name === 'string' && raw.name) return raw.name;
  const fromData = raw.data?.['tool_name'] ?? raw.data?.['name'];
  return typeof fromData === 'string' && fromData ? fromData : 'unknown_tool';
}

function runId(raw: RawEngineEvent): { id?: string } {
  return typeof raw.run_id === 'string' && raw.run_id ? { id: raw.run_id } : {};
}

function describeToolError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  if (typeof error === 'string') return error;
  if (error === undefined || error === null) return 'Tool execution failed';
  return summarizeValue(error);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function safeKind(raw: RawEngineEvent): string {
  try {
    return String(raw.event);
  } catch {
    return '<unreadable>';
  }
}

function safeKeys(raw: RawEngineEvent): string[] {
  try {
    return Object.keys(raw);
  } catch {
    return [];
  }
}
