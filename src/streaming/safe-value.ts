/**
 * Total coercion of arbitrary engine values into JSON-safe trees.
 *
 * Four cases: primitives pass through, mappings and sequences are walked
 * recursively in order, and anything else becomes a bounded summary string
 * `<TypeName> repr`. Engine messages and routing directives are mappings with
 * a fixed shape. Cycles and excessive nesting degrade to summaries, and
 * nothing here throws.
 */
import { BaseMessage, Send } from '@/engine/messages.js';

import type { JsonObject, JsonValue, MessageChunkPayload } from './wire-events.js';

/** Nesting depth past which values are summarized instead of walked. */
export const MAX_SAFE_DEPTH = 32;

/** Maximum characters of an opaque value's string form kept in its summary. */
export const SUMMARY_REPR_LENGTH = 50;

type Ancestors = WeakSet<object>;

// ─── Public API ─────────────────────────────────────────────────

export function toSafeValue(value: unknown): JsonValue {
  return coerce(value, 0, new WeakSet());
}

/** Flatten an engine message into `{type, content, id?, additional_kwargs?, response_metadata?, name?}`. */
export function serializeMessage(message: BaseMessage): JsonObject {
  return messageToObject(message, 0, new WeakSet());
}

/**
 * Payload of one streamed model token. Accepts message chunks, plain
 * `{content}` objects, or bare strings.
 */
export function serializeChunk(chunk: unknown): MessageChunkPayload {
  if (typeof chunk === 'string') return { content: chunk };

  if (chunk instanceof BaseMessage) {
    const fields = messageToObject(chunk, 0, new WeakSet());
    return {
      content: fields['content'] ?? '',
      ...pickChunkExtras(fields),
    };
  }

  if (isPlainObject(chunk) && 'content' in chunk) {
    const id = chunk['id'];
    return {
      content: toSafeValue(chunk['content']),
      ...pickChunkExtras({
        id: typeof id === 'string' ? id : null,
        additional_kwargs: nonEmptyObject(chunk['additional_kwargs']),
        response_metadata: nonEmptyObject(chunk['response_metadata']),
      }),
    };
  }

  return { content: toSafeValue(chunk) };
}

/** Bounded `<TypeName> repr` description of a value that cannot be walked. */
export function summarizeValue(value: unknown): string {
  const name = typeName(value);
  let repr: string;
  try {
    repr = reprOf(value);
  } catch {
    return `<${name}>`;
  }
  return `<${name}> ${repr.slice(0, SUMMARY_REPR_LENGTH)}`;
}

// ─── Coercion ───────────────────────────────────────────────────

function coerce(value: unknown, depth: number, ancestors: Ancestors): JsonValue {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : null;
    case 'bigint':
      return value.toString();
    case 'undefined':
      return null;
    case 'function':
    case 'symbol':
      return summarizeValue(value);
    default:
      break;
  }
  if (typeof value !== 'object' || value === null) return null;

  if (ancestors.has(value)) return `<${typeName(value)}> [Circular]`;
  if (depth >= MAX_SAFE_DEPTH) return summarizeValue(value);

  ancestors.add(value);
  try {
    if (value instanceof BaseMessage) return messageToObject(value, depth, ancestors);
    if (value instanceof Send) {
      return { type: 'send', node: value.node, arg: coerce(value.arg, depth + 1, ancestors) };
    }
    if (Array.isArray(value) || value instanceof Set) {
      return Array.from(value, (item: unknown) => coerce(item, depth + 1, ancestors));
    }
    if (value instanceof Map) {
      const result: JsonObject = {};
      for (const [key, item] of value) {
        result[String(key)] = coerce(item, depth + 1, ancestors);
      }
      return result;
    }
    if (isPlainObject(value)) {
      const result: JsonObject = {};
      for (const [key, item] of Object.entries(value)) {
        if (item === undefined) continue;
        result[key] = coerce(item, depth + 1, ancestors);
      }
      return result;
    }
    return summarizeValue(value);
  } catch {
    // Throwing getters, revoked proxies and the like.
    return summarizeValue(value);
  } finally {
    ancestors.delete(value);
  }
}

function messageToObject(message: BaseMessage, depth: number, ancestors: Ancestors): JsonObject {
  const result: JsonObject = {
    type: message.type,
    content: coerce(message.content, depth + 1, ancestors),
  };
  if (message.id) result['id'] = message.id;
  if (Object.keys(message.additional_kwargs).length > 0) {
    result['additional_kwargs'] = coerce(message.additional_kwargs, depth + 1, ancestors);
  }
  if (Object.keys(message.response_metadata).length > 0) {
    result['response_metadata'] = coerce(message.response_metadata, depth + 1, ancestors);
  }
  if (message.name) result['name'] = message.name;
  return result;
}

// ─── Helpers ────────────────────────────────────────────────────

function pickChunkExtras(fields: Record<string, JsonValue | undefined>): Omit<MessageChunkPayload, 'content'> {
  const extras: Omit<MessageChunkPayload, 'content'> = {};
  const id = fields['id'];
  if (typeof id === 'string' && id) extras.id = id;
  const kwargs = fields['additional_kwargs'];
  if (isJsonObject(kwargs)) extras.additional_kwargs = kwargs;
  const metadata = fields['response_metadata'];
  if (isJsonObject(metadata)) extras.response_metadata = metadata;
  return extras;
}

function nonEmptyObject(value: unknown): JsonValue {
  if (!isPlainObject(value) || Object.keys(value).length === 0) return null;
  return toSafeValue(value);
}

function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function typeName(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'function') return 'Function';
  if (typeof value !== 'object') return typeof value;
  try {
    const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
    if (typeof ctor === 'function' && ctor.name) return ctor.name;
  } catch {
    return 'Object';
  }
  return 'Object';
}

function reprOf(value: unknown): string {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }
  const text = String(value);
  if (text.startsWith('[object ')) {
    const json = JSON.stringify(value);
    if (typeof json === 'string') return json;
  }
  return text;
}
