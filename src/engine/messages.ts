/**
 * Message vocabulary of the agent engine.
 *
 * Raw engine events carry these objects (not plain JSON) in their `data`
 * fields; the event normalizer recognizes them by class and flattens them
 * into wire payloads.
 */

// ─── Types ──────────────────────────────────────────────────────

export type MessageType = 'human' | 'ai' | 'system' | 'tool';

export type MessageContent = string | Record<string, unknown>[];

/** A tool invocation requested by the model. */
export interface ToolCallRequest {
  id: string;
  name: string;
  args: Record<string, unknown>;
}

export interface MessageFields {
  content: MessageContent;
  id?: string;
  name?: string;
  additional_kwargs?: Record<string, unknown>;
  response_metadata?: Record<string, unknown>;
}

// ─── Messages ───────────────────────────────────────────────────

export abstract class BaseMessage {
  abstract readonly type: MessageType;
  readonly content: MessageContent;
  readonly id?: string;
  readonly name?: string;
  readonly additional_kwargs: Record<string, unknown>;
  readonly response_metadata: Record<string, unknown>;

  constructor(fields: MessageFields | string) {
    const normalized = typeof fields === 'string' ? { content: fields } : fields;
    this.content = normalized.content;
    this.id = normalized.id;
    this.name = normalized.name;
    this.additional_kwargs = normalized.additional_kwargs ?? {};
    this.response_metadata = normalized.response_metadata ?? {};
  }

  /** Plain-text view of the content, joining text parts. */
  get text(): string {
    if (typeof this.content === 'string') return this.content;
    return this.content
      .map((part) => (typeof part['text'] === 'string' ? part['text'] : ''))
      .join('');
  }

  toString(): string {
    return `${this.type}: ${this.text}`;
  }
}

export class HumanMessage extends BaseMessage {
  readonly type = 'human' as const;
}

export class SystemMessage extends BaseMessage {
  readonly type = 'system' as const;
}

export class AIMessage extends BaseMessage {
  readonly type = 'ai' as const;
  readonly tool_calls: ToolCallRequest[];

  constructor(fields: (MessageFields & { tool_calls?: ToolCallRequest[] }) | string) {
    super(fields);
    this.tool_calls = typeof fields === 'string' ? [] : (fields.tool_calls ?? []);
  }
}

/** One streamed fragment of an AI message. */
export class AIMessageChunk extends BaseMessage {
  readonly type = 'ai' as const;
}

export class ToolMessage extends BaseMessage {
  readonly type = 'tool' as const;
  readonly tool_call_id: string;

  constructor(fields: MessageFields & { tool_call_id: string }) {
    super(fields);
    this.tool_call_id = fields.tool_call_id;
  }
}

// ─── Routing ────────────────────────────────────────────────────

/** Directive dispatching `arg` to the named sub-unit of the engine graph. */
export class Send {
  constructor(
    readonly node: string,
    readonly arg: unknown,
  ) {}

  toString(): string {
    return `Send(node=${this.node})`;
  }
}
