import type { ThreadId, TraceId } from '@/core/types.js';

import type { ToolCallRequest } from './messages.js';

// ─── Raw Events ─────────────────────────────────────────────────

/**
 * One event as emitted by the engine, in its native vocabulary
 * (`on_chain_start`, `on_chat_model_stream`, `on_tool_end`, ...).
 * `data` holds engine objects, not JSON.
 */
export interface RawEngineEvent {
  event: string;
  name?: string;
  run_id?: string;
  data?: Record<string, unknown>;
  metadata?: Record<string, unknown>;
  tags?: string[];
}

// ─── Engine ─────────────────────────────────────────────────────

export interface EngineInput {
  /** The user's message for this turn. */
  message: string;
}

export interface StreamEventsOptions {
  threadId: ThreadId;
  /** Aborted when the run is cancelled; the engine stops at its next suspension point. */
  signal: AbortSignal;
  /** Correlation ID to report in event metadata. */
  traceId?: TraceId;
}

/** A tool call waiting for a human decision. */
export interface PendingApproval {
  toolCall: ToolCallRequest;
  description: string;
  requestedAt: string;
}

export type ApprovalAction = 'accept' | 'respond' | 'edit';

export interface ApprovalDecision {
  action: ApprovalAction;
  /** Text returned to the model instead of running the tool (`respond`). */
  responseText?: string;
  /** Replacement arguments for the pending call (`edit`). */
  toolEdits?: Record<string, unknown>;
}

/** What the engine knows about a thread, read from its latest checkpoint. */
export interface ThreadState {
  threadId: ThreadId;
  checkpointId: string;
  pendingApproval?: PendingApproval;
  decision?: ApprovalDecision;
  messageCount: number;
  updatedAt: Date;
}

/**
 * The agent execution engine as seen by the streaming pipeline:
 * an opaque async source of raw events plus thread-state access for HITL.
 */
export interface AgentEngine {
  readonly name: string;
  streamEvents(input: EngineInput, options: StreamEventsOptions): AsyncIterable<RawEngineEvent>;
  getThreadState(threadId: ThreadId): Promise<ThreadState | null>;
  /** Record a decision for the thread's pending approval. */
  submitDecision(threadId: ThreadId, decision: ApprovalDecision): Promise<ThreadState>;
}
