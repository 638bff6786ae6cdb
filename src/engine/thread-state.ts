/**
 * Engine state persisted in a checkpoint's `state` column.
 * Validated with zod on load; checkpoints written by other versions fail loudly.
 */
import { z } from 'zod';

import { ConduitError } from '@/core/errors.js';
import type { JsonObject } from '@/core/types.js';
import type { CheckpointRecord } from '@/infrastructure/repositories/checkpoint-repository.js';
import type { Message } from '@/providers/types.js';
import { toSafeValue } from '@/streaming/safe-value.js';

import type { ToolCallRequest } from './messages.js';
import type { ApprovalDecision, PendingApproval, ThreadState } from './types.js';

// ─── Schemas ────────────────────────────────────────────────────

const contentSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({
    type: z.literal('tool_use'),
    id: z.string(),
    name: z.string(),
    input: z.record(z.unknown()),
  }),
  z.object({
    type: z.literal('tool_result'),
    toolUseId: z.string(),
    content: z.string(),
    isError: z.boolean().optional(),
  }),
]);

const messageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant', 'tool']),
  content: z.union([z.string(), z.array(contentSchema)]),
});

const toolCallSchema = z.object({
  id: z.string(),
  name: z.string(),
  args: z.record(z.unknown()),
});

const pendingApprovalSchema = z.object({
  toolCall: toolCallSchema,
  description: z.string(),
  requestedAt: z.string(),
});

const decisionSchema = z.object({
  action: z.enum(['accept', 'respond', 'edit']),
  responseText: z.string().optional(),
  toolEdits: z.record(z.unknown()).optional(),
});

const engineStateSchema = z.object({
  messages: z.array(messageSchema).default([]),
  pendingApproval: pendingApprovalSchema.optional(),
  /** Calls of the interrupted turn that come after the pending one. */
  queuedToolCalls: z.array(toolCallSchema).default([]),
  /** User messages received while a run stayed paused, appended once it resumes. */
  deferredInputs: z.array(z.string()).default([]),
  decision: decisionSchema.optional(),
});

// ─── Types ──────────────────────────────────────────────────────

export interface EngineState {
  messages: Message[];
  pendingApproval?: PendingApproval;
  queuedToolCalls: ToolCallRequest[];
  deferredInputs: string[];
  decision?: ApprovalDecision;
}

// ─── Conversion ─────────────────────────────────────────────────

/** Read the engine state of a checkpoint. A missing checkpoint is an empty thread. */
export function readEngineState(record: CheckpointRecord | null): EngineState {
  if (!record) return { messages: [], queuedToolCalls: [], deferredInputs: [] };

  const parsed = engineStateSchema.safeParse(record.state);
  if (!parsed.success) {
    throw new ConduitError({
      message: `Checkpoint "${record.checkpointId}" holds invalid engine state`,
      code: 'CHECKPOINT_STATE_INVALID',
      context: { threadId: record.threadId, issues: parsed.error.issues },
    });
  }
  return parsed.data;
}

/** Serialize engine state for a checkpoint. */
export function writeEngineState(state: EngineState): JsonObject {
  const json: JsonObject = {
    messages: toSafeValue(state.messages),
    queuedToolCalls: toSafeValue(state.queuedToolCalls),
    deferredInputs: state.deferredInputs,
  };
  if (state.pendingApproval) json['pendingApproval'] = toSafeValue(state.pendingApproval);
  if (state.decision) json['decision'] = toSafeValue(state.decision);
  return json;
}

export function toThreadState(record: CheckpointRecord): ThreadState {
  const state = readEngineState(record);
  const threadState: ThreadState = {
    threadId: record.threadId,
    checkpointId: record.checkpointId,
    messageCount: state.messages.length,
    updatedAt: record.createdAt,
  };
  if (state.pendingApproval) threadState.pendingApproval = state.pendingApproval;
  if (state.decision) threadState.decision = state.decision;
  return threadState;
}
