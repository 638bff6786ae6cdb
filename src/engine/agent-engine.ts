/**
 * AgentEngine — the tool-calling agent loop, exposed as a raw event stream.
 *
 * Orchestrates: load thread → LLM call → stream tokens → execute tools → repeat
 * until the model answers without tool calls, a tool needs human approval,
 * or the turn limit is reached.
 *
 * Every step is reported as a raw engine event (`on_chain_start`,
 * `on_chat_model_stream`, `on_tool_end`, ...). Conversation state lives in
 * the checkpoint store, one checkpoint per step.
 */
import { nanoid } from 'nanoid';

import { ConduitError, NoPendingApprovalError, ThreadNotFoundError } from '@/core/errors.js';
import type { CheckpointId, ThreadId, TraceId } from '@/core/types.js';
import type {
  CheckpointMetadata,
  CheckpointStore,
} from '@/infrastructure/repositories/checkpoint-repository.js';
import { ERROR_CHANNEL } from '@/infrastructure/repositories/checkpoint-repository.js';
import { createLogger, type Logger } from '@/observability/logger.js';
import type { LLMProvider, Message, TokenUsage } from '@/providers/types.js';
import type { ToolRegistry } from '@/tools/registry/tool-registry.js';

import { AIMessage, AIMessageChunk, HumanMessage } from './messages.js';
import type { ToolCallRequest } from './messages.js';
import type { EngineState } from './thread-state.js';
import { readEngineState, toThreadState, writeEngineState } from './thread-state.js';
import type {
  AgentEngine,
  ApprovalDecision,
  EngineInput,
  PendingApproval,
  RawEngineEvent,
  StreamEventsOptions,
  ThreadState,
} from './types.js';

const defaultLogger = createLogger({ name: 'agent-engine' });

const COMPONENT = 'agent-engine';

export const NOT_APPROVED_MESSAGE = 'Tool call was not approved by a human reviewer.';

// ─── Options ────────────────────────────────────────────────────

export interface AgentEngineOptions {
  /** Agent name, reported as the root chain's name. */
  name: string;
  provider: LLMProvider;
  toolRegistry: ToolRegistry;
  checkpoints: CheckpointStore;
  systemPrompt?: string;
  /** Pause on tools that require approval. When off they run directly. */
  hitlEnabled: boolean;
  maxToolCallsPerTurn: number;
  maxTurnsPerRun: number;
  temperature?: number;
  logger?: Logger;
}

type ToolRunOutcome = 'done' | 'paused';

interface RunContext {
  threadId: ThreadId;
  traceId?: TraceId;
  signal: AbortSignal;
  metadata: Record<string, unknown>;
  state: EngineState;
}

// ─── Factory ────────────────────────────────────────────────────

/**
 * Create an AgentEngine over an LLM provider, a tool registry and a checkpoint store.
 */
export function createAgentEngine(options: AgentEngineOptions): AgentEngine {
  const {
    name,
    provider,
    toolRegistry,
    checkpoints,
    systemPrompt,
    hitlEnabled,
    maxToolCallsPerTurn,
    maxTurnsPerRun,
  } = options;
  const logger = options.logger ?? defaultLogger;

  // ─── Model Call ───────────────────────────────────────────────

  async function* callModel(
    run: RunContext,
  ): AsyncGenerator<RawEngineEvent, AIMessage, undefined> {
    const runId = nanoid();
    const event = (kind: string, data: Record<string, unknown>): RawEngineEvent => ({
      event: kind,
      name: provider.id,
      run_id: runId,
      data,
      metadata: run.metadata,
    });

    yield event('on_chat_model_start', { input: { messages: run.state.messages.length } });

    const chatStream = provider.chat({
      messages: run.state.messages,
      systemPrompt,
      tools: provider.supportsToolUse() ? toolRegistry.formatForProvider() : undefined,
      maxTokens: provider.getMaxOutputTokens(),
      temperature: options.temperature ?? 0.7,
      traceId: run.traceId,
      signal: run.signal,
    });

    const textParts: string[] = [];
    const toolCalls: ToolCallRequest[] = [];
    let messageId = runId;
    let stopReason: string | undefined;
    let usage: TokenUsage | undefined;

    for await (const chatEvent of chatStream) {
      switch (chatEvent.type) {
        case 'message_start':
          messageId = chatEvent.messageId;
          break;
        case 'content_delta':
          textParts.push(chatEvent.text);
          yield event('on_chat_model_stream', {
            chunk: new AIMessageChunk({ content: chatEvent.text, id: messageId }),
          });
          break;
        case 'tool_use_end':
          toolCalls.push({ id: chatEvent.id, name: chatEvent.name, args: chatEvent.input });
          break;
        case 'message_end':
          stopReason = chatEvent.stopReason;
          usage = chatEvent.usage;
          break;
        case 'error':
          throw chatEvent.error;
        default:
          break;
      }
    }

    const message = new AIMessage({
      content: textParts.join(''),
      id: messageId,
      tool_calls: toolCalls,
      response_metadata: {
        finish_reason: stopReason ?? 'end_turn',
        ...(usage ? { usage: { input_tokens: usage.inputTokens, output_tokens: usage.outputTokens } } : {}),
      },
    });

    yield event('on_chat_model_end', { output: message });

    run.state.messages.push(toAssistantMessage(message));
    return message;
  }

  // ─── Tool Calls ───────────────────────────────────────────────

  async function* executeTool(
    run: RunContext,
    call: ToolCallRequest,
  ): AsyncGenerator<RawEngineEvent, void, undefined> {
    const runId = nanoid();
    const event = (kind: string, data: Record<string, unknown>): RawEngineEvent => ({
      event: kind,
      name: call.name,
      run_id: runId,
      data,
      metadata: run.metadata,
    });

    yield event('on_tool_start', { input: call.args });

    // Timeouts and run cancellation are thrown and end the run.
    const result = await toolRegistry.resolve(call.name, call.args, {
      threadId: run.threadId,
      traceId: run.traceId,
      signal: run.signal,
    });

    if (result.ok) {
      yield event('on_tool_end', { output: result.value.output });
      const content = JSON.stringify(result.value.output ?? null);
      run.state.messages.push(toolResultMessage(call.id, content, !result.value.success));
      return;
    }

    yield event('on_tool_error', { error: result.error });
    run.state.messages.push(toolResultMessage(call.id, result.error.message, true));
  }

  /** Run calls in order. Stops at the first call that needs a human decision. */
  async function* runToolCalls(
    run: RunContext,
    calls: ToolCallRequest[],
  ): AsyncGenerator<RawEngineEvent, ToolRunOutcome, undefined> {
    for (const [index, call] of calls.entries()) {
      if (hitlEnabled && toolRegistry.get(call.name)?.requiresApproval) {
        run.state.pendingApproval = {
          toolCall: call,
          description: `Tool "${call.name}" requires approval before it runs`,
          requestedAt: new Date().toISOString(),
        };
        run.state.queuedToolCalls = calls.slice(index + 1);
        return 'paused';
      }
      yield* executeTool(run, call);
    }
    return 'done';
  }

  /** Settle the approval a previous run paused on, then the calls queued behind it. */
  async function* resumePending(
    run: RunContext,
    pending: PendingApproval,
  ): AsyncGenerator<RawEngineEvent, ToolRunOutcome, undefined> {
    const { decision } = run.state;
    const queued = run.state.queuedToolCalls;
    run.state.pendingApproval = undefined;
    run.state.decision = undefined;
    run.state.queuedToolCalls = [];

    if (!decision) {
      for (const call of [pending.toolCall, ...queued]) {
        run.state.messages.push(toolResultMessage(call.id, NOT_APPROVED_MESSAGE, true));
      }
      return 'done';
    }

    logger.info('Resuming with approval decision', {
      component: COMPONENT,
      threadId: run.threadId,
      toolName: pending.toolCall.name,
      action: decision.action,
    });

    switch (decision.action) {
      case 'accept':
        yield* executeTool(run, pending.toolCall);
        break;
      case 'edit':
        yield* executeTool(run, { ...pending.toolCall, args: decision.toolEdits ?? pending.toolCall.args });
        break;
      case 'respond':
        run.state.messages.push(toolResultMessage(pending.toolCall.id, decision.responseText ?? '', false));
        break;
    }

    return yield* runToolCalls(run, queued);
  }

  // ─── Engine ───────────────────────────────────────────────────

  return {
    name,

    async *streamEvents(
      input: EngineInput,
      streamOptions: StreamEventsOptions,
    ): AsyncGenerator<RawEngineEvent, void, undefined> {
      const { threadId, signal, traceId } = streamOptions;
      signal.throwIfAborted();

      const rootRunId = nanoid();
      const metadata: Record<string, unknown> = { thread_id: threadId };
      if (traceId) metadata['trace_id'] = traceId;

      const latest = await checkpoints.getLatest(threadId);
      const run: RunContext = { threadId, traceId, signal, metadata, state: readEngineState(latest) };
      let checkpointId: CheckpointId | undefined = latest?.checkpointId;
      let step = 0;

      const save = async (meta: CheckpointMetadata): Promise<void> => {
        step += 1;
        const record = await checkpoints.put({
          threadId,
          parentCheckpointId: checkpointId,
          state: writeEngineState(run.state),
          metadata: { ...meta, step, ...(traceId ? { traceId } : {}) },
        });
        checkpointId = record.checkpointId;
      };

      const rootEvent = (kind: string, data: Record<string, unknown>): RawEngineEvent => ({
        event: kind,
        name,
        run_id: rootRunId,
        data,
        metadata,
      });

      logger.info('Starting agent run', {
        component: COMPONENT,
        threadId,
        traceId,
        resuming: run.state.pendingApproval !== undefined,
      });

      try {
        yield rootEvent('on_chain_start', { input: { messages: [new HumanMessage(input.message)] } });

        run.state.deferredInputs.push(input.message);
        const pending = run.state.pendingApproval;
        if (pending) {
          const outcome = yield* resumePending(run, pending);
          if (outcome === 'paused') {
            yield* pause(run, save, rootEvent);
            return;
          }
        }

        for (const text of run.state.deferredInputs) {
          run.state.messages.push({ role: 'user', content: text });
        }
        run.state.deferredInputs = [];
        await save({ source: 'input' });

        let finalMessage: AIMessage | undefined;
        for (let turn = 1; ; turn++) {
          if (turn > maxTurnsPerRun) {
            throw new ConduitError({
              message: `Max turns (${String(maxTurnsPerRun)}) exceeded`,
              code: 'MAX_TURNS_EXCEEDED',
              context: { threadId, limit: maxTurnsPerRun },
            });
          }
          signal.throwIfAborted();

          const message = yield* callModel(run);
          if (message.tool_calls.length === 0) {
            finalMessage = message;
            break;
          }
          if (message.tool_calls.length > maxToolCallsPerTurn) {
            throw new ConduitError({
              message: `Model requested ${String(message.tool_calls.length)} tool calls (limit ${String(maxToolCallsPerTurn)})`,
              code: 'MAX_TOOL_CALLS_EXCEEDED',
              context: { threadId, count: message.tool_calls.length, limit: maxToolCallsPerTurn },
            });
          }

          const outcome = yield* runToolCalls(run, message.tool_calls);
          if (outcome === 'paused') {
            yield* pause(run, save, rootEvent);
            return;
          }
          await save({ source: 'loop' });
        }

        await save({ source: 'loop', status: 'completed' });
        logger.info('Agent run completed', {
          component: COMPONENT,
          threadId,
          traceId,
          messageCount: run.state.messages.length,
        });
        yield rootEvent('on_chain_end', { output: finalMessage });
      } finally {
        if (signal.aborted && checkpointId) {
          await recordInterruptedWrite(threadId, checkpointId, rootRunId, signal.reason);
        }
      }
    },

    async getThreadState(threadId: ThreadId): Promise<ThreadState | null> {
      const latest = await checkpoints.getLatest(threadId);
      return latest ? toThreadState(latest) : null;
    },

    async submitDecision(threadId: ThreadId, decision: ApprovalDecision): Promise<ThreadState> {
      const latest = await checkpoints.getLatest(threadId);
      if (!latest) throw new ThreadNotFoundError(threadId);

      const state = readEngineState(latest);
      if (!state.pendingApproval) throw new NoPendingApprovalError(threadId);

      const record = await checkpoints.put({
        threadId,
        parentCheckpointId: latest.checkpointId,
        state: writeEngineState({ ...state, decision }),
        metadata: { source: 'update', status: 'interrupted' },
      });

      logger.info('Approval decision recorded', {
        component: COMPONENT,
        threadId,
        toolName: state.pendingApproval.toolCall.name,
        action: decision.action,
      });

      return toThreadState(record);
    },
  };

  // ─── Helpers ──────────────────────────────────────────────────

  async function* pause(
    run: RunContext,
    save: (meta: CheckpointMetadata) => Promise<void>,
    rootEvent: (kind: string, data: Record<string, unknown>) => RawEngineEvent,
  ): AsyncGenerator<RawEngineEvent, void, undefined> {
    const pending = run.state.pendingApproval;
    await save({ source: 'loop', status: 'interrupted' });

    logger.info('Agent run paused for approval', {
      component: COMPONENT,
      threadId: run.threadId,
      traceId: run.traceId,
      toolName: pending?.toolCall.name,
    });

    const actionRequests = pending
      ? [{ name: pending.toolCall.name, args: pending.toolCall.args, description: pending.description }]
      : [];
    yield rootEvent('on_chain_end', { output: { __interrupt__: [{ value: { action_requests: actionRequests } }] } });
  }

  /** Mark the run's last checkpoint as interrupted mid-write. */
  async function recordInterruptedWrite(
    threadId: ThreadId,
    checkpointId: CheckpointId,
    taskId: string,
    reason: unknown,
  ): Promise<void> {
    try {
      await checkpoints.putWrite({
        threadId,
        checkpointId,
        taskId,
        channel: ERROR_CHANNEL,
        value: {
          error: 'CancelledError',
          message: reason instanceof Error ? reason.message : 'Run cancelled',
        },
      });
    } catch (error) {
      logger.warn('Failed to record interrupted checkpoint write', {
        component: COMPONENT,
        threadId,
        checkpointId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

// ─── Message Helpers ────────────────────────────────────────────

function toAssistantMessage(message: AIMessage): Message {
  if (message.tool_calls.length === 0) {
    return { role: 'assistant', content: message.text };
  }
  return {
    role: 'assistant',
    content: [
      ...(message.text ? [{ type: 'text' as const, text: message.text }] : []),
      ...message.tool_calls.map((call) => ({
        type: 'tool_use' as const,
        id: call.id,
        name: call.name,
        input: call.args,
      })),
    ],
  };
}

function toolResultMessage(toolUseId: string, content: string, isError: boolean): Message {
  return {
    role: 'tool',
    content: [{ type: 'tool_result', toolUseId, content, isError }],
  };
}
