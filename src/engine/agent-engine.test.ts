import { describe, expect, it } from 'vitest';

import type { ThreadId, TraceId } from '@/core/types.js';
import { ERROR_CHANNEL } from '@/infrastructure/repositories/checkpoint-repository.js';
import type { CheckpointStore } from '@/infrastructure/repositories/checkpoint-repository.js';
import { createInMemoryCheckpointStore } from '@/infrastructure/repositories/in-memory-checkpoint-repository.js';
import { createMockLogger } from '@/testing/fixtures/streaming.js';
import { createDangerousTool, createEchoTool, createFailingTool } from '@/testing/fixtures/tools.js';
import type { MockLLMProvider, MockTurn } from '@/testing/helpers/test-llm-provider.js';
import { createMockLLMProvider } from '@/testing/helpers/test-llm-provider.js';
import { createToolRegistry } from '@/tools/registry/tool-registry.js';

import { NOT_APPROVED_MESSAGE, createAgentEngine } from './agent-engine.js';
import type { AgentEngine, RawEngineEvent } from './types.js';

const THREAD = 'thread-1' as ThreadId;
const TRACE = 'trace-1' as TraceId;

interface Harness {
  engine: AgentEngine;
  provider: MockLLMProvider;
  store: CheckpointStore;
}

function setup(
  turns: MockTurn[],
  overrides?: { hitlEnabled?: boolean; maxToolCallsPerTurn?: number; maxTurnsPerRun?: number },
): Harness {
  const provider = createMockLLMProvider(turns);
  const store = createInMemoryCheckpointStore();
  const toolRegistry = createToolRegistry({
    timeouts: { tool: { name: 'tool', deadlineMs: 1_000 }, webSearch: { name: 'web_search', deadlineMs: 500 } },
  });
  toolRegistry.register(createEchoTool());
  toolRegistry.register(createDangerousTool());
  toolRegistry.register(createFailingTool());

  const engine = createAgentEngine({
    name: 'assistant',
    provider,
    toolRegistry,
    checkpoints: store,
    hitlEnabled: overrides?.hitlEnabled ?? true,
    maxToolCallsPerTurn: overrides?.maxToolCallsPerTurn ?? 5,
    maxTurnsPerRun: overrides?.maxTurnsPerRun ?? 5,
    logger: createMockLogger(),
  });
  return { engine, provider, store };
}

async function collect(
  engine: AgentEngine,
  message: string,
  signal: AbortSignal = new AbortController().signal,
): Promise<RawEngineEvent[]> {
  const events: RawEngineEvent[] = [];
  for await (const event of engine.streamEvents({ message }, { threadId: THREAD, signal, traceId: TRACE })) {
    events.push(event);
  }
  return events;
}

const kinds = (events: RawEngineEvent[]): string[] => events.map((e) => e.event);

describe('createAgentEngine', () => {
  describe('streamEvents', () => {
    it('streams a plain answer between root chain events', async () => {
      const { engine, store } = setup([{ text: 'Hello world' }]);

      const events = await collect(engine, 'hi');

      expect(kinds(events)).toEqual([
        'on_chain_start',
        'on_chat_model_start',
        'on_chat_model_stream',
        'on_chat_model_stream',
        'on_chat_model_end',
        'on_chain_end',
      ]);
      expect(events[0]).toMatchObject({ name: 'assistant', metadata: { thread_id: 'thread-1', trace_id: 'trace-1' } });
      expect(events[2]?.data?.['chunk']).toMatchObject({ content: 'Hello ', id: 'msg-1' });
      expect(events[5]?.run_id).toBe(events[0]?.run_id);

      const latest = await store.getLatest(THREAD);
      expect(latest?.metadata).toEqual({ source: 'loop', status: 'completed', step: 2, traceId: 'trace-1' });
      expect(latest?.state['messages']).toEqual([
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: 'Hello world' },
      ]);
    });

    it('runs requested tools and feeds their results back to the model', async () => {
      const { engine, provider } = setup([
        { toolCalls: [{ id: 'call-1', name: 'echo', input: { message: 'ping' } }] },
        { text: 'pong' },
      ]);

      const events = await collect(engine, 'echo ping');

      const toolEvents = events.filter((e) => e.event.startsWith('on_tool'));
      expect(toolEvents.map((e) => [e.event, e.name, e.data])).toEqual([
        ['on_tool_start', 'echo', { input: { message: 'ping' } }],
        ['on_tool_end', 'echo', { output: { echo: 'ping' } }],
      ]);
      expect(provider.calls).toHaveLength(2);
      expect(provider.calls[1]?.messages.slice(1)).toEqual([
        { role: 'assistant', content: [{ type: 'tool_use', id: 'call-1', name: 'echo', input: { message: 'ping' } }] },
        { role: 'tool', content: [{ type: 'tool_result', toolUseId: 'call-1', content: '{"echo":"ping"}', isError: false }] },
      ]);
    });

    it('reports failing tools as tool errors', async () => {
      const { engine, provider } = setup([
        { toolCalls: [{ id: 'call-1', name: 'failing', input: {} }] },
        { text: 'sorry' },
      ]);

      const events = await collect(engine, 'try it');

      const failure = events.find((e) => e.event === 'on_tool_error');
      expect(failure?.data?.['error']).toMatchObject({ code: 'TOOL_EXECUTION_ERROR' });
      expect(provider.calls[1]?.messages[2]).toEqual({
        role: 'tool',
        content: [
          {
            type: 'tool_result',
            toolUseId: 'call-1',
            content: 'Tool "failing" execution failed: bad input',
            isError: true,
          },
        ],
      });
    });

    it('offers tools to the model as provider definitions', async () => {
      const { engine, provider } = setup([{ text: 'ok' }]);

      await collect(engine, 'hi');

      expect(provider.calls[0]?.tools?.map((t) => t.name)).toEqual(['echo', 'dangerous-action', 'failing']);
      expect(provider.calls[0]?.maxTokens).toBe(4096);
    });

    it('carries conversation history across runs on the same thread', async () => {
      const { engine, provider } = setup([{ text: 'first' }, { text: 'second' }]);

      await collect(engine, 'one');
      await collect(engine, 'two');

      expect(provider.calls[1]?.messages).toEqual([
        { role: 'user', content: 'one' },
        { role: 'assistant', content: 'first' },
        { role: 'user', content: 'two' },
      ]);
    });

    it('fails when the model requests too many tool calls', async () => {
      const { engine } = setup(
        [
          {
            toolCalls: [
              { id: 'a', name: 'echo', input: { message: '1' } },
              { id: 'b', name: 'echo', input: { message: '2' } },
            ],
          },
        ],
        { maxToolCallsPerTurn: 1 },
      );

      await expect(collect(engine, 'go')).rejects.toMatchObject({ code: 'MAX_TOOL_CALLS_EXCEEDED' });
    });

    it('fails when the turn limit is reached', async () => {
      const call: MockTurn = { toolCalls: [{ id: 'a', name: 'echo', input: { message: 'again' } }] };
      const { engine, provider } = setup([call, call, call], { maxTurnsPerRun: 2 });

      await expect(collect(engine, 'loop')).rejects.toMatchObject({ code: 'MAX_TURNS_EXCEEDED' });
      expect(provider.calls).toHaveLength(2);
    });

    it('rethrows provider errors', async () => {
      const { engine } = setup([{ error: new Error('upstream 500') }]);

      await expect(collect(engine, 'hi')).rejects.toThrow('upstream 500');
    });

    it('refuses to start with an aborted signal', async () => {
      const { engine, store } = setup([{ text: 'never' }]);
      const controller = new AbortController();
      controller.abort(new Error('gone'));

      await expect(collect(engine, 'hi', controller.signal)).rejects.toThrow('gone');
      expect(await store.getLatest(THREAD)).toBeNull();
    });

    it('records an interrupted write on its checkpoint when cancelled', async () => {
      const { engine, store } = setup([{ hang: true }]);
      const controller = new AbortController();
      const events: string[] = [];

      const run = (async (): Promise<void> => {
        for await (const event of engine.streamEvents(
          { message: 'hi' },
          { threadId: THREAD, signal: controller.signal },
        )) {
          events.push(event.event);
          if (event.event === 'on_chat_model_start') controller.abort(new Error('client gone'));
        }
      })();

      await expect(run).rejects.toThrow('client gone');
      const latest = await store.getLatest(THREAD);
      const writes = await store.listWritesByChannel(ERROR_CHANNEL);
      expect(events).toEqual(['on_chain_start', 'on_chat_model_start']);
      expect(writes).toHaveLength(1);
      expect(writes[0]).toMatchObject({
        checkpointId: latest?.checkpointId,
        value: { error: 'CancelledError', message: 'client gone' },
      });
    });
  });

  describe('human-in-the-loop', () => {
    const deploy: MockTurn = {
      toolCalls: [{ id: 'call-1', name: 'dangerous-action', input: { target: 'prod' } }],
    };

    it('pauses before tools that require approval', async () => {
      const { engine, store } = setup([deploy]);

      const events = await collect(engine, 'deploy');

      expect(kinds(events)).not.toContain('on_tool_start');
      expect(events.at(-1)).toMatchObject({
        event: 'on_chain_end',
        name: 'assistant',
        data: {
          output: {
            __interrupt__: [
              {
                value: {
                  action_requests: [
                    {
                      name: 'dangerous-action',
                      args: { target: 'prod' },
                      description: 'Tool "dangerous-action" requires approval before it runs',
                    },
                  ],
                },
              },
            ],
          },
        },
      });
      expect((await store.getLatest(THREAD))?.metadata.status).toBe('interrupted');

      const state = await engine.getThreadState(THREAD);
      expect(state?.pendingApproval?.toolCall).toEqual({ id: 'call-1', name: 'dangerous-action', args: { target: 'prod' } });
      expect(state?.messageCount).toBe(2);
    });

    it('runs the pending call once accepted', async () => {
      const { engine, provider } = setup([deploy, { text: 'deployed' }]);
      await collect(engine, 'deploy');

      const decided = await engine.submitDecision(THREAD, { action: 'accept' });
      const events = await collect(engine, 'continue');

      expect(decided.decision).toEqual({ action: 'accept' });
      expect(events.filter((e) => e.event === 'on_tool_end').map((e) => e.data)).toEqual([
        { output: { executed: 'prod' } },
      ]);
      expect(provider.calls[1]?.messages).toEqual([
        { role: 'user', content: 'deploy' },
        {
          role: 'assistant',
          content: [{ type: 'tool_use', id: 'call-1', name: 'dangerous-action', input: { target: 'prod' } }],
        },
        {
          role: 'tool',
          content: [{ type: 'tool_result', toolUseId: 'call-1', content: '{"executed":"prod"}', isError: false }],
        },
        { role: 'user', content: 'continue' },
      ]);
      expect((await engine.getThreadState(THREAD))?.pendingApproval).toBeUndefined();
    });

    it('runs edited arguments', async () => {
      const { engine } = setup([deploy, { text: 'deployed' }]);
      await collect(engine, 'deploy');

      await engine.submitDecision(THREAD, { action: 'edit', toolEdits: { target: 'staging' } });
      const events = await collect(engine, 'continue');

      expect(events.find((e) => e.event === 'on_tool_start')?.data).toEqual({ input: { target: 'staging' } });
    });

    it('returns the reviewer response instead of running the tool', async () => {
      const { engine, provider } = setup([deploy, { text: 'understood' }]);
      await collect(engine, 'deploy');

      await engine.submitDecision(THREAD, { action: 'respond', responseText: 'Not today.' });
      const events = await collect(engine, 'ok');

      expect(kinds(events)).not.toContain('on_tool_start');
      expect(provider.calls[1]?.messages[2]).toEqual({
        role: 'tool',
        content: [{ type: 'tool_result', toolUseId: 'call-1', content: 'Not today.', isError: false }],
      });
    });

    it('marks the pending call as not approved when a run arrives without a decision', async () => {
      const { engine, provider } = setup([deploy, { text: 'fine' }]);
      await collect(engine, 'deploy');

      await collect(engine, 'never mind');

      expect(provider.calls[1]?.messages[2]).toEqual({
        role: 'tool',
        content: [{ type: 'tool_result', toolUseId: 'call-1', content: NOT_APPROVED_MESSAGE, isError: true }],
      });
    });

    it('runs approval-gated tools directly when HITL is off', async () => {
      const { engine } = setup([deploy, { text: 'deployed' }], { hitlEnabled: false });

      const events = await collect(engine, 'deploy');

      expect(kinds(events)).toContain('on_tool_end');
      expect(events.at(-1)?.data?.['output']).not.toHaveProperty('__interrupt__');
    });
  });

  describe('submitDecision', () => {
    it('rejects unknown threads', async () => {
      const { engine } = setup([]);

      await expect(engine.submitDecision(THREAD, { action: 'accept' })).rejects.toMatchObject({ code: 'NOT_FOUND' });
    });

    it('rejects threads without a pending approval', async () => {
      const { engine } = setup([{ text: 'hi' }]);
      await collect(engine, 'hello');

      await expect(engine.submitDecision(THREAD, { action: 'accept' })).rejects.toMatchObject({
        code: 'NO_PENDING_APPROVAL',
      });
    });
  });

  describe('getThreadState', () => {
    it('returns null for unknown threads', async () => {
      const { engine } = setup([]);

      expect(await engine.getThreadState(THREAD)).toBeNull();
    });
  });
});
