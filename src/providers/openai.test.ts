import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ProviderError } from '@/core/errors.js';
import type { ChatEvent, ChatParams, ToolDefinitionForProvider } from './types.js';

const { mockCreate, MockAPIError } = vi.hoisted(() => ({
  mockCreate: vi.fn(),
  MockAPIError: class APIError extends Error {
    status: number;
    constructor(status: number, message: string) {
      super(message);
      this.status = status;
      this.name = 'APIError';
    }
  },
}));

// Mock the OpenAI SDK
vi.mock('openai', () => {
  class MockOpenAI {
    chat = {
      completions: {
        create: mockCreate,
      },
    };
    static APIError = MockAPIError;
  }
  return { default: MockOpenAI };
});

const { createOpenAIProvider, toOpenAIMessages } = await import('./openai.js');

async function* fromChunks(chunks: unknown[]): AsyncGenerator<unknown> {
  for (const chunk of chunks) yield chunk;
}

async function collect(params: Partial<ChatParams> = {}): Promise<ChatEvent[]> {
  const provider = createOpenAIProvider({ apiKey: 'test-key', model: 'gpt-4o' });
  const collected: ChatEvent[] = [];
  for await (const event of provider.chat({
    messages: [{ role: 'user', content: 'Hi' }],
    maxTokens: 1024,
    temperature: 0.7,
    ...params,
  })) {
    collected.push(event);
  }
  return collected;
}

describe('createOpenAIProvider', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('metadata', () => {
    it('has correct id and displayName', () => {
      const provider = createOpenAIProvider({ apiKey: 'test-key', model: 'gpt-4o' });
      expect(provider.id).toBe('openai:gpt-4o');
      expect(provider.displayName).toBe('Openai gpt-4o');
      expect(provider.getMaxOutputTokens()).toBe(16_384);
      expect(provider.supportsToolUse()).toBe(true);
    });

    it('uses custom provider label', () => {
      const provider = createOpenAIProvider({ apiKey: 'ollama', model: 'llama3.1', providerLabel: 'ollama' });
      expect(provider.id).toBe('ollama:llama3.1');
      expect(provider.displayName).toBe('Ollama llama3.1');
    });
  });

  describe('chat streaming', () => {
    it('yields content_delta events for text responses', async () => {
      mockCreate.mockResolvedValue(
        fromChunks([
          { id: 'chatcmpl-001', choices: [{ delta: { content: 'Hello' }, finish_reason: null }] },
          { id: 'chatcmpl-001', choices: [{ delta: { content: ' world' }, finish_reason: null }] },
          { id: 'chatcmpl-001', choices: [{ delta: {}, finish_reason: 'stop' }] },
          { id: 'chatcmpl-001', choices: [], usage: { prompt_tokens: 10, completion_tokens: 5 } },
        ]),
      );

      const collected = await collect();

      expect(collected).toEqual([
        { type: 'message_start', messageId: 'chatcmpl-001' },
        { type: 'content_delta', text: 'Hello' },
        { type: 'content_delta', text: ' world' },
        { type: 'message_end', stopReason: 'end_turn', usage: { inputTokens: 10, outputTokens: 5 } },
      ]);
    });

    it('assembles tool calls from argument deltas', async () => {
      mockCreate.mockResolvedValue(
        fromChunks([
          {
            id: 'chatcmpl-002',
            choices: [
              {
                delta: { tool_calls: [{ index: 0, id: 'call_001', function: { name: 'search', arguments: '' } }] },
                finish_reason: null,
              },
            ],
          },
          {
            id: 'chatcmpl-002',
            choices: [{ delta: { tool_calls: [{ index: 0, function: { arguments: '{"query":' } }] }, finish_reason: null }],
          },
          {
            id: 'chatcmpl-002',
            choices: [{ delta: { tool_calls: [{ index: 0, function: { arguments: '"hello"}' } }] }, finish_reason: null }],
          },
          {
            id: 'chatcmpl-002',
            choices: [{ delta: {}, finish_reason: 'tool_calls' }],
            usage: { prompt_tokens: 20, completion_tokens: 15 },
          },
        ]),
      );

      const collected = await collect();

      expect(collected.filter((e) => e.type === 'tool_use_start')).toEqual([
        { type: 'tool_use_start', id: 'call_001', name: 'search' },
      ]);
      expect(collected.filter((e) => e.type === 'tool_use_end')).toEqual([
        { type: 'tool_use_end', id: 'call_001', name: 'search', input: { query: 'hello' } },
      ]);
      expect(collected[collected.length - 1]).toEqual({
        type: 'message_end',
        stopReason: 'tool_use',
        usage: { inputTokens: 20, outputTokens: 15 },
      });
    });

    it('falls back to empty input for malformed tool arguments', async () => {
      mockCreate.mockResolvedValue(
        fromChunks([
          {
            id: 'chatcmpl-003',
            choices: [
              {
                delta: { tool_calls: [{ index: 0, id: 'call_002', function: { name: 'search', arguments: '{"q' } }] },
                finish_reason: 'tool_calls',
              },
            ],
          },
        ]),
      );

      const collected = await collect();

      expect(collected.find((e) => e.type === 'tool_use_end')).toEqual({
        type: 'tool_use_end',
        id: 'call_002',
        name: 'search',
        input: {},
      });
    });

    it('sends formatted tools and the abort signal to the SDK', async () => {
      mockCreate.mockResolvedValue(fromChunks([]));
      const controller = new AbortController();
      const tools: ToolDefinitionForProvider[] = [
        {
          name: 'web_search',
          description: 'Search the web',
          inputSchema: { type: 'object', properties: { query: { type: 'string' } }, required: ['query'] },
        },
      ];

      await collect({ tools, signal: controller.signal });

      expect(mockCreate).toHaveBeenCalledWith(
        expect.objectContaining({
          model: 'gpt-4o',
          stream: true,
          stream_options: { include_usage: true },
          tools: [{ type: 'function', function: { name: 'web_search', description: 'Search the web', parameters: tools[0]?.inputSchema } }],
        }),
        { signal: controller.signal },
      );
    });

    it('converts API errors into error events', async () => {
      mockCreate.mockRejectedValue(new MockAPIError(429, 'rate limited'));

      const collected = await collect();

      expect(collected).toHaveLength(1);
      const event = collected[0];
      expect(event?.type).toBe('error');
      if (event?.type === 'error') {
        expect(event.error).toBeInstanceOf(ProviderError);
        expect(event.error.message).toBe('LLM provider "openai" error: 429: rate limited');
      }
    });

    it('rethrows errors once the request was aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      mockCreate.mockRejectedValue(new MockAPIError(0, 'Request was aborted.'));

      await expect(collect({ signal: controller.signal })).rejects.toThrow('Request was aborted.');
    });
  });
});

describe('toOpenAIMessages', () => {
  it('maps tool use and tool results onto assistant and tool messages', () => {
    expect(
      toOpenAIMessages(
        [
          { role: 'user', content: 'Find it' },
          {
            role: 'assistant',
            content: [
              { type: 'text', text: 'Searching' },
              { type: 'tool_use', id: 'call_1', name: 'web_search', input: { query: 'x' } },
            ],
          },
          {
            role: 'tool',
            content: [{ type: 'tool_result', toolUseId: 'call_1', content: 'timeout', isError: true }],
          },
        ],
        'Be brief.',
      ),
    ).toEqual([
      { role: 'system', content: 'Be brief.' },
      { role: 'user', content: 'Find it' },
      {
        role: 'assistant',
        content: 'Searching',
        tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'web_search', arguments: '{"query":"x"}' } }],
      },
      { role: 'tool', tool_call_id: 'call_1', content: 'Error: timeout' },
    ]);
  });
});
