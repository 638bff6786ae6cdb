/**
 * OpenAI LLM provider adapter.
 * Wraps the openai SDK to implement the LLMProvider interface.
 * Also usable for OpenAI-compatible APIs (Ollama, etc.) via baseUrl.
 */
import OpenAI from 'openai';

import { ProviderError } from '@/core/errors.js';
import { createLogger } from '@/observability/logger.js';
import { getModelMeta } from './models.js';
import type {
  ChatEvent,
  ChatParams,
  LLMProvider,
  Message,
  StopReason,
  ToolDefinitionForProvider,
} from './types.js';

const logger = createLogger({ name: 'openai-provider' });

/** Configuration for the OpenAI provider. */
export interface OpenAIProviderOptions {
  apiKey: string;
  /** Model identifier (e.g. 'gpt-4o'). */
  model: string;
  /** Custom base URL (for Ollama, proxies, etc.). */
  baseUrl?: string;
  /** Provider label for logging/display. Defaults to 'openai'. */
  providerLabel?: string;
}

type ChatMessageParam = OpenAI.Chat.Completions.ChatCompletionMessageParam;

/**
 * Convert our internal Message format to OpenAI's chat completion format.
 */
export function toOpenAIMessages(messages: Message[], systemPrompt?: string): ChatMessageParam[] {
  const result: ChatMessageParam[] = [];

  if (systemPrompt) {
    result.push({ role: 'system', content: systemPrompt });
  }

  for (const msg of messages) {
    if (typeof msg.content === 'string') {
      if (msg.role === 'assistant') result.push({ role: 'assistant', content: msg.content });
      else if (msg.role === 'system') result.push({ role: 'system', content: msg.content });
      else result.push({ role: 'user', content: msg.content });
      continue;
    }

    const toolCalls: OpenAI.Chat.Completions.ChatCompletionMessageToolCall[] = [];
    const textParts: string[] = [];

    for (const part of msg.content) {
      switch (part.type) {
        case 'text':
          textParts.push(part.text);
          break;
        case 'tool_use':
          toolCalls.push({
            id: part.id,
            type: 'function',
            function: { name: part.name, arguments: JSON.stringify(part.input) },
          });
          break;
        case 'tool_result':
          // Tool results are individual "tool" role messages in OpenAI's format
          result.push({
            role: 'tool',
            tool_call_id: part.toolUseId,
            content: part.isError ? `Error: ${part.content}` : part.content,
          });
          break;
      }
    }

    const text = textParts.join('');
    if (msg.role === 'assistant') {
      result.push({
        role: 'assistant',
        content: text === '' ? null : text,
        ...(toolCalls.length ? { tool_calls: toolCalls } : {}),
      });
    } else if (text) {
      result.push({ role: 'user', content: text });
    }
  }

  return result;
}

/** Format tool definitions for the OpenAI function calling API. */
export function toOpenAITools(
  tools: ToolDefinitionForProvider[],
): OpenAI.Chat.Completions.ChatCompletionTool[] {
  return tools.map((t) => ({
    type: 'function' as const,
    function: {
      name: t.name,
      description: t.description,
      parameters: t.inputSchema,
    },
  }));
}

function toStopReason(finishReason: string): StopReason {
  switch (finishReason) {
    case 'tool_calls':
      return 'tool_use';
    case 'length':
      return 'max_tokens';
    default:
      return 'end_turn';
  }
}

function parseArguments(json: string): Record<string, unknown> | undefined {
  const parsed: unknown = JSON.parse(json ? json : '{}');
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return undefined;
  return { ...parsed };
}

/**
 * OpenAI provider implementing the LLMProvider interface.
 */
export function createOpenAIProvider(options: OpenAIProviderOptions): LLMProvider {
  const label = options.providerLabel ?? 'openai';
  const client = new OpenAI({
    apiKey: options.apiKey,
    ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
  });
  const meta = getModelMeta(options.model);

  return {
    id: `${label}:${options.model}`,
    displayName: `${label.charAt(0).toUpperCase()}${label.slice(1)} ${options.model}`,

    async *chat(params: ChatParams): AsyncGenerator<ChatEvent> {
      const openaiMessages = toOpenAIMessages(params.messages, params.systemPrompt);
      const tools = params.tools?.length ? toOpenAITools(params.tools) : undefined;

      logger.debug('Starting OpenAI chat stream', {
        component: label,
        model: options.model,
        messageCount: openaiMessages.length,
        hasTools: !!tools,
        traceId: params.traceId,
      });

      try {
        const stream = await client.chat.completions.create(
          {
            model: options.model,
            messages: openaiMessages,
            max_tokens: params.maxTokens,
            temperature: params.temperature,
            stream: true,
            stream_options: { include_usage: true },
            ...(tools ? { tools } : {}),
            ...(params.stopSequences?.length ? { stop: params.stopSequences } : {}),
          },
          params.signal ? { signal: params.signal } : undefined,
        );

        let messageId = '';
        let stopReason: StopReason | undefined;
        let inputTokens = 0;
        let outputTokens = 0;
        // Tool calls being assembled from deltas, by index
        const toolCallBuffers = new Map<number, { id: string; name: string; argumentsJson: string }>();

        for await (const chunk of stream) {
          if (chunk.usage) {
            inputTokens = chunk.usage.prompt_tokens;
            outputTokens = chunk.usage.completion_tokens;
          }

          const choice = chunk.choices[0];
          if (!choice) continue;

          if (chunk.id && !messageId) {
            messageId = chunk.id;
            yield { type: 'message_start', messageId };
          }

          const delta = choice.delta;

          if (delta.content) {
            yield { type: 'content_delta', text: delta.content };
          }

          for (const tc of delta.tool_calls ?? []) {
            let buffer = toolCallBuffers.get(tc.index);

            if (!buffer && tc.id) {
              buffer = { id: tc.id, name: tc.function?.name ?? '', argumentsJson: '' };
              toolCallBuffers.set(tc.index, buffer);
              yield { type: 'tool_use_start', id: buffer.id, name: buffer.name };
            }

            if (buffer && tc.function?.arguments) {
              buffer.argumentsJson += tc.function.arguments;
              yield { type: 'tool_use_delta', id: buffer.id, partialInput: tc.function.arguments };
            }
          }

          if (choice.finish_reason) {
            for (const [, buffer] of toolCallBuffers) {
              let input: Record<string, unknown> | undefined;
              try {
                input = parseArguments(buffer.argumentsJson);
              } catch {
                input = undefined;
              }
              if (!input) {
                logger.warn('Failed to parse tool call arguments', {
                  component: label,
                  toolCallId: buffer.id,
                  toolName: buffer.name,
                });
              }
              yield { type: 'tool_use_end', id: buffer.id, name: buffer.name, input: input ?? {} };
            }
            toolCallBuffers.clear();
            stopReason = toStopReason(choice.finish_reason);
          }
        }

        // With include_usage the usage arrives on a final chunk without choices
        if (stopReason) {
          yield { type: 'message_end', stopReason, usage: { inputTokens, outputTokens } };
        }
      } catch (error) {
        if (params.signal?.aborted) throw error;
        if (error instanceof OpenAI.APIError) {
          logger.error('OpenAI API error', {
            component: label,
            status: error.status,
            errorMessage: error.message,
            traceId: params.traceId,
          });
          yield {
            type: 'error',
            error: new ProviderError(label, `${String(error.status)}: ${error.message}`, error),
          };
        } else {
          throw error;
        }
      }
    },

    getMaxOutputTokens(): number {
      return meta.maxOutputTokens;
    },

    supportsToolUse(): boolean {
      return meta.supportsTools;
    },
  };
}
