// LLM provider adapters (OpenAI and OpenAI-compatible servers)
export type {
  ChatEvent,
  ChatParams,
  LLMProvider,
  Message,
  MessageContent,
  MessageRole,
  StopReason,
  TextContent,
  TokenUsage,
  ToolDefinitionForProvider,
  ToolResultContent,
  ToolUseContent,
} from './types.js';

export { createProvider } from './factory.js';
export type { ProviderSettings } from './factory.js';
export { createOpenAIProvider, toOpenAIMessages, toOpenAITools } from './openai.js';
export type { OpenAIProviderOptions } from './openai.js';
export { getModelMeta } from './models.js';
export type { ModelMeta } from './models.js';
