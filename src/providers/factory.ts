/**
 * Provider factory.
 * Resolves the engine's model settings into a concrete LLMProvider instance.
 */
import type { Settings } from '@/config/schema.js';
import { ProviderError } from '@/core/errors.js';
import { createLogger } from '@/observability/logger.js';
import { createOpenAIProvider } from './openai.js';
import type { LLMProvider } from './types.js';

const logger = createLogger({ name: 'provider-factory' });

export type ProviderSettings = Pick<Settings, 'openaiApiKey' | 'openaiModel' | 'openaiBaseUrl'>;

/**
 * Create an LLMProvider from settings.
 * A custom base URL without an API key targets a local OpenAI-compatible
 * server (Ollama); otherwise OPENAI_API_KEY is required.
 */
export function createProvider(settings: ProviderSettings): LLMProvider {
  const { openaiApiKey, openaiModel, openaiBaseUrl } = settings;

  if (!openaiApiKey && !openaiBaseUrl) {
    throw new ProviderError('openai', 'OPENAI_API_KEY is not set');
  }

  const providerLabel = openaiApiKey ? 'openai' : 'ollama';
  logger.info('Creating LLM provider', {
    component: 'provider-factory',
    provider: providerLabel,
    model: openaiModel,
    customBaseUrl: openaiBaseUrl !== undefined,
  });

  return createOpenAIProvider({
    apiKey: openaiApiKey ?? 'ollama',
    model: openaiModel,
    baseUrl: openaiBaseUrl,
    providerLabel,
  });
}
