/**
 * Model metadata registry.
 * Maps model identifiers served through the OpenAI-compatible API to their capabilities.
 */

export interface ModelMeta {
  /** Context window size in tokens. */
  contextWindow: number;
  /** Maximum output tokens supported. */
  maxOutputTokens: number;
  /** Whether the model supports tool/function calling. */
  supportsTools: boolean;
}

const MODEL_REGISTRY: Record<string, ModelMeta> = {
  'gpt-4o': { contextWindow: 128_000, maxOutputTokens: 16_384, supportsTools: true },
  'gpt-4o-mini': { contextWindow: 128_000, maxOutputTokens: 16_384, supportsTools: true },
  'gpt-4.1': { contextWindow: 1_047_576, maxOutputTokens: 32_768, supportsTools: true },
  'gpt-4.1-mini': { contextWindow: 1_047_576, maxOutputTokens: 32_768, supportsTools: true },
  'gpt-4.1-nano': { contextWindow: 1_047_576, maxOutputTokens: 32_768, supportsTools: true },
  'o3-mini': { contextWindow: 200_000, maxOutputTokens: 100_000, supportsTools: true },
};

/** Conservative defaults for models not in the registry. */
const DEFAULT_META: ModelMeta = {
  contextWindow: 8_192,
  maxOutputTokens: 4_096,
  supportsTools: true,
};

/**
 * Look up metadata for a model.
 * Returns conservative defaults for unrecognized models.
 */
export function getModelMeta(model: string): ModelMeta {
  return MODEL_REGISTRY[model] ?? DEFAULT_META;
}
