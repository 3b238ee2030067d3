/**
 * Known model identifiers and their capabilities.
 * Model identity is configuration; nothing outside the providers branches on it.
 */

export const EMBEDDING_MODELS = {
  'text-embedding-3-small': {
    provider: 'openai',
    dimensions: 1536,
    maxTokens: 8191,
  },
  'text-embedding-3-large': {
    provider: 'openai',
    dimensions: 3072,
    maxTokens: 8191,
  },
} as const;

export type EmbeddingModelId = keyof typeof EMBEDDING_MODELS;

export interface JudgmentModelConfig {
  provider: 'gemini';
  /** Sampling temperature; stance scoring runs deterministic */
  temperature: number;
  maxOutputTokens: number;
}

export const JUDGMENT_MODELS: Record<string, JudgmentModelConfig> = {
  'gemini-2.5-flash': {
    provider: 'gemini',
    temperature: 0,
    maxOutputTokens: 1024,
  },
  'gemini-2.5-pro': {
    provider: 'gemini',
    temperature: 0,
    maxOutputTokens: 2048,
  },
};

export function isKnownEmbeddingModel(modelId: string): modelId is EmbeddingModelId {
  return modelId in EMBEDDING_MODELS;
}

/**
 * Get judgment model config by ID, with fallback to gemini-2.5-flash defaults.
 */
export function getJudgmentModelConfig(modelId: string): JudgmentModelConfig {
  return JUDGMENT_MODELS[modelId] ?? JUDGMENT_MODELS['gemini-2.5-flash'];
}
