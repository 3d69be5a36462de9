export type TextProviderName = 'gemini' | 'openai';

/**
 * Text generation model configurations.
 * Used for pre-call cost estimates.
 */
export interface TextModelConfig {
  provider: TextProviderName;
  maxTokens: number;
  /** Characters per token estimate (for budget calculations) */
  charsPerToken: number;
  costPer1MInputTokens: number;
  costPer1MOutputTokens?: number;
}

export const TEXT_MODELS: Record<string, TextModelConfig> = {
  'gemini-2.5-flash': {
    provider: 'gemini',
    maxTokens: 1048576,
    charsPerToken: 3.3,
    costPer1MInputTokens: 0.075,
    costPer1MOutputTokens: 0.3,
  },
  'gemini-2.5-pro': {
    provider: 'gemini',
    maxTokens: 1048576,
    charsPerToken: 3.3,
    costPer1MInputTokens: 1.25,
    costPer1MOutputTokens: 10.0,
  },
  'gemini-2.0-flash': {
    provider: 'gemini',
    maxTokens: 1048576,
    charsPerToken: 3.3,
    costPer1MInputTokens: 0.1,
    costPer1MOutputTokens: 0.4,
  },
  'gpt-4o-mini': {
    provider: 'openai',
    maxTokens: 128000,
    charsPerToken: 4,
    costPer1MInputTokens: 0.15,
    costPer1MOutputTokens: 0.6,
  },
  'gpt-4o': {
    provider: 'openai',
    maxTokens: 128000,
    charsPerToken: 4,
    costPer1MInputTokens: 2.5,
    costPer1MOutputTokens: 10.0,
  },
};

export const DEFAULT_TEXT_MODELS: Record<TextProviderName, string> = {
  gemini: 'gemini-2.5-flash',
  openai: 'gpt-4o-mini',
};

/**
 * Get model config by ID. Unknown models fall back to a conservative
 * estimate priced like the provider's default model.
 */
export function getTextModelConfig(modelId: string, provider: TextProviderName): TextModelConfig {
  return TEXT_MODELS[modelId] ?? { ...TEXT_MODELS[DEFAULT_TEXT_MODELS[provider]], provider };
}
