import type { TextProviderName } from '../../config/text-models';
import type { TextGenerationProvider } from './provider.interface';
import { GeminiTextProvider } from './providers/gemini.provider';
import { OpenAITextProvider } from './providers/openai.provider';

export interface ProviderCredentials {
  geminiApiKey?: string;
  openaiApiKey?: string;
}

export function createTextProvider(
  name: TextProviderName,
  credentials: ProviderCredentials,
): TextGenerationProvider {
  switch (name) {
    case 'openai':
      return new OpenAITextProvider(credentials.openaiApiKey);
    default:
      return new GeminiTextProvider(credentials.geminiApiKey);
  }
}
