import type OpenAI from 'openai';
import { logger } from '../../../utils/logger';
import type { GenerateOptions, GenerateOutput, TextGenerationProvider } from '../provider.interface';

export class OpenAITextProvider implements TextGenerationProvider {
  readonly name = 'openai';
  private clientPromise: Promise<OpenAI | null> | null = null;

  constructor(private readonly apiKey: string | undefined) {}

  private async createClient(): Promise<OpenAI | null> {
    const { default: OpenAIClient } = await import('openai');
    if (!this.apiKey) {
      logger.warn('OPENAI_API_KEY not configured');
      return null;
    }
    return new OpenAIClient({ apiKey: this.apiKey });
  }

  private getClient(): Promise<OpenAI | null> {
    if (!this.clientPromise) {
      this.clientPromise = this.createClient();
    }
    return this.clientPromise;
  }

  async generate(prompt: string, options: GenerateOptions): Promise<GenerateOutput> {
    const client = await this.getClient();
    if (!client) throw new Error('OpenAI client not configured');

    const response = await client.chat.completions.create({
      model: options.model,
      messages: [{ role: 'user', content: prompt }],
      max_tokens: options.maxOutputTokens,
    });

    const text = response.choices[0]?.message?.content ?? '';
    return {
      text,
      model: response.model,
      usage: response.usage
        ? { inputTokens: response.usage.prompt_tokens, outputTokens: response.usage.completion_tokens }
        : undefined,
    };
  }
}
