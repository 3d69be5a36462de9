import { GoogleGenerativeAI } from '@google/generative-ai';
import { logger } from '../../../utils/logger';
import type { GenerateOptions, GenerateOutput, TextGenerationProvider } from '../provider.interface';

export class GeminiTextProvider implements TextGenerationProvider {
  readonly name = 'gemini';
  private genAI: GoogleGenerativeAI | null;

  constructor(apiKey: string | undefined) {
    if (!apiKey) {
      logger.warn('GEMINI_API_KEY not configured');
    }
    this.genAI = apiKey ? new GoogleGenerativeAI(apiKey) : null;
  }

  async generate(prompt: string, options: GenerateOptions): Promise<GenerateOutput> {
    if (!this.genAI) throw new Error('Gemini client not configured');

    const model = this.genAI.getGenerativeModel({
      model: options.model,
      generationConfig: { maxOutputTokens: options.maxOutputTokens },
    });

    const start = Date.now();
    const result = await model.generateContent(prompt);
    const usage = result.response.usageMetadata;

    logger.debug(
      { stage: options.label, model: options.model, elapsed: Date.now() - start },
      'Gemini generation finished',
    );

    return {
      text: result.response.text(),
      model: options.model,
      usage: usage
        ? { inputTokens: usage.promptTokenCount, outputTokens: usage.candidatesTokenCount }
        : undefined,
    };
  }
}
