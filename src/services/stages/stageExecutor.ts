import type { TextModelConfig } from '../../config/text-models';
import {
  cleanTranscriptPrompt,
  extractKeywordsPrompt,
  summarizeTranscriptPrompt,
  synthesizeClusterPrompt,
} from '../../prompts/transcripts';
import { TimeoutError, withTimeout } from '../../utils/async';
import { getErrorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { checkBudget } from '../text-generation/budget';
import type { TextGenerationProvider } from '../text-generation/provider.interface';
import type { StageRequest, StageResult, StageRunner } from './stage.types';

export interface StageExecutorOptions {
  provider: TextGenerationProvider;
  model: string;
  modelConfig: TextModelConfig;
  maxCostUsd: number;
  timeoutMs: number;
}

interface BuiltPrompt {
  promptId: string;
  text: string;
  maxOutputTokens: number;
}

function buildPrompt(request: StageRequest): BuiltPrompt {
  switch (request.kind) {
    case 'clean': {
      const input = { transcript: request.document.content };
      return {
        promptId: cleanTranscriptPrompt.id,
        text: cleanTranscriptPrompt.build(input),
        maxOutputTokens: cleanTranscriptPrompt.maxOutputTokens(input),
      };
    }
    case 'summarize': {
      const input = { documentId: request.document.id, transcript: request.document.content };
      return {
        promptId: summarizeTranscriptPrompt.id,
        text: summarizeTranscriptPrompt.build(input),
        maxOutputTokens: summarizeTranscriptPrompt.maxOutputTokens(input),
      };
    }
    case 'synthesize': {
      const input = { topic: request.topic, documents: request.documents };
      return {
        promptId: synthesizeClusterPrompt.id,
        text: synthesizeClusterPrompt.build(input),
        maxOutputTokens: synthesizeClusterPrompt.maxOutputTokens(input),
      };
    }
    case 'extractKeywords': {
      const input = { text: request.text };
      return {
        promptId: extractKeywordsPrompt.id,
        text: extractKeywordsPrompt.build(input),
        maxOutputTokens: extractKeywordsPrompt.maxOutputTokens(input),
      };
    }
    default: {
      const exhaustive: never = request;
      throw new Error(`Unknown stage: ${JSON.stringify(exhaustive)}`);
    }
  }
}

/**
 * Runs one enrichment stage through the text-generation provider.
 *
 * Never throws: every outcome is a StageResult. The budget check happens
 * before the provider is called, and nothing is retried.
 */
export class StageExecutor implements StageRunner {
  constructor(private readonly options: StageExecutorOptions) {}

  async runStage(request: StageRequest): Promise<StageResult> {
    const { provider, model, modelConfig, maxCostUsd, timeoutMs } = this.options;
    const prompt = buildPrompt(request);

    const budget = checkBudget(prompt.text, modelConfig, maxCostUsd);
    if (!budget.withinLimit) {
      logger.warn(
        { stage: request.kind, estimatedCost: budget.estimatedCost, maxCostUsd },
        'Stage rejected by cost limit',
      );
      return {
        ok: false,
        reason: 'budget_exceeded',
        message: `Estimated cost $${budget.estimatedCost.toFixed(4)} exceeds limit $${maxCostUsd.toFixed(2)}`,
      };
    }

    try {
      const output = await withTimeout(
        provider.generate(prompt.text, {
          model,
          maxOutputTokens: prompt.maxOutputTokens,
          label: request.kind,
        }),
        timeoutMs,
        `${request.kind} stage`,
      );

      const content = output.text.trim();
      if (!content) {
        logger.warn({ stage: request.kind, promptId: prompt.promptId }, 'Provider returned empty output');
        return { ok: false, reason: 'empty_output', message: 'Provider returned no text' };
      }

      logger.debug(
        { stage: request.kind, promptId: prompt.promptId, tokens: budget.tokenCount, model: output.model },
        'Stage completed',
      );
      return { ok: true, content, model: output.model };
    } catch (error) {
      if (error instanceof TimeoutError) {
        logger.warn({ stage: request.kind, timeoutMs }, 'Stage timed out');
        return { ok: false, reason: 'timeout', message: error.message };
      }
      logger.error({ error, stage: request.kind }, 'Provider call failed');
      return { ok: false, reason: 'provider_error', message: getErrorMessage(error) };
    }
  }
}
