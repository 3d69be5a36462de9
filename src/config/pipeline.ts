import type { Env } from './env';
import { DEFAULT_TEXT_MODELS, getTextModelConfig, type TextModelConfig, type TextProviderName } from './text-models';

/**
 * Everything a pipeline run needs to know about its environment.
 * Built once at startup and handed to each component; nothing below the
 * composition root reads process.env.
 */
export interface PipelineConfig {
  provider: TextProviderName;
  model: string;
  modelConfig: TextModelConfig;
  maxCostUsd: number;
  stageTimeoutMs: number;
  retentionSeconds: number;
  transcriptLanguage: string;
  outputDir: string;
  workerConcurrency: number;
}

export function pipelineConfigFromEnv(env: Env): PipelineConfig {
  const model = env.LLM_MODEL ?? DEFAULT_TEXT_MODELS[env.LLM_PROVIDER];
  return {
    provider: env.LLM_PROVIDER,
    model,
    modelConfig: getTextModelConfig(model, env.LLM_PROVIDER),
    maxCostUsd: env.MAX_COST_LIMIT,
    stageTimeoutMs: env.STAGE_TIMEOUT_MS,
    retentionSeconds: env.RETENTION_SECONDS,
    transcriptLanguage: env.TRANSCRIPT_LANGUAGE,
    outputDir: env.OUTPUT_DIR,
    workerConcurrency: env.WORKER_CONCURRENCY,
  };
}
