import { describe, expect, test } from 'vitest';
import { parseEnv } from '../env';
import { pipelineConfigFromEnv } from '../pipeline';

describe('parseEnv', () => {
  test('applies defaults', () => {
    const env = parseEnv({});

    expect(env.LLM_PROVIDER).toBe('gemini');
    expect(env.MAX_COST_LIMIT).toBe(0.1);
    expect(env.STAGE_TIMEOUT_MS).toBe(120000);
    expect(env.RETENTION_SECONDS).toBe(604800);
    expect(env.OUTPUT_DIR).toBe('./output');
    expect(env.TRANSCRIPT_LANGUAGE).toBe('en');
  });

  test('rejects a non-numeric cost limit', () => {
    expect(() => parseEnv({ MAX_COST_LIMIT: 'abc' })).toThrow(/^Environment validation failed:\nMAX_COST_LIMIT/);
  });

  test('rejects an unknown provider', () => {
    expect(() => parseEnv({ LLM_PROVIDER: 'mystery' })).toThrow('Environment validation failed');
  });
});

describe('pipelineConfigFromEnv', () => {
  test('uses the provider default model when none is set', () => {
    const config = pipelineConfigFromEnv(parseEnv({ LLM_PROVIDER: 'openai' }));

    expect(config.model).toBe('gpt-4o-mini');
    expect(config.modelConfig.charsPerToken).toBe(4);
  });

  test('prices an unknown model like the provider default', () => {
    const config = pipelineConfigFromEnv(parseEnv({ LLM_MODEL: 'gemini-experimental' }));

    expect(config.model).toBe('gemini-experimental');
    expect(config.modelConfig.costPer1MInputTokens).toBe(0.075);
  });
});
