/**
 * Pre-call cost estimates. Input tokens only, estimated from the model's
 * chars-per-token ratio.
 */

import type { TextModelConfig } from '../../config/text-models';

export function countTokens(text: string, charsPerToken: number): number {
  return Math.ceil(text.length / charsPerToken);
}

export function estimateCost(text: string, modelConfig: TextModelConfig): number {
  const tokens = countTokens(text, modelConfig.charsPerToken);
  return (tokens / 1_000_000) * modelConfig.costPer1MInputTokens;
}

export interface CostEstimate {
  tokenCount: number;
  estimatedCost: number;
  withinLimit: boolean;
}

export function checkBudget(
  text: string,
  modelConfig: TextModelConfig,
  maxCostUsd: number,
): CostEstimate {
  const tokenCount = countTokens(text, modelConfig.charsPerToken);
  const estimatedCost = estimateCost(text, modelConfig);
  return { tokenCount, estimatedCost, withinLimit: estimatedCost <= maxCostUsd };
}
