/**
 * Prompt management types.
 * Prompts are versioned so stored outputs can be traced back to the wording
 * that produced them.
 */

export interface PromptDefinition<TInput = unknown> {
  /** Unique identifier for this prompt (used in logs) */
  id: string;

  version: number;

  /** Human-readable description of what this prompt does */
  description: string;

  /** Output token ceiling passed to the provider */
  maxOutputTokens: (input: TInput) => number;

  /** Function that builds the prompt string from input */
  build: (input: TInput) => string;
}
