export interface GenerateOptions {
  model: string;
  maxOutputTokens: number;
  /** Stage name, used for logging */
  label: string;
}

export interface GenerateOutput {
  text: string;
  model: string;
  usage?: { inputTokens: number; outputTokens: number };
}

export interface TextGenerationProvider {
  readonly name: string;
  generate(prompt: string, options: GenerateOptions): Promise<GenerateOutput>;
}
