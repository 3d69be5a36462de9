import type { PromptDefinition } from '../types';

interface KeywordsInput {
  text: string;
}

export const extractKeywordsPrompt: PromptDefinition<KeywordsInput> = {
  id: 'keywords-extract',
  version: 1,
  description: 'Comma-separated key terms worth linking in a report',
  maxOutputTokens: () => 500,

  build: ({ text }) => `List the 10 to 20 most important concepts, names and technical terms in the text below.

Return them as a single comma-separated line with no numbering and no other text.

Text:
${text}`,
};
