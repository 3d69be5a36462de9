import type { PromptDefinition } from '../types';

interface SynthesizeInput {
  topic: string;
  documents: Array<{ id: string; content: string }>;
}

export const synthesizeClusterPrompt: PromptDefinition<SynthesizeInput> = {
  id: 'cluster-synthesize',
  version: 1,
  description: 'Cross-document research report over every transcript in a cluster',
  maxOutputTokens: () => 3000,

  build: ({ topic, documents }) => {
    const sources = documents
      .map((doc, index) => `### Source ${index + 1} (${doc.id})\n${doc.content}`)
      .join('\n\n');

    return `You are writing a research report on "${topic}" from ${documents.length} video transcripts.

Write the report in Markdown with these sections:
## Summary
## Common Themes
## Points of Disagreement
## Unique Insights
## Key Concepts
## Conclusion

Rules:
- Attribute claims to their source number where it matters.
- Mark important concepts as [[WikiLinks]].
- Do not invent facts that are not in the transcripts.

${sources}`;
  },
};
