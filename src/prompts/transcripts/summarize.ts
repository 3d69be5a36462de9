import type { PromptDefinition } from '../types';

interface SummarizeInput {
  documentId: string;
  transcript: string;
}

export const summarizeTranscriptPrompt: PromptDefinition<SummarizeInput> = {
  id: 'transcript-summarize',
  version: 1,
  description: 'Structured Markdown summary of a single transcript',
  maxOutputTokens: () => 1000,

  build: ({ documentId, transcript }) => `Summarize the transcript of video ${documentId}.

Format the summary in Markdown with these sections:
## Overview
Two or three sentences on what the video covers.
## Key Points
A bulleted list of the main claims or ideas.
## Notable Details
Figures, names, examples or quotes worth keeping.

Transcript:
${transcript}`,
};
