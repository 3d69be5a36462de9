import { countWords, stripTranscriptNoise } from '../../utils/transcript';
import type { PromptDefinition } from '../types';

interface CleanInput {
  transcript: string;
}

export const cleanTranscriptPrompt: PromptDefinition<CleanInput> = {
  id: 'transcript-clean',
  version: 1,
  description: 'Rewrite a raw caption transcript as readable prose without changing its meaning',

  // Cleaned output is never longer than the input; two tokens per word leaves headroom.
  maxOutputTokens: ({ transcript }) => Math.max(256, countWords(transcript) * 2),

  build: ({ transcript }) => `Clean up the following video transcript.

Rules:
- Fix punctuation, capitalization and obvious transcription errors.
- Remove filler words, false starts and repeated phrases.
- Remove sponsor reads and requests to like, subscribe or comment.
- Break the text into paragraphs at topic changes.
- Keep every substantive statement. Do not summarize, add commentary or add headings.

Return only the cleaned transcript.

Transcript:
${stripTranscriptNoise(transcript)}`,
};
