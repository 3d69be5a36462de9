export { cleanTranscriptPrompt } from './clean';
export { extractKeywordsPrompt } from './keywords';
export { summarizeTranscriptPrompt } from './summarize';
export { synthesizeClusterPrompt } from './synthesize';
