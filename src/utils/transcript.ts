const NOISE_PATTERNS: RegExp[] = [
  /\[[^\]]*\]/g, // [Music], [Applause]
  /\([^)]*\)/g, // (laughs)
  /\b(?:um+|uh+|ah+|er|hmm+|you know|i mean)\b,?/gi,
  /\b(?:please )?like and subscribe\b[.!]?/gi,
  /\bthanks for watching\b[.!]?/gi,
  /\bhit the bell icon\b[.!]?/gi,
  /\bcomment below\b[.!]?/gi,
];

/**
 * Strip caption cues, filler words and channel boilerplate from a transcript.
 * Purely lexical; meaning-level cleanup is left to the clean stage.
 */
export function stripTranscriptNoise(transcript: string): string {
  let cleaned = transcript;
  for (const pattern of NOISE_PATTERNS) {
    cleaned = cleaned.replace(pattern, ' ');
  }
  return cleaned
    .replace(/\s+/g, ' ')
    .replace(/\s+([,.!?;:])/g, '$1')
    .trim();
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}
