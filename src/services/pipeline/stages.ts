/**
 * Step definitions and progress labels for the cluster pipeline.
 *
 * Step 1: Fetch transcripts (one source at a time)
 * Step 2: Clean transcripts (LLM, only when requested)
 * Step 3: Synthesize report (LLM, one call over all documents)
 * Step 4: Extract keywords and link them into the report
 */

export type PipelineStep = 'fetch' | 'clean' | 'synthesize';

export const STEP_LABELS: Record<PipelineStep, string> = {
  fetch: 'Fetching transcripts',
  clean: 'Cleaning transcripts',
  synthesize: 'Synthesizing report',
};

export function fetchLabel(index: number, total: number, documentId: string | null): string {
  const target = documentId ?? 'unresolved source';
  return `${STEP_LABELS.fetch} (${index}/${total}): ${target}`;
}

export function cleanLabel(index: number, total: number, documentId: string): string {
  return `${STEP_LABELS.clean} (${index}/${total}): ${documentId}`;
}
