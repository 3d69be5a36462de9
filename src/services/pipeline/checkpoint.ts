/**
 * Checkpointing for resumable cluster runs.
 *
 * The stored WorkUnit status is the checkpoint: a step runs only while the
 * unit has not yet moved past the status that step produces.
 */

import { hasReached, type WorkUnit } from '../clusters/cluster.types';
import type { PipelineStep } from './stages';

const STEP_OUTPUT: Record<PipelineStep, 'transcripts_ready' | 'cleaned_ready' | 'completed'> = {
  fetch: 'transcripts_ready',
  clean: 'cleaned_ready',
  synthesize: 'completed',
};

/**
 * Determine if a step should run based on the unit's status.
 */
export function shouldRunStep(unit: WorkUnit, step: PipelineStep): boolean {
  if (step === 'clean' && !unit.cleanRequested) {
    return false;
  }
  return !hasReached(unit.status, STEP_OUTPUT[step]);
}

/** Raw documents that still need an enriched counterpart. */
export function pendingCleanIds(unit: WorkUnit): string[] {
  return Object.keys(unit.rawDocuments).filter((id) => !Object.hasOwn(unit.enrichedDocuments, id));
}
