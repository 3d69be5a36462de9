import { z } from 'zod';
import { MAX_CLUSTER_NAME_LENGTH } from '../../config/constants';
import { InvalidTransitionError } from '../pipeline/errors';

export const CLUSTER_STATUSES = [
  'pending',
  'processing',
  'transcripts_ready',
  'cleaned_ready',
  'completed',
  'failed',
] as const;

export type ClusterStatus = (typeof CLUSTER_STATUSES)[number];

export const workUnitSchema = z.object({
  sessionId: z.string().uuid(),
  name: z.string().min(1).max(MAX_CLUSTER_NAME_LENGTH),
  sourceRefs: z.array(z.string()).min(1),
  cleanRequested: z.boolean(),
  status: z.enum(CLUSTER_STATUSES),
  rawDocuments: z.record(z.string()),
  enrichedDocuments: z.record(z.string()),
  synthesis: z.string().optional(),
  keywords: z.array(z.string()).optional(),
  error: z.string().optional(),
  retriedFrom: z.string().optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export type WorkUnit = z.infer<typeof workUnitSchema>;

export interface ClusterSummary {
  sessionId: string;
  name: string;
  status: ClusterStatus;
  sourceCount: number;
  documentCount: number;
  createdAt: string;
  updatedAt: string;
}

/** Position along the forward path; failed sits outside it. */
const STATUS_RANK: Record<Exclude<ClusterStatus, 'failed'>, number> = {
  pending: 0,
  processing: 1,
  transcripts_ready: 2,
  cleaned_ready: 3,
  completed: 4,
};

export function isTerminalStatus(status: ClusterStatus): boolean {
  return status === 'completed' || status === 'failed';
}

export function canTransition(from: ClusterStatus, to: ClusterStatus): boolean {
  if (isTerminalStatus(from)) return false;
  if (to === 'failed') return true;
  if (from === 'failed') return false;
  return STATUS_RANK[to] > STATUS_RANK[from];
}

export function assertTransition(from: ClusterStatus, to: ClusterStatus): void {
  if (from === to) return;
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}

/** True once `status` has moved past `step` along the forward path. */
export function hasReached(status: ClusterStatus, step: Exclude<ClusterStatus, 'failed'>): boolean {
  if (status === 'failed') return false;
  return STATUS_RANK[status] >= STATUS_RANK[step];
}

export function toClusterSummary(unit: WorkUnit): ClusterSummary {
  return {
    sessionId: unit.sessionId,
    name: unit.name,
    status: unit.status,
    sourceCount: unit.sourceRefs.length,
    documentCount: Object.keys(unit.rawDocuments).length,
    createdAt: unit.createdAt,
    updatedAt: unit.updatedAt,
  };
}
