import { randomUUID } from 'node:crypto';
import { BadRequestError, ConflictError, NotFoundError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { isTerminalStatus, type WorkUnit } from '../clusters/cluster.types';
import type { ClusterStore } from '../clusters/clusterStore';
import type { DocumentSource } from '../sources/source.interface';
import type { SessionLock } from './sessionLock';
import type { TaskHandle, TaskMessage } from './task.types';
import type { TaskQueue } from './taskQueue';
import type { TaskStore } from './taskStore';

export interface ClusterSubmission {
  name: string;
  sourceRefs: string[];
  cleanRequested: boolean;
}

export interface DocumentSubmission {
  sourceRef: string;
  cleanRequested: boolean;
}

export interface SubmittedTask {
  taskId: string;
  sessionId?: string;
}

export interface DispatcherDeps {
  tasks: TaskStore;
  clusters: ClusterStore;
  locks: SessionLock;
  queue: TaskQueue;
  source: DocumentSource;
}

/**
 * Accepts pipeline runs and hands them to the worker queue. Every submit
 * returns as soon as a pending task handle exists and the message is queued.
 */
export class TaskDispatcher {
  constructor(private readonly deps: DispatcherDeps) {}

  async submitCluster(input: ClusterSubmission): Promise<SubmittedTask> {
    const now = new Date().toISOString();
    const unit: WorkUnit = {
      sessionId: randomUUID(),
      name: input.name,
      sourceRefs: input.sourceRefs,
      cleanRequested: input.cleanRequested,
      status: 'pending',
      rawDocuments: {},
      enrichedDocuments: {},
      createdAt: now,
      updatedAt: now,
    };
    await this.deps.clusters.put(unit.sessionId, unit);
    logger.info({ sessionId: unit.sessionId, sources: unit.sourceRefs.length }, 'Cluster created');
    return this.dispatchCluster(unit.sessionId);
  }

  async submitDocument(input: DocumentSubmission): Promise<SubmittedTask> {
    if (!this.deps.source.resolveDocumentId(input.sourceRef)) {
      throw new BadRequestError(`Could not resolve a document id from "${input.sourceRef}"`, 'INPUT_INVALID');
    }

    const task = await this.deps.tasks.create('document');
    await this.enqueue({
      kind: 'document',
      taskId: task.taskId,
      sourceRef: input.sourceRef,
      cleanRequested: input.cleanRequested,
    });
    return { taskId: task.taskId };
  }

  /** Re-run a non-terminal cluster from its stored checkpoint. */
  async resumeCluster(sessionId: string): Promise<SubmittedTask> {
    const unit = await this.requireCluster(sessionId);
    if (isTerminalStatus(unit.status)) {
      throw new ConflictError(`Cluster ${sessionId} is already ${unit.status}`, 'CLUSTER_TERMINAL');
    }
    return this.dispatchCluster(sessionId);
  }

  /**
   * Start a new cluster seeded with the documents a failed one already holds.
   * The failed unit itself is left as it is.
   */
  async retryCluster(sessionId: string): Promise<SubmittedTask> {
    const failed = await this.requireCluster(sessionId);
    if (failed.status !== 'failed') {
      throw new ConflictError(`Only failed clusters can be retried (status: ${failed.status})`, 'CLUSTER_NOT_FAILED');
    }

    const now = new Date().toISOString();
    const unit: WorkUnit = {
      sessionId: randomUUID(),
      name: failed.name,
      sourceRefs: failed.sourceRefs,
      cleanRequested: failed.cleanRequested,
      status: 'pending',
      rawDocuments: { ...failed.rawDocuments },
      enrichedDocuments: { ...failed.enrichedDocuments },
      retriedFrom: failed.sessionId,
      createdAt: now,
      updatedAt: now,
    };
    await this.deps.clusters.put(unit.sessionId, unit);
    logger.info({ sessionId: unit.sessionId, retriedFrom: sessionId }, 'Cluster retry created');
    return this.dispatchCluster(unit.sessionId);
  }

  async queryStatus(taskId: string): Promise<TaskHandle | null> {
    return this.deps.tasks.get(taskId);
  }

  private async requireCluster(sessionId: string): Promise<WorkUnit> {
    const unit = await this.deps.clusters.get(sessionId);
    if (!unit) throw new NotFoundError(`Cluster ${sessionId} not found`, 'CLUSTER_NOT_FOUND');
    return unit;
  }

  private async dispatchCluster(sessionId: string): Promise<SubmittedTask> {
    const taskId = randomUUID();
    const acquired = await this.deps.locks.acquire(sessionId, taskId);
    if (!acquired) {
      throw new ConflictError(`Cluster ${sessionId} is already being processed`, 'SESSION_LOCKED');
    }

    try {
      await this.deps.tasks.create('cluster', sessionId, taskId);
      await this.enqueue({ kind: 'cluster', taskId, sessionId });
    } catch (error) {
      await this.deps.locks.release(sessionId, taskId);
      throw error;
    }
    return { taskId, sessionId };
  }

  private async enqueue(message: TaskMessage): Promise<void> {
    try {
      await this.deps.queue.enqueue(message);
    } catch (error) {
      logger.error({ error, taskId: message.taskId }, 'Failed to enqueue task');
      await this.deps.tasks.fail(message.taskId, {
        code: 'QUEUE_UNAVAILABLE',
        message: 'Task could not be queued',
      });
      throw error;
    }
    logger.info({ taskId: message.taskId, kind: message.kind }, 'Task queued');
  }
}
