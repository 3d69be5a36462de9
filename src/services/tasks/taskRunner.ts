import { getErrorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import type { ClusterPipeline } from '../pipeline/pipeline';
import { errorCodeOf } from '../pipeline/errors';
import type { DocumentPipeline } from '../pipeline/singleDocument';
import { type ProgressChannel, TaskProgressReporter } from '../progress/progress';
import type { SessionLock } from './sessionLock';
import { isTerminalTask, type TaskHandle, type TaskMessage, type TaskResult } from './task.types';
import type { TaskStore } from './taskStore';

export interface TaskRunnerDeps {
  tasks: TaskStore;
  locks: SessionLock;
  channel: ProgressChannel;
  clusterPipeline: ClusterPipeline;
  documentPipeline: DocumentPipeline;
}

/**
 * Executes one queued task and records its terminal state.
 */
export class TaskRunner {
  constructor(private readonly deps: TaskRunnerDeps) {}

  async run(message: TaskMessage): Promise<TaskHandle | null> {
    const { tasks, locks, channel } = this.deps;
    const { taskId } = message;

    const started = await tasks.markRunning(taskId);
    if (!started) {
      logger.warn({ taskId }, 'Queued task has no handle, dropping');
      return null;
    }
    if (isTerminalTask(started)) {
      logger.info({ taskId, state: started.state }, 'Task already finished, skipping');
      return started;
    }

    const reporter = new TaskProgressReporter(channel, taskId);
    let finished: TaskHandle | null;
    try {
      const result = await this.execute(message, reporter);
      finished = await tasks.succeed(taskId, result);
      logger.info({ taskId, kind: message.kind }, 'Task succeeded');
    } catch (error) {
      logger.error({ error, taskId, kind: message.kind }, 'Task failed');
      finished = await tasks.fail(taskId, { code: errorCodeOf(error), message: getErrorMessage(error) });
    } finally {
      if (message.kind === 'cluster') {
        await locks.release(message.sessionId, taskId);
      }
    }

    if (finished) {
      await channel.publish({ type: 'finished', taskId, task: finished, timestamp: new Date().toISOString() });
    }
    return finished;
  }

  private async execute(message: TaskMessage, reporter: TaskProgressReporter): Promise<TaskResult> {
    if (message.kind === 'document') {
      return this.deps.documentPipeline.run(
        { sourceRef: message.sourceRef, cleanRequested: message.cleanRequested },
        reporter,
      );
    }

    const unit = await this.deps.clusterPipeline.run(message.sessionId, reporter);
    return {
      sessionId: unit.sessionId,
      status: unit.status,
      processedCount: Object.keys(unit.rawDocuments).length,
      totalCount: unit.sourceRefs.length,
      keywords: unit.keywords ?? [],
    };
  }
}
