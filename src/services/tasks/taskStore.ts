import { randomUUID } from 'node:crypto';
import { TASK_KEY_PREFIX } from '../../config/constants';
import { logger } from '../../utils/logger';
import { StorageUnavailableError } from '../pipeline/errors';
import type { KeyValueStore } from '../redis';
import {
  isTerminalTask,
  type TaskError,
  type TaskHandle,
  taskHandleSchema,
  type TaskKind,
  type TaskProgress,
  type TaskResult,
} from './task.types';

/**
 * Task handles, stored as JSON under task:<taskId>.
 *
 * Once a handle reaches succeeded or failed it is never written again, so
 * repeated reads return the same bytes.
 */
export class TaskStore {
  constructor(
    private readonly kv: KeyValueStore,
    private readonly retentionSeconds: number,
  ) {}

  private key(taskId: string): string {
    return `${TASK_KEY_PREFIX}${taskId}`;
  }

  async create(kind: TaskKind, sessionId?: string, taskId: string = randomUUID()): Promise<TaskHandle> {
    const now = new Date().toISOString();
    const task: TaskHandle = {
      taskId,
      kind,
      state: 'pending',
      ...(sessionId ? { sessionId } : {}),
      createdAt: now,
      updatedAt: now,
    };
    await this.write(task);
    return task;
  }

  /** Raw stored payload, exactly as written. */
  async getRaw(taskId: string): Promise<string | null> {
    try {
      return await this.kv.get(this.key(taskId));
    } catch (error) {
      throw new StorageUnavailableError(`get task ${taskId}`, { cause: error });
    }
  }

  async get(taskId: string): Promise<TaskHandle | null> {
    const raw = await this.getRaw(taskId);
    if (raw === null) return null;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      logger.warn({ error, taskId }, 'Stored task is not valid JSON, ignoring');
      return null;
    }
    const parsed = taskHandleSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn({ taskId, issues: parsed.error.issues }, 'Stored task failed validation, ignoring');
      return null;
    }
    return parsed.data;
  }

  async markRunning(taskId: string): Promise<TaskHandle | null> {
    return this.update(taskId, (task) => {
      if (task.state !== 'pending') return null;
      return { ...task, state: 'running' };
    });
  }

  /**
   * Record progress. Updates that would move `current` backwards are dropped.
   */
  async recordProgress(taskId: string, progress: TaskProgress): Promise<TaskHandle | null> {
    return this.update(taskId, (task) => {
      if (task.progress && progress.current < task.progress.current) return null;
      return { ...task, progress };
    });
  }

  async succeed(taskId: string, result: TaskResult): Promise<TaskHandle | null> {
    return this.update(taskId, (task) => ({
      taskId: task.taskId,
      kind: task.kind,
      sessionId: task.sessionId,
      progress: task.progress,
      createdAt: task.createdAt,
      updatedAt: task.updatedAt,
      state: 'succeeded',
      result,
    }));
  }

  async fail(taskId: string, error: TaskError): Promise<TaskHandle | null> {
    return this.update(taskId, (task) => ({
      taskId: task.taskId,
      kind: task.kind,
      sessionId: task.sessionId,
      progress: task.progress,
      createdAt: task.createdAt,
      updatedAt: task.updatedAt,
      state: 'failed',
      error,
    }));
  }

  /**
   * Apply `change` to a non-terminal handle. Returning null from `change`
   * skips the write.
   */
  private async update(
    taskId: string,
    change: (task: TaskHandle) => TaskHandle | null,
  ): Promise<TaskHandle | null> {
    const current = await this.get(taskId);
    if (!current) {
      logger.warn({ taskId }, 'Task not found for update');
      return null;
    }
    if (isTerminalTask(current)) {
      logger.debug({ taskId, state: current.state }, 'Ignoring update to terminal task');
      return current;
    }
    const next = change(current);
    if (!next) return current;

    const updated = { ...next, updatedAt: new Date().toISOString() };
    await this.write(updated);
    return updated;
  }

  private async write(task: TaskHandle): Promise<void> {
    try {
      await this.kv.set(this.key(task.taskId), JSON.stringify(task), this.retentionSeconds);
    } catch (error) {
      throw new StorageUnavailableError(`put task ${task.taskId}`, { cause: error });
    }
  }
}
