import { logger } from '../../utils/logger';
import type { TaskHandle, TaskProgress } from '../tasks/task.types';

export type ProgressEvent =
  | { type: 'progress'; taskId: string; progress: TaskProgress; timestamp: string }
  | { type: 'finished'; taskId: string; task: TaskHandle; timestamp: string };

export type ProgressListener = (event: ProgressEvent) => void | Promise<void>;

/**
 * In-process fan-out of progress events. Publishers never see listener
 * failures; those are logged.
 */
export class ProgressChannel {
  private listeners: Set<ProgressListener> = new Set();

  subscribe(listener: ProgressListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async publish(event: ProgressEvent): Promise<void> {
    const deliveries = [...this.listeners].map(async (listener) => {
      try {
        await listener(event);
      } catch (error) {
        logger.error({ error, taskId: event.taskId, type: event.type }, 'Progress listener failed');
      }
    });
    await Promise.all(deliveries);
  }

  listenerCount(): number {
    return this.listeners.size;
  }
}

/** What the orchestrator sees of progress reporting. */
export interface ProgressReporter {
  begin(total: number, label: string): Promise<void>;
  advance(label: string): Promise<void>;
  status(label: string): Promise<void>;
}

/**
 * Tracks progress for one task. `current` only moves forward and never
 * exceeds `total`.
 */
export class TaskProgressReporter implements ProgressReporter {
  private current = 0;
  private total = 0;

  constructor(
    private readonly channel: ProgressChannel,
    private readonly taskId: string,
  ) {}

  async begin(total: number, label: string): Promise<void> {
    this.total = Math.max(this.total, total);
    await this.emit(label);
  }

  async advance(label: string): Promise<void> {
    this.current = Math.min(this.current + 1, this.total);
    await this.emit(label);
  }

  async status(label: string): Promise<void> {
    await this.emit(label);
  }

  private async emit(label: string): Promise<void> {
    await this.channel.publish({
      type: 'progress',
      taskId: this.taskId,
      progress: { current: this.current, total: this.total, label },
      timestamp: new Date().toISOString(),
    });
  }
}

/** Reporter that drops every event, for runs nobody is watching. */
export const silentReporter: ProgressReporter = {
  async begin() {},
  async advance() {},
  async status() {},
};
