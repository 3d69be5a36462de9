import { logger } from '../../utils/logger';
import type { TaskStore } from '../tasks/taskStore';
import type { ProgressChannel } from './progress';

/**
 * Copies progress events into the stored task handle so polling clients
 * see the same numbers as SSE clients.
 */
export function mirrorProgressToStore(channel: ProgressChannel, tasks: TaskStore): () => void {
  return channel.subscribe(async (event) => {
    if (event.type !== 'progress') return;
    const updated = await tasks.recordProgress(event.taskId, event.progress);
    if (!updated) {
      logger.debug({ taskId: event.taskId }, 'Progress for unknown task dropped');
    }
  });
}
