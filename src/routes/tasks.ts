import { randomUUID } from 'node:crypto';
import { Router } from 'express';
import type { SSEService } from '../services/sse';
import { isTerminalTask } from '../services/tasks/task.types';
import type { TaskDispatcher } from '../services/tasks/dispatcher';
import { NotFoundError } from '../utils/errors';

export interface TaskRouteDeps {
  dispatcher: TaskDispatcher;
  sse: SSEService;
}

export function createTaskRoutes({ dispatcher, sse }: TaskRouteDeps) {
  const router = Router();

  router.get('/:taskId', async (req, res, next) => {
    try {
      const task = await dispatcher.queryStatus(req.params.taskId);
      if (!task) throw new NotFoundError('Task not found', 'TASK_NOT_FOUND');
      res.json({ task });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:taskId/events', async (req, res, next) => {
    try {
      const { taskId } = req.params;
      if (!(await dispatcher.queryStatus(taskId))) {
        throw new NotFoundError('Task not found', 'TASK_NOT_FOUND');
      }

      const clientId = randomUUID();
      sse.addClient(clientId, taskId, res);

      // Re-read after subscribing so a task that finished in between is not missed
      const task = await dispatcher.queryStatus(taskId);
      if (task && isTerminalTask(task)) {
        sse.sendTo(clientId, 'task-finished', task, true);
      } else if (task?.progress) {
        sse.sendTo(clientId, 'progress', task.progress);
      }
    } catch (error) {
      next(error);
    }
  });

  return router;
}
