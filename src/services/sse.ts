import type { Response } from 'express';
import { logger } from '../utils/logger';
import type { ProgressChannel, ProgressEvent } from './progress/progress';

interface SSEClient {
  id: string;
  taskId: string;
  res: Response;
}

/**
 * Server-Sent Events fan-out of task progress. Subscribes to the progress
 * channel once and forwards events to the clients watching that task.
 */
export class SSEService {
  private clients: Map<string, SSEClient> = new Map();
  private unsubscribe: (() => void) | null = null;

  attach(channel: ProgressChannel) {
    this.unsubscribe?.();
    this.unsubscribe = channel.subscribe((event) => this.forward(event));
  }

  detach() {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  addClient(clientId: string, taskId: string, res: Response) {
    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      'Connection': 'keep-alive',
    });

    this.clients.set(clientId, { id: clientId, taskId, res });

    res.write(`data: ${JSON.stringify({ type: 'connected', taskId })}\n\n`);

    logger.info({ clientId, taskId }, 'SSE client connected');

    res.on('close', () => {
      this.clients.delete(clientId);
      logger.info({ clientId, taskId }, 'SSE client disconnected');
    });
  }

  /** Send one event to a single client, then optionally end its stream. */
  sendTo(clientId: string, event: string, data: unknown, end = false) {
    const client = this.clients.get(clientId);
    if (!client) return;
    this.write(client, `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
    if (end) {
      client.res.end();
      this.clients.delete(clientId);
    }
  }

  broadcastToTask(taskId: string, event: string, data: unknown, end = false) {
    const message = `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;

    for (const client of [...this.clients.values()]) {
      if (client.taskId !== taskId) continue;
      this.write(client, message);
      if (end) {
        client.res.end();
        this.clients.delete(client.id);
      }
    }
  }

  private forward(event: ProgressEvent) {
    if (event.type === 'progress') {
      this.broadcastToTask(event.taskId, 'progress', { ...event.progress, timestamp: event.timestamp });
    } else {
      this.broadcastToTask(event.taskId, 'task-finished', event.task, true);
    }
  }

  private write(client: SSEClient, message: string) {
    try {
      client.res.write(message);
    } catch (error) {
      logger.error({ error, clientId: client.id }, 'Failed to send SSE message');
      this.clients.delete(client.id);
    }
  }
}
