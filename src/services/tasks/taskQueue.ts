import { PIPELINE_GROUP, PIPELINE_STREAM } from '../../config/constants';
import type { ProducerStreams } from '../redis-streams';
import { serializeTaskMessage, type TaskMessage } from './task.types';

export interface TaskQueue {
  enqueue(message: TaskMessage): Promise<void>;
}

export class RedisStreamTaskQueue implements TaskQueue {
  constructor(private readonly streams: ProducerStreams) {}

  async enqueue(message: TaskMessage): Promise<void> {
    await this.streams.ensureGroupOnce(PIPELINE_STREAM, PIPELINE_GROUP);
    await this.streams.add(PIPELINE_STREAM, serializeTaskMessage(message));
  }
}
