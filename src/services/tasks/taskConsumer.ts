import { PIPELINE_GROUP, PIPELINE_STREAM } from '../../config/constants';
import { type ConsumerClients, type ConsumerOptions, PubSubConsumer } from '../../lib/pubsub-consumer';
import { logger } from '../../utils/logger';
import type { StreamMessage } from '../redis-streams';
import { parseTaskMessage } from './task.types';
import type { TaskRunner } from './taskRunner';

/**
 * Worker side of the pipeline stream. A message redelivered after a worker
 * died finds its task still `running` and re-runs it; the cluster pipeline
 * resumes from the stored checkpoint.
 */
export class PipelineTaskConsumer extends PubSubConsumer {
  protected streamName = PIPELINE_STREAM;
  protected groupName = PIPELINE_GROUP;
  protected consumerName = `pipeline-worker-${process.pid}`;

  constructor(
    clients: ConsumerClients,
    options: ConsumerOptions,
    private readonly runner: TaskRunner,
  ) {
    super('pipeline-worker', clients, options);
  }

  protected async handleMessage(message: StreamMessage): Promise<void> {
    const task = parseTaskMessage(message.data);
    if (!task) {
      logger.warn({ messageId: message.id, data: message.data }, 'Malformed pipeline message, dropping');
      return;
    }
    await this.runner.run(task);
  }
}
