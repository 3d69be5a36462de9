import Redis from 'ioredis';
import {
  ConsumerStreams,
  type StreamMessage,
  StreamNotifications,
  type StreamNotifier,
  type StreamReader,
} from '../services/redis-streams';
import { logger } from '../utils/logger';

const FALLBACK_SWEEP_MS = 60000;
const STOP_TIMEOUT_MS = 3000;
const DEFAULT_CLAIM_IDLE_MS = 5 * 60 * 1000;

export interface ConsumerClients {
  streams: StreamReader;
  notifier: StreamNotifier;
}

export interface ConsumerOptions {
  /** Messages handled at once */
  concurrency?: number;
  /** Unacked entries idle this long belong to a dead worker and are taken over */
  claimIdleMs?: number;
}

/**
 * Two dedicated connections: one for SUBSCRIBE, one for XREADGROUP.
 */
export function createRedisConsumerClients(redisUrl: string, serviceName: string): ConsumerClients {
  const redisConfig = {
    maxRetriesPerRequest: 3,
    retryStrategy: (times: number) => Math.min(times * 500, 5000),
    commandTimeout: 15000,
    connectTimeout: 10000,
    enableReadyCheck: true,
    lazyConnect: false,
    enableOfflineQueue: true,
    keepAlive: 0,
    family: 4 as const,
    enableAutoPipelining: false,
  };

  const subscriber = new Redis(redisUrl, redisConfig);
  subscriber.on('error', (error) => {
    logger.error({ error, service: serviceName }, 'Subscriber client error');
  });

  const streamClient = new Redis(redisUrl, redisConfig);
  streamClient.on('error', (error) => {
    logger.error({ error, service: serviceName }, 'Stream client error');
  });

  return {
    streams: new ConsumerStreams(streamClient),
    notifier: new StreamNotifications(subscriber),
  };
}

/**
 * Base class for Pub/Sub-driven Redis Stream consumers.
 *
 * HOW IT WORKS:
 * 1. On startup: process any pending messages (XREADGROUP)
 * 2. SUBSCRIBE to the stream's notification channel
 * 3. On notification: top the worker pool back up to `concurrency`; each
 *    worker reads (no blocking) until the stream is empty
 * 4. Before reading new entries, a worker takes over any entry another
 *    consumer left unacked for `claimIdleMs` (XAUTOCLAIM)
 * 5. While a handler runs its entry is re-claimed periodically so live work
 *    is never taken over
 * 6. ACK each message after its handler settles
 * 7. Fallback: every 60s, check for pending (handles missed notifications)
 *
 * USAGE:
 * ```typescript
 * class MyConsumer extends PubSubConsumer {
 *   protected streamName = 'my-stream';
 *   protected groupName = 'my-processors';
 *   protected consumerName = `my-processor-${process.pid}`;
 *
 *   protected async handleMessage(message: StreamMessage) {
 *     // ACK is handled automatically after this returns
 *   }
 * }
 * ```
 */
export abstract class PubSubConsumer {
  protected isRunning = false;
  protected streams: StreamReader;
  private notifier: StreamNotifier;
  private serviceName: string;
  private concurrency: number;
  private claimIdleMs: number;
  private fallbackInterval: ReturnType<typeof setInterval> | null = null;
  private workers = new Set<Promise<void>>();
  /** Set when a wake-up arrives while every worker slot is taken */
  private notified = false;

  protected abstract streamName: string;
  protected abstract groupName: string;
  protected abstract consumerName: string;
  protected abstract handleMessage(message: StreamMessage): Promise<void>;

  constructor(serviceName: string, clients: ConsumerClients, options: ConsumerOptions = {}) {
    this.serviceName = serviceName;
    this.streams = clients.streams;
    this.notifier = clients.notifier;
    this.concurrency = Math.max(1, options.concurrency ?? 1);
    this.claimIdleMs = options.claimIdleMs ?? DEFAULT_CLAIM_IDLE_MS;
  }

  async start() {
    if (this.isRunning) {
      logger.warn({ service: this.serviceName }, 'Consumer already running');
      return;
    }

    this.isRunning = true;
    logger.info({ service: this.serviceName, concurrency: this.concurrency }, 'Starting Pub/Sub consumer...');

    await this.streams.ensureGroupOnce(this.streamName, this.groupName);

    // Process any pending messages before subscribing
    this.drain();

    await this.notifier.subscribe(this.streamName, () => {
      if (this.isRunning) {
        this.drain();
      }
    });
    this.startFallbackCheck();

    logger.info({ service: this.serviceName }, 'Pub/Sub consumer started successfully');
  }

  /**
   * Start workers until `concurrency` are active.
   */
  private drain() {
    if (this.workers.size >= this.concurrency) {
      this.notified = true;
      return;
    }
    while (this.isRunning && this.workers.size < this.concurrency) {
      const worker: Promise<void> = this.consumeAllPending().finally(() => {
        this.workers.delete(worker);
      });
      this.workers.add(worker);
    }
  }

  private async consumeAllPending() {
    while (this.isRunning) {
      try {
        const msg = await this.nextMessage();

        if (!msg) {
          // A wake-up may have raced this worker's empty read
          if (this.notified) {
            this.notified = false;
            continue;
          }
          break;
        }

        await this.process(msg);
      } catch (error) {
        // Shutdown in progress
        if (!this.isRunning) break;

        logger.error({ error, service: this.serviceName }, 'Error in consume loop');
        break;
      }
    }
  }

  private async nextMessage(): Promise<StreamMessage | null> {
    const reclaimed = await this.streams.claimIdle(
      this.streamName,
      this.groupName,
      this.consumerName,
      this.claimIdleMs,
    );
    if (reclaimed) {
      logger.warn(
        { messageId: reclaimed.id, service: this.serviceName },
        'Reclaimed message left unacknowledged by another consumer'
      );
      return reclaimed;
    }

    return this.streams.consume(this.streamName, this.groupName, this.consumerName, { count: 1 });
  }

  private async process(msg: StreamMessage) {
    const heartbeat = setInterval(() => {
      void this.streams
        .touch(this.streamName, this.groupName, this.consumerName, msg.id)
        .catch((error: unknown) => {
          logger.warn({ error, messageId: msg.id, service: this.serviceName }, 'Failed to refresh message claim');
        });
    }, Math.max(1000, Math.floor(this.claimIdleMs / 3)));

    try {
      await this.handleMessage(msg);
    } catch (error) {
      logger.error(
        { error, messageId: msg.id, service: this.serviceName },
        'Error processing message'
      );
    } finally {
      clearInterval(heartbeat);
    }

    // ACK after processing (even on error, to avoid reprocessing bad messages)
    await this.streams.ack(this.streamName, this.groupName, msg.id);
  }

  private startFallbackCheck() {
    // Every 60s, check for pending messages (handles missed notifications)
    this.fallbackInterval = setInterval(() => {
      if (this.isRunning) {
        this.drain();
      }
    }, FALLBACK_SWEEP_MS);
  }

  async stop() {
    if (!this.isRunning) return;

    logger.info({ service: this.serviceName }, 'Stopping Pub/Sub consumer...');
    this.isRunning = false;

    if (this.fallbackInterval) {
      clearInterval(this.fallbackInterval);
      this.fallbackInterval = null;
    }

    await this.notifier.close();

    // Wait for in-flight handlers before closing the stream client they ACK on
    if (this.workers.size > 0) {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const timeout = new Promise<void>((resolve) => {
        timer = setTimeout(() => {
          logger.warn({ service: this.serviceName }, 'Processing did not complete in time');
          resolve();
        }, STOP_TIMEOUT_MS);
      });
      await Promise.race([Promise.all(this.workers).then(() => undefined), timeout]);
      clearTimeout(timer);
    }

    this.streams.close();

    logger.info({ service: this.serviceName }, 'Pub/Sub consumer stopped');
  }
}
