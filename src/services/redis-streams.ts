import type { Redis } from 'ioredis';
import { logger } from '../utils/logger';

/**
 * Redis Streams utility for job queue operations
 *
 * ProducerStreams: ONLY non-blocking operations on SHARED client (add, ack)
 * ConsumerStreams: Extends ProducerStreams, adds consume() for DEDICATED clients
 */

export interface StreamMessage {
  id: string;
  data: Record<string, string>;
}

/**
 * The consumer-side operations a stream worker needs.
 */
export interface StreamReader {
  ensureGroupOnce(streamName: string, groupName: string): Promise<void>;
  consume(
    streamName: string,
    groupName: string,
    consumerName: string,
    options?: { count?: number },
  ): Promise<StreamMessage | null>;
  /** Take over one entry another consumer has held longer than `minIdleMs` without acking. */
  claimIdle(
    streamName: string,
    groupName: string,
    consumerName: string,
    minIdleMs: number,
  ): Promise<StreamMessage | null>;
  /** Reset the idle time of an entry this consumer is still working on. */
  touch(streamName: string, groupName: string, consumerName: string, messageId: string): Promise<void>;
  ack(streamName: string, groupName: string, messageId: string): Promise<void>;
  close(): void;
}

/**
 * Wake-up signal published after every add.
 */
export interface StreamNotifier {
  subscribe(streamName: string, onNotify: () => void): Promise<void>;
  close(): Promise<void>;
}

export function notifyChannel(streamName: string): string {
  return `streams:notify:${streamName}`;
}

type StreamEntry = [id: string, fields: string[]];
type StreamReadReply = Array<[streamName: string, entries: StreamEntry[]]>;

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isStreamEntry(value: unknown): value is StreamEntry {
  return Array.isArray(value) && typeof value[0] === 'string' && isStringArray(value[1]);
}

function isStreamReadReply(value: unknown): value is StreamReadReply {
  return (
    Array.isArray(value) &&
    value.every(
      (stream) =>
        Array.isArray(stream) &&
        typeof stream[0] === 'string' &&
        Array.isArray(stream[1]) &&
        stream[1].every(isStreamEntry),
    )
  );
}

export class ProducerStreams {
  protected client: Redis;
  protected ensuredGroups: Set<string> = new Set();

  constructor(client: Redis) {
    this.client = client;
  }

  /**
   * Ensure consumer group exists - only attempts creation once per stream:group pair
   */
  async ensureGroupOnce(streamName: string, groupName: string): Promise<void> {
    const key = `${streamName}:${groupName}`;

    if (this.ensuredGroups.has(key)) {
      return;
    }

    try {
      await this.client.xgroup('CREATE', streamName, groupName, '0', 'MKSTREAM');
      logger.info({ streamName, groupName }, 'Created consumer group');
      this.ensuredGroups.add(key);
    } catch (error) {
      // BUSYGROUP error means group already exists - this is fine
      if (error instanceof Error && error.message.includes('BUSYGROUP')) {
        logger.debug({ streamName, groupName }, 'Consumer group already exists');
        this.ensuredGroups.add(key);
      } else {
        logger.error({ error, streamName, groupName }, 'Failed to create consumer group');
        throw error;
      }
    }
  }

  /**
   * Add a message to a stream and notify subscribers
   * @returns Message ID
   */
  async add(streamName: string, data: Record<string, string>): Promise<string> {
    const start = Date.now();
    const args = Object.entries(data).flat();
    const result = await this.client.xadd(streamName, '*', ...args);
    if (result === null) {
      throw new Error(`XADD to ${streamName} returned no message id`);
    }
    // Notify subscribers that work is available (Pub/Sub pattern)
    await this.client.publish(notifyChannel(streamName), '1');
    const elapsed = Date.now() - start;
    if (elapsed > 100) {
      logger.warn(
        { streamName, elapsed, connectionStatus: this.client.status },
        '[REDIS SLOW] xadd',
      );
    }
    return result;
  }

  async ack(streamName: string, groupName: string, messageId: string): Promise<void> {
    try {
      await this.client.xack(streamName, groupName, messageId);
    } catch (error) {
      logger.error({ error, streamName, groupName, messageId }, 'Failed to acknowledge message');
      throw error;
    }
  }

  /**
   * Redis returns fields as [key1, value1, key2, value2, ...]
   */
  protected parseFields(fields: string[]): Record<string, string> {
    const result: Record<string, string> = {};
    for (let i = 0; i + 1 < fields.length; i += 2) {
      result[fields[i]] = fields[i + 1];
    }
    return result;
  }
}

/**
 * Consumer streams requiring a DEDICATED Redis client.
 * Never share this client with request-path code.
 */
export class ConsumerStreams extends ProducerStreams implements StreamReader {
  /**
   * Read the next undelivered message for this consumer group without blocking.
   */
  async consume(
    streamName: string,
    groupName: string,
    consumerName: string,
    options: { count?: number } = {},
  ): Promise<StreamMessage | null> {
    const { count = 1 } = options;

    try {
      const reply: unknown = await this.client.xreadgroup(
        'GROUP',
        groupName,
        consumerName,
        'COUNT',
        count,
        'STREAMS',
        streamName,
        '>',
      );

      if (!isStreamReadReply(reply) || reply.length === 0) {
        return null;
      }

      const [[, entries]] = reply;
      if (entries.length === 0) {
        return null;
      }

      const [id, fields] = entries[0];
      return { id, data: this.parseFields(fields) };
    } catch (error) {
      logger.error({ error, streamName, groupName, consumerName }, 'Failed to consume from stream');
      throw error;
    }
  }

  /**
   * XAUTOCLAIM one entry. Redis replies [cursor, entries, deletedIds]; entries
   * deleted from the stream come back without fields and are skipped.
   */
  async claimIdle(
    streamName: string,
    groupName: string,
    consumerName: string,
    minIdleMs: number,
  ): Promise<StreamMessage | null> {
    try {
      const reply = await this.client.call(
        'XAUTOCLAIM',
        streamName,
        groupName,
        consumerName,
        minIdleMs,
        '0-0',
        'COUNT',
        1,
      );
      if (!Array.isArray(reply)) return null;
      const entries: unknown = reply[1];
      if (!Array.isArray(entries)) return null;

      const entry = entries.find(isStreamEntry);
      return entry ? { id: entry[0], data: this.parseFields(entry[1]) } : null;
    } catch (error) {
      logger.error({ error, streamName, groupName, consumerName }, 'Failed to claim idle messages');
      throw error;
    }
  }

  async touch(streamName: string, groupName: string, consumerName: string, messageId: string): Promise<void> {
    await this.client.call('XCLAIM', streamName, groupName, consumerName, 0, messageId, 'JUSTID');
  }

  close(): void {
    this.client.disconnect();
  }
}

/**
 * Pub/Sub wake-ups on a DEDICATED client (SUBSCRIBE takes over the connection).
 */
export class StreamNotifications implements StreamNotifier {
  constructor(private readonly subscriber: Redis) {}

  async subscribe(streamName: string, onNotify: () => void): Promise<void> {
    const channel = notifyChannel(streamName);
    this.subscriber.on('message', (ch: string) => {
      if (ch === channel) onNotify();
    });
    await this.subscriber.subscribe(channel);
    logger.debug({ channel }, 'Subscribed to notification channel');
  }

  async close(): Promise<void> {
    try {
      await this.subscriber.unsubscribe();
    } catch (error) {
      logger.debug({ error }, 'Unsubscribe failed during shutdown');
    }
    this.subscriber.disconnect();
  }
}
