import { afterEach, describe, expect, test, vi } from 'vitest';
import { MemoryNotifier, MemoryStream } from '../../__tests__/helpers/mocks';
import type { StreamMessage } from '../../services/redis-streams';
import { type ConsumerOptions, PubSubConsumer } from '../pubsub-consumer';

const STREAM = 'jobs:stream';

interface Gate {
  promise: Promise<void>;
  open: () => void;
}

function gate(): Gate {
  let open: () => void = () => {};
  const promise = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { promise, open };
}

class RecordingConsumer extends PubSubConsumer {
  protected streamName = STREAM;
  protected groupName = 'jobs-group';
  protected consumerName = 'worker-1';
  readonly started: string[] = [];
  private readonly gates = new Map<string, Gate>();

  constructor(stream: MemoryStream, notifier: MemoryNotifier, options: ConsumerOptions) {
    super('test-consumer', { streams: stream, notifier }, options);
  }

  hold(name: string): void {
    this.gates.set(name, gate());
  }

  release(name: string): void {
    this.gates.get(name)?.open();
  }

  protected async handleMessage(message: StreamMessage): Promise<void> {
    this.started.push(message.data.name);
    await this.gates.get(message.data.name)?.promise;
  }
}

describe('PubSubConsumer', () => {
  let stream: MemoryStream;
  let notifier: MemoryNotifier;
  let consumer: RecordingConsumer | null = null;

  function createConsumer(options: ConsumerOptions): RecordingConsumer {
    stream = new MemoryStream();
    notifier = new MemoryNotifier();
    consumer = new RecordingConsumer(stream, notifier, options);
    return consumer;
  }

  afterEach(async () => {
    await consumer?.stop();
    consumer = null;
  });

  test('starts a newly notified message while another is still being handled', async () => {
    const worker = createConsumer({ concurrency: 2 });
    worker.hold('A');
    const first = stream.add({ name: 'A' });
    await worker.start();
    await vi.waitFor(() => expect(worker.started).toEqual(['A']));

    const second = stream.add({ name: 'B' });
    notifier.notify(STREAM);

    await vi.waitFor(() => expect(stream.acked).toEqual([second]));
    expect(worker.started).toEqual(['A', 'B']);

    worker.release('A');
    await vi.waitFor(() => expect(stream.acked).toEqual([second, first]));
  });

  test('holds a notified message until a slot frees up', async () => {
    const worker = createConsumer({ concurrency: 1 });
    worker.hold('A');
    stream.add({ name: 'A' });
    await worker.start();
    await vi.waitFor(() => expect(worker.started).toEqual(['A']));

    stream.add({ name: 'B' });
    notifier.notify(STREAM);
    await new Promise((resolve) => setTimeout(resolve, 50));
    expect(worker.started).toEqual(['A']);

    worker.release('A');
    await vi.waitFor(() => expect(worker.started).toEqual(['A', 'B']));
  });

  test('takes over an entry a dead consumer left unacknowledged', async () => {
    const worker = createConsumer({ claimIdleMs: 60_000 });
    const orphan = stream.leavePending('worker-gone', { name: 'C' }, 120_000);

    await worker.start();

    await vi.waitFor(() => expect(stream.acked).toEqual([orphan]));
    expect(worker.started).toEqual(['C']);
    expect(stream.pending.size).toBe(0);
  });

  test('leaves recently delivered entries with their consumer', async () => {
    const worker = createConsumer({ claimIdleMs: 60_000 });
    stream.leavePending('worker-2', { name: 'D' }, 1_000);

    await worker.start();
    await new Promise((resolve) => setTimeout(resolve, 50));

    expect(worker.started).toEqual([]);
    expect(stream.pending.get('1-0')?.consumer).toBe('worker-2');
  });

  test('refreshes the claim on an entry while its handler runs', async () => {
    const worker = createConsumer({ claimIdleMs: 3_000 });
    worker.hold('E');
    const id = stream.add({ name: 'E' });
    await worker.start();

    await vi.waitFor(() => expect(stream.touched).toContain(id), { timeout: 2_500 });

    worker.release('E');
    await vi.waitFor(() => expect(stream.acked).toEqual([id]));
  });

  test('acks a message whose handler throws', async () => {
    class FailingConsumer extends RecordingConsumer {
      protected async handleMessage(): Promise<void> {
        throw new Error('handler crashed');
      }
    }
    stream = new MemoryStream();
    notifier = new MemoryNotifier();
    consumer = new FailingConsumer(stream, notifier, {});
    const id = stream.add({ name: 'F' });

    await consumer.start();

    await vi.waitFor(() => expect(stream.acked).toEqual([id]));
  });

  test('closes both connections on stop', async () => {
    const worker = createConsumer({});
    await worker.start();

    await worker.stop();

    expect(notifier.closed).toBe(true);
    expect(stream.closed).toBe(true);
  });
});
