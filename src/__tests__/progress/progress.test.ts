import { describe, expect, test } from 'vitest';
import { ProgressChannel, TaskProgressReporter } from '../../services/progress/progress';

describe('ProgressChannel', () => {
  test('keeps delivering when one listener throws', async () => {
    const channel = new ProgressChannel();
    const received: string[] = [];
    channel.subscribe(() => {
      throw new Error('listener broke');
    });
    channel.subscribe((event) => {
      received.push(event.taskId);
    });

    await channel.publish({
      type: 'progress',
      taskId: 'task-1',
      progress: { current: 0, total: 1, label: 'start' },
      timestamp: '2026-01-01T00:00:00.000Z',
    });

    expect(received).toEqual(['task-1']);
  });

  test('stops delivering after unsubscribe', async () => {
    const channel = new ProgressChannel();
    const unsubscribe = channel.subscribe(() => {});

    unsubscribe();

    expect(channel.listenerCount()).toBe(0);
  });
});

describe('TaskProgressReporter', () => {
  test('never moves current past total', async () => {
    const channel = new ProgressChannel();
    const currents: number[] = [];
    channel.subscribe((event) => {
      if (event.type === 'progress') currents.push(event.progress.current);
    });
    const reporter = new TaskProgressReporter(channel, 'task-1');

    await reporter.begin(2, 'start');
    await reporter.advance('one');
    await reporter.advance('two');
    await reporter.advance('three');
    await reporter.status('done');

    expect(currents).toEqual([0, 1, 2, 2, 2]);
  });
});
