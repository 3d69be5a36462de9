import type { Server } from 'node:http';
import { z } from 'zod';
import { createApp } from '../../app';
import type { PipelineConfig } from '../../config/pipeline';
import { getTextModelConfig } from '../../config/text-models';
import { buildServices, type Services } from '../../runtime';
import { workUnitSchema } from '../../services/clusters/cluster.types';
import { taskHandleSchema } from '../../services/tasks/task.types';
import {
  FakeSource,
  FakeTextProvider,
  InlineTaskQueue,
  MemoryArtifactStorage,
  MemoryKeyValueStore,
} from './mocks';

export function createTestConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return {
    provider: 'gemini',
    model: 'gemini-2.5-flash',
    modelConfig: getTextModelConfig('gemini-2.5-flash', 'gemini'),
    maxCostUsd: 0.1,
    stageTimeoutMs: 1000,
    retentionSeconds: 604800,
    transcriptLanguage: 'en',
    outputDir: './output-test',
    workerConcurrency: 1,
    ...overrides,
  };
}

export interface TestHarness {
  services: Services;
  kv: MemoryKeyValueStore;
  source: FakeSource;
  provider: FakeTextProvider;
  storage: MemoryArtifactStorage;
  queue: InlineTaskQueue;
}

export function createTestHarness(configOverrides: Partial<PipelineConfig> = {}): TestHarness {
  const kv = new MemoryKeyValueStore();
  const source = new FakeSource();
  const provider = new FakeTextProvider();
  const storage = new MemoryArtifactStorage();
  const queues: InlineTaskQueue[] = [];

  const services = buildServices(createTestConfig(configOverrides), {
    kv,
    source,
    textProvider: provider,
    artifactStorage: storage,
    createQueue: (runner) => {
      const queue = new InlineTaskQueue(runner);
      queues.push(queue);
      return queue;
    },
  });
  const [queue] = queues;
  if (!queue) throw new Error('queue was not created');

  return { services, kv, source, provider, storage, queue };
}

let server: Server | null = null;

export async function startTestServer(services: Services): Promise<{ baseUrl: string }> {
  const app = createApp(services);
  const started = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, () => resolve(listening));
  });
  server = started;
  const address = started.address();
  if (!address || typeof address === 'string') throw new Error('server has no port');
  return { baseUrl: `http://127.0.0.1:${address.port}` };
}

export async function stopTestServer(): Promise<void> {
  const running = server;
  server = null;
  if (!running) return;
  running.closeAllConnections();
  await new Promise<void>((resolve, reject) => {
    running.close((error) => (error ? reject(error) : resolve()));
  });
}

const errorBodySchema = z.object({
  error: z.object({
    message: z.string(),
    status: z.number(),
    code: z.string().optional(),
  }),
});

export const submittedSchema = z.object({
  taskId: z.string(),
  sessionId: z.string().optional(),
});

export const taskResponseSchema = z.object({ task: taskHandleSchema });

export const clusterResponseSchema = z.object({ cluster: workUnitSchema });

export async function readJson<T extends z.ZodTypeAny>(response: Response, schema: T): Promise<z.infer<T>> {
  return schema.parse(await response.json());
}

export async function readError(response: Response) {
  return (await readJson(response, errorBodySchema)).error;
}
