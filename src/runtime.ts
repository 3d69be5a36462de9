import type { Env } from './config/env';
import { type PipelineConfig, pipelineConfigFromEnv } from './config/pipeline';
import { createRedisConsumerClients } from './lib/pubsub-consumer';
import { ArtifactService } from './services/artifacts';
import { ClusterStore } from './services/clusters/clusterStore';
import { HealthService } from './services/health';
import { ClusterPipeline } from './services/pipeline/pipeline';
import { DocumentPipeline } from './services/pipeline/singleDocument';
import { mirrorProgressToStore, ProgressChannel } from './services/progress';
import { type KeyValueStore, RedisService } from './services/redis';
import { ProducerStreams } from './services/redis-streams';
import type { DocumentSource } from './services/sources/source.interface';
import { YouTubeTranscriptSource } from './services/sources/youtube';
import { SSEService } from './services/sse';
import { StageExecutor } from './services/stages/stageExecutor';
import { DiskArtifactStorage } from './services/storage/disk';
import type { ArtifactStorage } from './services/storage/interface';
import { TaskDispatcher } from './services/tasks/dispatcher';
import { SessionLock } from './services/tasks/sessionLock';
import { PipelineTaskConsumer } from './services/tasks/taskConsumer';
import { RedisStreamTaskQueue, type TaskQueue } from './services/tasks/taskQueue';
import { TaskRunner } from './services/tasks/taskRunner';
import { TaskStore } from './services/tasks/taskStore';
import { createTextProvider } from './services/text-generation/factory';
import type { TextGenerationProvider } from './services/text-generation/provider.interface';

/** The outside world: everything that talks to Redis, the network or disk. */
export interface ServiceAdapters {
  kv: KeyValueStore;
  source: DocumentSource;
  textProvider: TextGenerationProvider;
  artifactStorage: ArtifactStorage;
  createQueue: (runner: TaskRunner) => TaskQueue;
}

export interface Services {
  config: PipelineConfig;
  clusters: ClusterStore;
  tasks: TaskStore;
  channel: ProgressChannel;
  sse: SSEService;
  artifacts: ArtifactService;
  health: HealthService;
  runner: TaskRunner;
  dispatcher: TaskDispatcher;
}

export function buildServices(config: PipelineConfig, adapters: ServiceAdapters): Services {
  const clusters = new ClusterStore(adapters.kv, config.retentionSeconds);
  const tasks = new TaskStore(adapters.kv, config.retentionSeconds);
  const locks = new SessionLock(adapters.kv);
  const artifacts = new ArtifactService(adapters.artifactStorage);
  const stages = new StageExecutor({
    provider: adapters.textProvider,
    model: config.model,
    modelConfig: config.modelConfig,
    maxCostUsd: config.maxCostUsd,
    timeoutMs: config.stageTimeoutMs,
  });

  const channel = new ProgressChannel();
  mirrorProgressToStore(channel, tasks);
  const sse = new SSEService();
  sse.attach(channel);

  const runner = new TaskRunner({
    tasks,
    locks,
    channel,
    clusterPipeline: new ClusterPipeline({ store: clusters, source: adapters.source, stages, artifacts }),
    documentPipeline: new DocumentPipeline({ source: adapters.source, stages, artifacts }),
  });

  const dispatcher = new TaskDispatcher({
    tasks,
    clusters,
    locks,
    queue: adapters.createQueue(runner),
    source: adapters.source,
  });

  const health = new HealthService(adapters.kv, artifacts);

  return { config, clusters, tasks, channel, sse, artifacts, health, runner, dispatcher };
}

export interface Runtime {
  services: Services;
  redis: RedisService;
  consumer: PipelineTaskConsumer;
  shutdown(): Promise<void>;
}

export function createRuntime(env: Env): Runtime {
  const config = pipelineConfigFromEnv(env);
  const redis = new RedisService(env.REDIS_URL);

  const services = buildServices(config, {
    kv: redis,
    source: new YouTubeTranscriptSource({
      language: config.transcriptLanguage,
      timeoutMs: config.stageTimeoutMs,
    }),
    textProvider: createTextProvider(config.provider, {
      geminiApiKey: env.GEMINI_API_KEY,
      openaiApiKey: env.OPENAI_API_KEY,
    }),
    artifactStorage: new DiskArtifactStorage(config.outputDir),
    createQueue: () => new RedisStreamTaskQueue(new ProducerStreams(redis.getClient())),
  });

  const consumer = new PipelineTaskConsumer(
    createRedisConsumerClients(env.REDIS_URL, 'pipeline-worker'),
    { concurrency: config.workerConcurrency },
    services.runner,
  );

  return {
    services,
    redis,
    consumer,
    async shutdown() {
      await consumer.stop();
      services.sse.detach();
      await redis.disconnect();
    },
  };
}
