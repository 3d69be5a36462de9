import { getTextModelConfig } from '../../config/text-models';
import { ArtifactService } from '../../services/artifacts';
import { type WorkUnit, workUnitSchema } from '../../services/clusters/cluster.types';
import { ClusterStore } from '../../services/clusters/clusterStore';
import { ClusterPipeline } from '../../services/pipeline/pipeline';
import { DocumentPipeline } from '../../services/pipeline/singleDocument';
import { StageExecutor } from '../../services/stages/stageExecutor';
import { FakeSource, FakeTextProvider, MemoryArtifactStorage, MemoryKeyValueStore } from '../helpers/mocks';

export function createPipelineFixture() {
  const kv = new MemoryKeyValueStore();
  const source = new FakeSource();
  const provider = new FakeTextProvider();
  const storage = new MemoryArtifactStorage();
  const store = new ClusterStore(kv, 604800);
  const artifacts = new ArtifactService(storage);
  const stages = new StageExecutor({
    provider,
    model: 'gemini-2.5-flash',
    modelConfig: getTextModelConfig('gemini-2.5-flash', 'gemini'),
    maxCostUsd: 0.1,
    timeoutMs: 1000,
  });

  return {
    kv,
    source,
    provider,
    storage,
    store,
    clusterPipeline: new ClusterPipeline({ store, source, stages, artifacts }),
    documentPipeline: new DocumentPipeline({ source, stages, artifacts }),
    /** Statuses of every persisted version of a unit, oldest first */
    statusHistory(sessionId: string): string[] {
      return kv.writesFor(`cluster:${sessionId}`).map((raw) => storedUnit(raw).status);
    },
    updatedAtHistory(sessionId: string): string[] {
      return kv.writesFor(`cluster:${sessionId}`).map((raw) => storedUnit(raw).updatedAt);
    },
  };
}

function storedUnit(raw: string): WorkUnit {
  return workUnitSchema.parse(JSON.parse(raw));
}
