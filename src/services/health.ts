import { logger } from '../utils/logger';
import type { ArtifactService } from './artifacts';
import type { KeyValueStore } from './redis';

type DependencyState = 'ok' | 'unavailable';

export interface HealthReport {
  status: 'ok' | 'degraded';
  redis: DependencyState;
  storage: DependencyState;
}

export class HealthService {
  constructor(
    private readonly kv: KeyValueStore,
    private readonly artifacts: ArtifactService,
  ) {}

  async check(): Promise<HealthReport> {
    const [redisUp, storageUp] = await Promise.all([this.kv.ping(), this.artifacts.isHealthy()]);
    const report: HealthReport = {
      status: redisUp && storageUp ? 'ok' : 'degraded',
      redis: redisUp ? 'ok' : 'unavailable',
      storage: storageUp ? 'ok' : 'unavailable',
    };
    if (report.status === 'degraded') {
      logger.warn({ ...report }, 'Health check degraded');
    }
    return report;
  }
}
