import { CLUSTER_KEY_PREFIX } from '../../config/constants';
import { logger } from '../../utils/logger';
import { StorageUnavailableError } from '../pipeline/errors';
import type { KeyValueStore } from '../redis';
import { type WorkUnit, workUnitSchema } from './cluster.types';

/**
 * Durable WorkUnit persistence keyed by session id.
 * Each put is one SET with EX, so the expiry slides forward on every write.
 */
export class ClusterStore {
  constructor(
    private readonly kv: KeyValueStore,
    private readonly retentionSeconds: number,
  ) {}

  private key(sessionId: string): string {
    return `${CLUSTER_KEY_PREFIX}${sessionId}`;
  }

  async put(sessionId: string, unit: WorkUnit): Promise<void> {
    try {
      await this.kv.set(this.key(sessionId), JSON.stringify(unit), this.retentionSeconds);
    } catch (error) {
      logger.error({ error, sessionId, status: unit.status }, 'Failed to persist cluster');
      throw new StorageUnavailableError(`put ${sessionId}`, { cause: error });
    }
  }

  async get(sessionId: string): Promise<WorkUnit | null> {
    let raw: string | null;
    try {
      raw = await this.kv.get(this.key(sessionId));
    } catch (error) {
      throw new StorageUnavailableError(`get ${sessionId}`, { cause: error });
    }
    if (raw === null) return null;
    return this.decode(sessionId, raw);
  }

  /**
   * All stored clusters, newest first. Keys that expire between the scan and
   * the read are skipped.
   */
  async listAll(): Promise<WorkUnit[]> {
    let keys: string[];
    try {
      keys = await this.kv.scanKeys(`${CLUSTER_KEY_PREFIX}*`);
    } catch (error) {
      throw new StorageUnavailableError('listAll', { cause: error });
    }

    const units: WorkUnit[] = [];
    for (const key of keys) {
      const unit = await this.get(key.slice(CLUSTER_KEY_PREFIX.length));
      if (unit) units.push(unit);
    }
    return units.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  private decode(sessionId: string, raw: string): WorkUnit | null {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      logger.warn({ error, sessionId }, 'Stored cluster is not valid JSON, ignoring');
      return null;
    }
    const parsed = workUnitSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn({ sessionId, issues: parsed.error.issues }, 'Stored cluster failed validation, ignoring');
      return null;
    }
    return parsed.data;
  }
}
