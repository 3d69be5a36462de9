import { SESSION_LOCK_PREFIX, SESSION_LOCK_TTL_SECONDS } from '../../config/constants';
import { logger } from '../../utils/logger';
import type { KeyValueStore } from '../redis';

/**
 * Advisory per-session lock: SET lock:cluster:<id> <taskId> NX EX <ttl>.
 * The TTL bounds how long a crashed worker can hold a session.
 */
export class SessionLock {
  constructor(
    private readonly kv: KeyValueStore,
    private readonly ttlSeconds = SESSION_LOCK_TTL_SECONDS,
  ) {}

  private key(sessionId: string): string {
    return `${SESSION_LOCK_PREFIX}${sessionId}`;
  }

  async acquire(sessionId: string, taskId: string): Promise<boolean> {
    return this.kv.setIfAbsent(this.key(sessionId), taskId, this.ttlSeconds);
  }

  async holder(sessionId: string): Promise<string | null> {
    return this.kv.get(this.key(sessionId));
  }

  /** Releases only if `taskId` still owns the lock. */
  async release(sessionId: string, taskId: string): Promise<void> {
    const owner = await this.holder(sessionId);
    if (owner !== taskId) {
      logger.debug({ sessionId, taskId, owner }, 'Lock not held by task, leaving it');
      return;
    }
    await this.kv.del(this.key(sessionId));
  }
}
