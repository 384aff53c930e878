/**
 * In-process LockStore for single-process sessions and tests
 */

import type { AgentId } from '../ids/types.js';
import type { LockStore, ResourceKey, ResourceLock } from './types.js';
import { isExpired } from './types.js';

function keyOf(key: ResourceKey): string {
  return `${key.resourceType}\u0000${key.resourceName}`;
}

export class MemoryLockStore implements LockStore {
  private readonly locks = new Map<string, ResourceLock>();

  async tryAcquire(lock: ResourceLock, now: number): Promise<ResourceLock | undefined> {
    const key = keyOf(lock);
    const existing = this.locks.get(key);
    if (existing && existing.holder !== lock.holder && !isExpired(existing, now)) {
      return undefined;
    }
    const stored = { ...lock };
    this.locks.set(key, stored);
    return { ...stored };
  }

  async holderOf(key: ResourceKey, now: number): Promise<ResourceLock | undefined> {
    const lock = this.locks.get(keyOf(key));
    return lock && !isExpired(lock, now) ? { ...lock } : undefined;
  }

  async release(key: ResourceKey, holder: AgentId): Promise<boolean> {
    const k = keyOf(key);
    const lock = this.locks.get(k);
    if (!lock || lock.holder !== holder) return false;
    this.locks.delete(k);
    return true;
  }

  async sweepExpired(now: number): Promise<number> {
    let swept = 0;
    for (const [key, lock] of this.locks) {
      if (isExpired(lock, now)) {
        this.locks.delete(key);
        swept++;
      }
    }
    return swept;
  }

  async list(now: number): Promise<ResourceLock[]> {
    return [...this.locks.values()]
      .filter((lock) => !isExpired(lock, now))
      .map((lock) => ({ ...lock }));
  }
}
