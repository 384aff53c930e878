/**
 * Lease lock types
 */

import type { AgentId } from '../ids/types.js';

/**
 * A lockable resource, unique by type and name
 */
export interface ResourceKey {
  resourceType: string;
  resourceName: string;
}

/**
 * A time-bounded exclusive claim on a resource. Expired leases are treated
 * as absent.
 */
export interface ResourceLock extends ResourceKey {
  holder: AgentId;
  /** Session or execution the holder acquired it from */
  executionId: string;
  /** Epoch milliseconds */
  acquiredAt: number;
  expiresAt: number;
}

/**
 * Datastore boundary for leases. Every call may suspend; nothing else in the
 * core does.
 */
export interface LockStore {
  /**
   * Store `lock` if the resource is free, expired at `now`, or already held
   * by the same holder. Atomic. Returns the stored lock, or undefined when
   * another holder has an unexpired lease.
   */
  tryAcquire(lock: ResourceLock, now: number): Promise<ResourceLock | undefined>;
  /** Current unexpired lease on a resource */
  holderOf(key: ResourceKey, now: number): Promise<ResourceLock | undefined>;
  /** Remove the lease if `holder` has it. Returns whether a row was removed. */
  release(key: ResourceKey, holder: AgentId): Promise<boolean>;
  /** Delete expired leases; returns how many */
  sweepExpired(now: number): Promise<number>;
  /** Unexpired leases */
  list(now: number): Promise<ResourceLock[]>;
}

export function isExpired(lock: ResourceLock, now: number): boolean {
  return lock.expiresAt <= now;
}
