/**
 * LockManager - lease-based locks over a LockStore
 *
 * Expired leases are swept on access before every acquire, so a crashed
 * holder never blocks a resource past its expiry. There is no background
 * timer.
 */

import { v4 as uuid } from 'uuid';
import type { AgentId } from '../ids/types.js';
import type { Logger } from '../logging.js';
import { AlreadyLockedError, InvalidParameterError } from '../errors.js';
import type { LockStore, ResourceKey, ResourceLock } from './types.js';

export interface LockManagerOptions {
  now: () => number;
  logger: Logger;
  verbose?: boolean;
  /** Recorded on every lease this manager grants */
  executionId?: string;
}

export class LockManager {
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly verbose: boolean;
  readonly executionId: string;

  constructor(
    private readonly store: LockStore,
    options: LockManagerOptions
  ) {
    this.now = options.now;
    this.logger = options.logger;
    this.verbose = options.verbose ?? false;
    this.executionId = options.executionId ?? uuid();
  }

  /**
   * Acquire or extend a lease
   *
   * @throws AlreadyLockedError if another holder has an unexpired lease
   */
  async acquire(resource: ResourceKey, holder: AgentId, ttlMs: number): Promise<ResourceLock> {
    if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
      throw new InvalidParameterError('Lock ttl must be a positive number of milliseconds', {
        field: 'ttl',
        providedValue: ttlMs,
      });
    }
    if (resource.resourceType === '' || resource.resourceName === '') {
      throw new InvalidParameterError('Lock resource type and name must not be empty', {
        field: 'resource',
        providedValue: resource,
      });
    }

    const now = this.now();
    const swept = await this.store.sweepExpired(now);
    if (this.verbose && swept > 0) {
      this.logger.debug(`[locks] swept ${swept} expired lease(s)`);
    }

    const granted = await this.store.tryAcquire(
      {
        resourceType: resource.resourceType,
        resourceName: resource.resourceName,
        holder,
        executionId: this.executionId,
        acquiredAt: now,
        expiresAt: now + ttlMs,
      },
      now
    );
    if (granted) {
      if (this.verbose) {
        this.logger.debug(
          `[locks] ${holder} holds ${resource.resourceType}/${resource.resourceName} until ${granted.expiresAt}`
        );
      }
      return granted;
    }

    const current = await this.store.holderOf(resource, now);
    this.logger.warn(
      `[locks] ${holder} denied ${resource.resourceType}/${resource.resourceName}: held by ${current?.holder ?? 'unknown'}`
    );
    throw new AlreadyLockedError(
      `Resource '${resource.resourceType}/${resource.resourceName}' is locked by '${current?.holder ?? 'unknown'}'`,
      {
        resourceType: resource.resourceType,
        resourceName: resource.resourceName,
        holder: current?.holder ?? null,
        expiresAt: current?.expiresAt ?? null,
        retryAfterMs: current ? Math.max(0, current.expiresAt - now) : 0,
      }
    );
  }

  /**
   * Release a lease. A no-op when the lease is gone or held by someone else.
   */
  async release(resource: ResourceKey, holder: AgentId): Promise<boolean> {
    const released = await this.store.release(resource, holder);
    if (this.verbose && released) {
      this.logger.debug(`[locks] ${holder} released ${resource.resourceType}/${resource.resourceName}`);
    }
    return released;
  }

  /**
   * Run `fn` while holding a lease, releasing it afterwards. A lease the
   * holder already had is put back as it was instead of released.
   */
  async withLock<T>(
    resource: ResourceKey,
    holder: AgentId,
    ttlMs: number,
    fn: () => T | Promise<T>
  ): Promise<T> {
    const current = await this.store.holderOf(resource, this.now());
    const previous = current?.holder === holder ? current : undefined;
    await this.acquire(resource, holder, ttlMs);
    try {
      return await fn();
    } finally {
      if (previous) {
        await this.restore(previous);
      } else {
        await this.release(resource, holder);
      }
    }
  }

  private async restore(lease: ResourceLock): Promise<void> {
    const now = this.now();
    if (lease.expiresAt <= now) {
      await this.release(lease, lease.holder);
      return;
    }
    await this.store.tryAcquire(lease, now);
    if (this.verbose) {
      this.logger.debug(
        `[locks] ${lease.holder} keeps ${lease.resourceType}/${lease.resourceName} until ${lease.expiresAt}`
      );
    }
  }

  /**
   * Unexpired leases
   */
  list(): Promise<ResourceLock[]> {
    return this.store.list(this.now());
  }

  /**
   * Current holder of a resource, if any
   */
  holderOf(resource: ResourceKey): Promise<ResourceLock | undefined> {
    return this.store.holderOf(resource, this.now());
  }
}
