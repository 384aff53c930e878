/**
 * Session options
 */

import type { NumericContext } from '../num/tolerance.js';
import { createNumericContext } from '../num/tolerance.js';
import { IdAllocator } from '../ids/idAllocator.js';
import type { Logger } from '../logging.js';
import type { GeometryEngine } from '../geometry/GeometryEngine.js';
import { AnalyticGeometryEngine } from '../geometry/GeometryEngine.js';
import type { LockStore } from '../coordination/types.js';
import { MemoryLockStore } from '../coordination/MemoryLockStore.js';

export interface SessionOptions {
  /** Tolerances and coordinate bound */
  ctx: NumericContext;
  /** Clock in epoch milliseconds */
  now: () => number;
  allocator: IdAllocator;
  logger: Logger;
  engine: GeometryEngine;
  /** Log debug output from every subsystem */
  verbose: boolean;
  /** Lease held on the target workspace while a merge runs */
  mergeLockTtlMs: number;
  lockStore: LockStore;
  /** Recorded on every lease; random when omitted */
  executionId?: string;
}

export const DEFAULT_MERGE_LOCK_TTL_MS = 30_000;

/**
 * Fill in defaults for any option not given
 */
export function createSessionOptions(options: Partial<SessionOptions> = {}): SessionOptions {
  return {
    ctx: options.ctx ?? createNumericContext(),
    now: options.now ?? Date.now,
    allocator: options.allocator ?? new IdAllocator(),
    logger: options.logger ?? console,
    engine: options.engine ?? new AnalyticGeometryEngine(),
    verbose: options.verbose ?? false,
    mergeLockTtlMs: options.mergeLockTtlMs ?? DEFAULT_MERGE_LOCK_TTL_MS,
    lockStore: options.lockStore ?? new MemoryLockStore(),
    ...(options.executionId !== undefined ? { executionId: options.executionId } : {}),
  };
}
