/**
 * Resource Lock Repository
 *
 * PostgreSQL-backed LockStore. Keep this file focused on data access - the
 * lease policy lives in the core's LockManager.
 */

import { and, asc, eq, gt, lte, or } from "drizzle-orm";
import { asAgentId } from "@cadbranch/core";
import type { AgentId, LockStore, ResourceKey, ResourceLock } from "@cadbranch/core";
import { resourceLocks } from "../db/schema/index.js";
import type { ResourceLockRow } from "../db/schema/index.js";
import type { Database } from "../lib/db.js";

function toLock(row: ResourceLockRow): ResourceLock {
  return {
    resourceType: row.resourceType,
    resourceName: row.resourceName,
    holder: asAgentId(row.holder),
    executionId: row.executionId,
    acquiredAt: row.acquiredAt,
    expiresAt: row.expiresAt,
  };
}

function matchesKey(key: ResourceKey) {
  return and(
    eq(resourceLocks.resourceType, key.resourceType),
    eq(resourceLocks.resourceName, key.resourceName)
  );
}

export class PgLockStore implements LockStore {
  constructor(private readonly db: Database) {}

  /**
   * Insert the lease, or take over the existing row when it belongs to the
   * same holder or has expired. A single statement, so two agents racing for
   * the same resource cannot both win.
   */
  async tryAcquire(lock: ResourceLock, now: number): Promise<ResourceLock | undefined> {
    const rows = await this.db
      .insert(resourceLocks)
      .values({
        resourceType: lock.resourceType,
        resourceName: lock.resourceName,
        holder: lock.holder,
        executionId: lock.executionId,
        acquiredAt: lock.acquiredAt,
        expiresAt: lock.expiresAt,
      })
      .onConflictDoUpdate({
        target: [resourceLocks.resourceType, resourceLocks.resourceName],
        set: {
          holder: lock.holder,
          executionId: lock.executionId,
          acquiredAt: lock.acquiredAt,
          expiresAt: lock.expiresAt,
        },
        setWhere: or(eq(resourceLocks.holder, lock.holder), lte(resourceLocks.expiresAt, now)),
      })
      .returning();

    return rows.length > 0 ? toLock(rows[0]) : undefined;
  }

  async holderOf(key: ResourceKey, now: number): Promise<ResourceLock | undefined> {
    const rows = await this.db
      .select()
      .from(resourceLocks)
      .where(and(matchesKey(key), gt(resourceLocks.expiresAt, now)))
      .limit(1);
    return rows.length > 0 ? toLock(rows[0]) : undefined;
  }

  async release(key: ResourceKey, holder: AgentId): Promise<boolean> {
    const rows = await this.db
      .delete(resourceLocks)
      .where(and(matchesKey(key), eq(resourceLocks.holder, holder)))
      .returning({ resourceName: resourceLocks.resourceName });
    return rows.length > 0;
  }

  async sweepExpired(now: number): Promise<number> {
    const rows = await this.db
      .delete(resourceLocks)
      .where(lte(resourceLocks.expiresAt, now))
      .returning({ resourceName: resourceLocks.resourceName });
    return rows.length;
  }

  async list(now: number): Promise<ResourceLock[]> {
    const rows = await this.db
      .select()
      .from(resourceLocks)
      .where(gt(resourceLocks.expiresAt, now))
      .orderBy(asc(resourceLocks.resourceType), asc(resourceLocks.resourceName));
    return rows.map(toLock);
  }
}
