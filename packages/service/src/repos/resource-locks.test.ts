import { describe, it, expect, beforeAll, afterAll, beforeEach } from "vitest";
import { PGlite } from "@electric-sql/pglite";
import { drizzle } from "drizzle-orm/pglite";
import { AlreadyLockedError, LockManager, asAgentId, silentLogger } from "@cadbranch/core";
import type { ResourceLock } from "@cadbranch/core";
import { pushSchema } from "drizzle-kit/api";
import * as schema from "../db/schema/index.js";
import { PgLockStore } from "./resource-locks.js";

const sketch = { resourceType: "sketch", resourceName: "s1" };

function lease(holder: string, acquiredAt: number, ttlMs: number, resourceName = "s1"): ResourceLock {
  return {
    resourceType: "sketch",
    resourceName,
    holder: asAgentId(holder),
    executionId: "exec-1",
    acquiredAt,
    expiresAt: acquiredAt + ttlMs,
  };
}

describe("PgLockStore", () => {
  let client: PGlite;
  let store: PgLockStore;

  beforeAll(async () => {
    client = new PGlite();
    const db = drizzle(client);
    const { apply } = await pushSchema(schema, db);
    await apply();
    store = new PgLockStore(db);
  });

  afterAll(async () => {
    await client.close();
  });

  beforeEach(async () => {
    await client.exec("DELETE FROM resource_locks");
  });

  it("grants a free resource", async () => {
    expect(await store.tryAcquire(lease("agent-a", 1000, 30_000), 1000)).toEqual(lease("agent-a", 1000, 30_000));
    expect(await store.holderOf(sketch, 1000)).toEqual(lease("agent-a", 1000, 30_000));
  });

  it("refuses another holder while the lease is live", async () => {
    await store.tryAcquire(lease("agent-a", 1000, 30_000), 1000);

    expect(await store.tryAcquire(lease("agent-b", 2000, 30_000), 2000)).toBeUndefined();
    expect((await store.holderOf(sketch, 2000))?.holder).toBe("agent-a");
  });

  it("lets the holder extend its lease", async () => {
    await store.tryAcquire(lease("agent-a", 1000, 30_000), 1000);
    const renewed = await store.tryAcquire(lease("agent-a", 5000, 30_000), 5000);
    expect(renewed?.expiresAt).toBe(35_000);
  });

  it("takes over a lease that expired", async () => {
    await store.tryAcquire(lease("agent-a", 1000, 30_000), 1000);

    const taken = await store.tryAcquire(lease("agent-b", 31_000, 10_000), 31_000);

    expect(taken?.holder).toBe("agent-b");
    expect(await store.list(31_000)).toEqual([lease("agent-b", 31_000, 10_000)]);
  });

  it("releases only for the holder", async () => {
    await store.tryAcquire(lease("agent-a", 1000, 30_000), 1000);

    expect(await store.release(sketch, asAgentId("agent-b"))).toBe(false);
    expect(await store.release(sketch, asAgentId("agent-a"))).toBe(true);
    expect(await store.release(sketch, asAgentId("agent-a"))).toBe(false);
    expect(await store.holderOf(sketch, 1000)).toBeUndefined();
  });

  it("sweeps expired leases and lists live ones in order", async () => {
    await store.tryAcquire(lease("agent-a", 1000, 30_000, "s1"), 1000);
    await store.tryAcquire(lease("agent-b", 1000, 60_000, "s3"), 1000);
    await store.tryAcquire(lease("agent-c", 1000, 60_000, "s2"), 1000);

    expect(await store.sweepExpired(31_000)).toBe(1);
    expect((await store.list(31_000)).map((l) => l.resourceName)).toEqual(["s2", "s3"]);
  });

  it("backs the lease manager", async () => {
    let time = 1000;
    const locks = new LockManager(store, { now: () => time, logger: silentLogger, executionId: "exec-1" });
    const budget = { resourceType: "global_constraints", resourceName: "budget" };

    await locks.acquire(budget, asAgentId("agent-a"), 30_000);
    await expect(locks.acquire(budget, asAgentId("agent-b"), 30_000)).rejects.toBeInstanceOf(AlreadyLockedError);

    time += 31_000;
    const lock = await locks.acquire(budget, asAgentId("agent-b"), 30_000);

    expect(lock).toEqual({
      resourceType: "global_constraints",
      resourceName: "budget",
      holder: "agent-b",
      executionId: "exec-1",
      acquiredAt: 32_000,
      expiresAt: 62_000,
    });
  });
});
