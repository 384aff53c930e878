/**
 * End-to-end scenarios and properties across the session
 */

import { describe, it, expect, vi } from "vitest";
import { AnalyticGeometryEngine } from "../src/geometry/GeometryEngine.js";
import { AlreadyLockedError, ConstraintConflictError, WorkspaceConflictError } from "../src/errors.js";
import type { EntityId } from "../src/ids/types.js";
import { ROOT_WORKSPACE_ID } from "../src/ids/types.js";
import { agentA, agentB, createTestSession } from "./fixtures/session.js";
import type { TestSession } from "./fixtures/session.js";

/** Deterministic pseudo-random numbers in [0, 1) */
function lcg(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 1664525 + 1013904223) % 2 ** 32;
    return state / 2 ** 32;
  };
}

function snapshot({ session }: TestSession) {
  return {
    entities: session.listEntities(ROOT_WORKSPACE_ID),
    constraints: session.constraintStatus(ROOT_WORKSPACE_ID),
    history: session.history(ROOT_WORKSPACE_ID),
    status: session.workspaceStatus(ROOT_WORKSPACE_ID),
  };
}

describe("scenarios", () => {
  it("satisfies a 3-4-5 distance and leaves 3 DOF", () => {
    const { session, main } = createTestSession();
    const p1 = session.createPoint(main, { x: 0, y: 0 }).entity.id;
    const p2 = session.createPoint(main, { x: 3, y: 4 }).entity.id;

    const result = session.applyConstraint(main, {
      kind: "distance",
      entities: [p1, p2],
      params: { distance: 5.0 },
    });

    expect(result.status).toBe("satisfied");
    expect(result.dofRemoved).toBe(1);
    expect(result.dofRemaining).toBe(3);
    expect(result.componentEntities).toEqual([p1, p2]);
    expect(result.evaluation).toMatchObject({ expected: 5, actual: 5, withinTolerance: true });
  });

  it("rejects parallel after perpendicular on the same lines", () => {
    const { session, main } = createTestSession();
    const l1 = session.createLine(main, { start: { x: 0, y: 0 }, end: { x: 4, y: 0 } }).entity.id;
    const l2 = session.createLine(main, { start: { x: 0, y: 0 }, end: { x: 0, y: 4 } }).entity.id;

    const first = session.applyConstraint(main, { kind: "perpendicular", entities: [l1, l2] });
    expect(first.status).toBe("satisfied");

    expect(() => session.applyConstraint(main, { kind: "parallel", entities: [l1, l2] })).toThrow(
      ConstraintConflictError
    );
    expect(() => session.applyConstraint(main, { kind: "parallel", entities: [l1, l2] })).toThrow(
      "parallel constraint conflicts with c_1: Lines cannot be both parallel and perpendicular"
    );
    expect(session.constraintStatus(ROOT_WORKSPACE_ID).counts.total).toBe(1);
  });

  it("merges a radius edit with an independent center edit", async () => {
    const { session, main, on } = createTestSession();
    const circle = session.createCircle(main, { center: { x: 0, y: 0 }, radius: 5 }).entity.id;
    const w1 = on(session.createWorkspace("W1", ROOT_WORKSPACE_ID, agentA).id);

    session.updateEntity(w1, circle, { kind: "circle", center: { x: 0, y: 0 }, radius: 7 });
    session.updateEntity(main, circle, { kind: "circle", center: { x: 5, y: 0 }, radius: 5 });

    const result = await session.mergeWorkspaces(
      { sourceId: w1.workspaceId, targetId: ROOT_WORKSPACE_ID, strategy: "auto" },
      agentA
    );

    expect(result.entitiesModified).toHaveLength(1);
    expect(result.conflicts).toEqual([]);
    expect(session.getEntity(ROOT_WORKSPACE_ID, circle).geometry).toEqual({
      kind: "circle",
      center: { x: 5, y: 0 },
      radius: 7,
    });
  });

  it("reports a conflict when both sides set the radius", async () => {
    const { session, main, on } = createTestSession();
    const circle = session.createCircle(main, { center: { x: 0, y: 0 }, radius: 5 }).entity.id;
    const w1 = on(session.createWorkspace("W1", ROOT_WORKSPACE_ID, agentA).id);

    session.updateEntity(w1, circle, { kind: "circle", center: { x: 0, y: 0 }, radius: 7 });
    session.updateEntity(main, circle, { kind: "circle", center: { x: 0, y: 0 }, radius: 10 });

    const merge = session.mergeWorkspaces(
      { sourceId: w1.workspaceId, targetId: ROOT_WORKSPACE_ID, strategy: "auto" },
      agentA
    );

    await expect(merge).rejects.toBeInstanceOf(WorkspaceConflictError);
    await expect(merge).rejects.toMatchObject({
      details: {
        conflicts: [
          {
            entityId: circle,
            conflictType: "both_modified",
            resolutionOptions: ["keep_source", "keep_target", "manual_merge"],
          },
        ],
      },
    });
  });

  it("hands a lease to another agent once it expires", async () => {
    const { session, clock } = createTestSession();
    const budget = { resourceType: "global_constraints", resourceName: "budget" };

    await session.acquireLock(budget, agentA, 30_000);
    await expect(session.acquireLock(budget, agentB, 30_000)).rejects.toBeInstanceOf(AlreadyLockedError);

    clock.now += 31_000;
    const lock = await session.acquireLock(budget, agentB, 30_000);

    expect(lock.holder).toBe("agent-b");
    expect(lock.expiresAt).toBe(62_000);
  });
});

describe("properties", () => {
  it("never leaves a component with negative DOF", () => {
    const { session, main } = createTestSession();
    const points: EntityId[] = [];
    for (let i = 0; i < 4; i++) {
      points.push(session.createPoint(main, { x: i, y: i * 2 }).entity.id);
    }
    const lineage = session.workspaces.lineage(ROOT_WORKSPACE_ID);
    const random = lcg(42);

    let accepted = 0;
    for (let step = 0; step < 200; step++) {
      const a = Math.floor(random() * points.length);
      const b = (a + 1 + Math.floor(random() * (points.length - 1))) % points.length;
      const pair = [points[a], points[b]];
      try {
        if (random() < 0.5) {
          session.applyConstraint(main, { kind: "coincident", entities: pair });
        } else {
          const distance = 1 + Math.floor(random() * 5);
          session.applyConstraint(main, { kind: "distance", entities: pair, params: { distance } });
        }
        accepted++;
      } catch (err) {
        if (!(err instanceof ConstraintConflictError)) throw err;
      }

      for (const point of points) {
        expect(session.constraints.componentOf(lineage, [point]).dofRemaining).toBeGreaterThanOrEqual(0);
      }
    }

    expect(accepted).toBeGreaterThan(0);
  });

  it("treats a repeated constraint as redundant", () => {
    const { session, main } = createTestSession();
    const p1 = session.createPoint(main, { x: 0, y: 0 }).entity.id;
    const p2 = session.createPoint(main, { x: 3, y: 4 }).entity.id;
    const request = { kind: "distance" as const, entities: [p1, p2], params: { distance: 5 } };

    const first = session.applyConstraint(main, request);
    const second = session.applyConstraint(main, request);

    expect(second.status).toBe("redundant");
    expect(second.dofRemoved).toBe(0);
    expect(second.dofRemaining).toBe(first.dofRemaining);
    expect(second.evaluation.redundantOf).toBe(first.constraint.id);
    expect(session.constraintStatus(ROOT_WORKSPACE_ID)).toMatchObject({
      counts: { total: 2, satisfied: 1, violated: 0, redundant: 1 },
      dofRemaining: 3,
    });
  });

  it("leaves the target untouched by a failed merge and applies all of a successful one", async () => {
    const t = createTestSession();
    const { session, main, on } = t;
    const circle = session.createCircle(main, { center: { x: 0, y: 0 }, radius: 5 }).entity.id;
    const doomed = session.createPoint(main, { x: 1, y: 1 }).entity.id;
    const w1 = on(session.createWorkspace("W1", ROOT_WORKSPACE_ID, agentA).id);

    session.updateEntity(w1, circle, { kind: "circle", center: { x: 0, y: 0 }, radius: 7 });
    const added = session.createPoint(w1, { x: 2, y: 2 }).entity.id;
    session.deleteEntity(w1, doomed);
    session.updateEntity(main, circle, { kind: "circle", center: { x: 0, y: 0 }, radius: 10 });

    const before = snapshot(t);
    const request = { sourceId: w1.workspaceId, targetId: ROOT_WORKSPACE_ID, strategy: "auto" as const };
    await expect(session.mergeWorkspaces(request, agentA)).rejects.toBeInstanceOf(WorkspaceConflictError);
    expect(snapshot(t)).toEqual(before);

    const result = await session.mergeWorkspaces({ ...request, strategy: "keep_source" }, agentA);

    expect(result.conflicts).toEqual([]);
    expect(result.entitiesAdded).toEqual([added]);
    expect(result.entitiesModified).toEqual([circle]);
    expect(result.entitiesDeleted).toEqual([doomed]);
    expect(session.listEntities(ROOT_WORKSPACE_ID).map((e) => e.id)).toEqual([circle, added]);
    expect(session.measureEntity(ROOT_WORKSPACE_ID, circle).radius).toBe(7);
  });

  it("merges disjoint edits to the same result in either order", async () => {
    async function run(order: "w1-first" | "w2-first") {
      const { session, main, on } = createTestSession();
      const c1 = session.createCircle(main, { center: { x: 0, y: 0 }, radius: 5 }).entity.id;
      const c2 = session.createCircle(main, { center: { x: 10, y: 0 }, radius: 5 }).entity.id;
      const w1 = on(session.createWorkspace("W1", ROOT_WORKSPACE_ID, agentA).id);
      const w2 = on(session.createWorkspace("W2", ROOT_WORKSPACE_ID, agentA).id);

      session.updateEntity(w1, c1, { kind: "circle", center: { x: 0, y: 0 }, radius: 7 });
      session.createPoint(w1, { x: 1, y: 1 });
      session.updateEntity(w2, c2, { kind: "circle", center: { x: 12, y: 0 }, radius: 5 });

      const sources = order === "w1-first" ? [w1, w2] : [w2, w1];
      for (const source of sources) {
        const result = await session.mergeWorkspaces(
          { sourceId: source.workspaceId, targetId: ROOT_WORKSPACE_ID, strategy: "auto" },
          agentA
        );
        expect(result.conflicts).toEqual([]);
      }
      return session
        .listEntities(ROOT_WORKSPACE_ID)
        .map(({ id, geometry, version }) => ({ id, geometry, version }));
    }

    const forward = await run("w1-first");
    const backward = await run("w2-first");

    expect(forward).toHaveLength(3);
    expect(backward).toEqual(forward);
  });

  it("re-evaluates only the component of an updated entity", () => {
    const engine = new AnalyticGeometryEngine();
    const { session, main } = createTestSession({ engine });
    const p = [0, 1, 2, 3].map((i) => session.createPoint(main, { x: i * 10, y: 0 }).entity.id);
    const near = session.applyConstraint(main, {
      kind: "distance",
      entities: [p[0], p[1]],
      params: { distance: 10 },
    });
    session.applyConstraint(main, { kind: "distance", entities: [p[2], p[3]], params: { distance: 10 } });

    const distance = vi.spyOn(engine, "distance");
    const { reevaluated } = session.updateEntity(main, p[0], { kind: "point", x: 5, y: 0 });

    expect(reevaluated.map((e) => e.constraintId)).toEqual([near.constraint.id]);
    expect(reevaluated[0].status).toBe("violated");
    expect(distance).toHaveBeenCalledTimes(1);
  });
});
