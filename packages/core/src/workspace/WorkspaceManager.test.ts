/**
 * Tests for workspaces and three-way merge
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { CadSession } from '../api/CadSession.js';
import type { CallContext } from '../api/CadSession.js';
import type { EntityId, WorkspaceId } from '../ids/types.js';
import { ROOT_WORKSPACE_ID, asAgentId, asWorkspaceId } from '../ids/types.js';
import { silentLogger } from '../logging.js';
import {
  AlreadyLockedError,
  BaseNotFoundError,
  ConstraintConflictError,
  InvalidParameterError,
  WorkspaceConflictError,
  WorkspaceNotFoundError,
} from '../errors.js';
import type { MergeRequest } from './types.js';

const agent = asAgentId('agent-1');

describe('WorkspaceManager', () => {
  let time: number;
  let session: CadSession;

  const on = (workspaceId: WorkspaceId): CallContext => ({ workspaceId, agentId: agent });
  const main = on(ROOT_WORKSPACE_ID);

  function branch(name = 'feature', base: WorkspaceId = ROOT_WORKSPACE_ID): CallContext {
    return on(session.createWorkspace(name, base, agent).id);
  }

  function mergeRequest(source: CallContext, extra: Partial<MergeRequest> = {}): MergeRequest {
    return { sourceId: source.workspaceId, targetId: ROOT_WORKSPACE_ID, strategy: 'auto', ...extra };
  }

  function circle(call: CallContext, radius: number): EntityId {
    return session.createCircle(call, { center: { x: 0, y: 0 }, radius }).entity.id;
  }

  function setRadius(call: CallContext, id: EntityId, radius: number, x = 0): void {
    session.updateEntity(call, id, { kind: 'circle', center: { x, y: 0 }, radius });
  }

  function radiusOf(workspaceId: WorkspaceId, id: EntityId): number | undefined {
    return session.measureEntity(workspaceId, id).radius;
  }

  beforeEach(() => {
    time = 1000;
    session = new CadSession({ now: () => time, logger: silentLogger });
  });

  describe('create', () => {
    it('should branch at the base head', () => {
      session.createPoint(main, { x: 0, y: 0 });
      const ws = session.createWorkspace('feature', ROOT_WORKSPACE_ID, agent);

      expect(ws.id).toBe('ws_1');
      expect(ws.baseId).toBe('main');
      expect(ws.divergencePoint).toBe('op_1');
      expect(ws.divergenceSeq).toBe(1);
    });

    it('should branch an empty base at its start', () => {
      const ws = session.createWorkspace('feature', ROOT_WORKSPACE_ID, agent);
      expect(ws.divergencePoint).toBeNull();
      expect(ws.divergenceSeq).toBe(0);
    });

    it('should isolate branch and base edits', () => {
      session.createPoint(main, { x: 0, y: 0 });
      const ws = branch();
      session.createPoint(ws, { x: 1, y: 1 });
      session.createPoint(main, { x: 2, y: 2 });

      expect(session.listEntities(ws.workspaceId).map((e) => e.id)).toEqual([
        'main:point_1',
        'ws_1:point_2',
      ]);
      expect(session.listEntities(ROOT_WORKSPACE_ID).map((e) => e.id)).toEqual([
        'main:point_1',
        'main:point_3',
      ]);
    });

    it('should reject a missing base', () => {
      expect(() => session.createWorkspace('feature', asWorkspaceId('ws_9'), agent)).toThrow(
        BaseNotFoundError
      );
    });

    it('should reject an empty name', () => {
      expect(() => session.createWorkspace('  ', ROOT_WORKSPACE_ID, agent)).toThrow(
        InvalidParameterError
      );
    });
  });

  describe('status', () => {
    it('should report a clean root', () => {
      expect(session.workspaceStatus(ROOT_WORKSPACE_ID)).toEqual({
        workspaceId: 'main',
        name: 'main',
        baseId: null,
        branchStatus: 'clean',
        canMerge: false,
        divergencePoint: null,
        head: null,
        entityCount: 0,
        constraintCount: 0,
        operationCount: 0,
      });
    });

    it('should report a modified branch', () => {
      const ws = branch();
      session.createPoint(ws, { x: 0, y: 0 });

      expect(session.workspaceStatus(ws.workspaceId)).toMatchObject({
        branchStatus: 'modified',
        canMerge: true,
        head: 'op_1',
        entityCount: 1,
        operationCount: 1,
      });
    });
  });

  describe('delete', () => {
    it('should refuse to delete the root', () => {
      expect(() => session.deleteWorkspace(ROOT_WORKSPACE_ID)).toThrow(InvalidParameterError);
    });

    it('should refuse to delete a workspace with live branches', () => {
      const parent = branch('parent');
      const child = branch('child', parent.workspaceId);

      expect(() => session.deleteWorkspace(parent.workspaceId)).toThrow(
        "Workspace 'ws_1' has live branches"
      );

      session.deleteWorkspace(child.workspaceId);
      expect(session.deleteWorkspace(parent.workspaceId).deleted).toBe(true);
      expect(() => session.listEntities(parent.workspaceId)).toThrow(WorkspaceNotFoundError);
      expect(() => session.createWorkspace('again', parent.workspaceId, agent)).toThrow(
        BaseNotFoundError
      );
      expect(session.listWorkspaces().map((w) => w.id)).toEqual(['main']);
    });
  });

  describe('merge', () => {
    it('should carry added entities into the target', async () => {
      session.createPoint(main, { x: 0, y: 0 });
      const ws = branch();
      const added = session.createPoint(ws, { x: 1, y: 1 }).entity;

      const result = await session.mergeWorkspaces(mergeRequest(ws), agent);

      expect(result.operationId).toBe('op_3');
      expect(result.entitiesAdded).toEqual([added.id]);
      expect(result.entitiesModified).toEqual([]);
      expect(result.conflicts).toEqual([]);
      expect(session.getEntity(ROOT_WORKSPACE_ID, added.id).geometry).toEqual(added.geometry);

      const [latest] = session.history(ROOT_WORKSPACE_ID).entries;
      expect(latest.type).toBe('workspace.merge');
      expect(latest.mergedFrom).toBe('ws_1');
    });

    it('should mark the source merged', async () => {
      const ws = branch();
      session.createPoint(ws, { x: 1, y: 1 });
      await session.mergeWorkspaces(mergeRequest(ws), agent);

      const status = session.workspaceStatus(ws.workspaceId);
      expect(status.branchStatus).toBe('merged');
      expect(status.canMerge).toBe(false);
      expect(session.workspaces.get(ws.workspaceId)?.mergedInto).toBe('main');
      await expect(session.mergeWorkspaces(mergeRequest(ws), agent)).rejects.toThrow(
        "Workspace 'ws_1' cannot be merged (already merged)"
      );
    });

    it('should carry deletions into the target', async () => {
      const p = session.createPoint(main, { x: 0, y: 0 }).entity;
      const ws = branch();
      session.deleteEntity(ws, p.id);

      const result = await session.mergeWorkspaces(mergeRequest(ws), agent);

      expect(result.entitiesDeleted).toEqual([p.id]);
      expect(session.listEntities(ROOT_WORKSPACE_ID)).toEqual([]);
    });

    it('should combine edits to different fields of one entity', async () => {
      const id = circle(main, 5);
      const ws = branch();
      setRadius(ws, id, 7);
      setRadius(main, id, 5, 5);

      const result = await session.mergeWorkspaces(mergeRequest(ws), agent);

      expect(result.entitiesModified).toEqual([id]);
      const merged = session.getEntity(ROOT_WORKSPACE_ID, id);
      expect(merged.geometry).toEqual({ kind: 'circle', center: { x: 5, y: 0 }, radius: 7 });
      expect(merged.version).toBe(3);
    });

    it('should treat identical edits on both sides as no change', async () => {
      const id = circle(main, 5);
      const ws = branch();
      setRadius(ws, id, 7);
      setRadius(main, id, 7);

      const result = await session.mergeWorkspaces(mergeRequest(ws), agent);

      expect(result.entitiesModified).toEqual([]);
      expect(result.conflicts).toEqual([]);
    });

    describe('conflicts', () => {
      let id: EntityId;
      let ws: CallContext;

      beforeEach(() => {
        id = circle(main, 5);
        ws = branch();
        setRadius(ws, id, 7);
        setRadius(main, id, 9);
      });

      it('should abort an auto merge with the conflict list', async () => {
        await expect(session.mergeWorkspaces(mergeRequest(ws), agent)).rejects.toMatchObject({
          kind: 'WorkspaceConflict',
          retryable: true,
          details: {
            sourceId: 'ws_1',
            targetId: 'main',
            unresolved: [id],
            conflicts: [
              {
                entityId: id,
                conflictType: 'both_modified',
                fields: ['radius'],
                resolutionOptions: ['keep_source', 'keep_target', 'manual_merge'],
              },
            ],
          },
        });
        expect(radiusOf(ROOT_WORKSPACE_ID, id)).toBe(9);
        expect(session.history(ROOT_WORKSPACE_ID).total).toBe(2);
        expect(session.workspaceStatus(ws.workspaceId).canMerge).toBe(true);
      });

      it('should ignore resolutions under auto', async () => {
        await expect(
          session.mergeWorkspaces(
            mergeRequest(ws, { resolutions: { [id]: { choice: 'keep_source' } } }),
            agent
          )
        ).rejects.toBeInstanceOf(WorkspaceConflictError);
      });

      it('should take the source under keep_source', async () => {
        const result = await session.mergeWorkspaces(mergeRequest(ws, { strategy: 'keep_source' }), agent);

        expect(result.resolved).toEqual([{ entityId: id, choice: 'keep_source' }]);
        expect(radiusOf(ROOT_WORKSPACE_ID, id)).toBe(7);
        expect(session.getEntity(ROOT_WORKSPACE_ID, id).version).toBe(3);
      });

      it('should keep the target under keep_target', async () => {
        const result = await session.mergeWorkspaces(mergeRequest(ws, { strategy: 'keep_target' }), agent);

        expect(result.resolved).toEqual([{ entityId: id, choice: 'keep_target' }]);
        expect(result.entitiesModified).toEqual([]);
        expect(radiusOf(ROOT_WORKSPACE_ID, id)).toBe(9);
      });

      it('should let explicit resolutions override the strategy', async () => {
        await session.mergeWorkspaces(
          mergeRequest(ws, { strategy: 'keep_target', resolutions: { [id]: { choice: 'keep_source' } } }),
          agent
        );
        expect(radiusOf(ROOT_WORKSPACE_ID, id)).toBe(7);
      });

      it('should apply manually merged geometry', async () => {
        await session.mergeWorkspaces(
          mergeRequest(ws, {
            strategy: 'manual',
            resolutions: {
              [id]: { choice: 'manual_merge', geometry: { kind: 'circle', center: { x: 0, y: 0 }, radius: 8 } },
            },
          }),
          agent
        );
        expect(radiusOf(ROOT_WORKSPACE_ID, id)).toBe(8);
      });

      it('should require a resolution for every conflict under manual', async () => {
        await expect(
          session.mergeWorkspaces(mergeRequest(ws, { strategy: 'manual' }), agent)
        ).rejects.toBeInstanceOf(WorkspaceConflictError);
      });

      it('should reject manual geometry of another kind', async () => {
        await expect(
          session.mergeWorkspaces(
            mergeRequest(ws, {
              strategy: 'manual',
              resolutions: { [id]: { choice: 'manual_merge', geometry: { kind: 'point', x: 0, y: 0 } } },
            }),
            agent
          )
        ).rejects.toBeInstanceOf(InvalidParameterError);
      });

      it('should reject a resolution for an entity without a conflict', async () => {
        await expect(
          session.mergeWorkspaces(
            mergeRequest(ws, {
              strategy: 'keep_source',
              resolutions: { 'main:point_99': { choice: 'keep_source' } },
            }),
            agent
          )
        ).rejects.toThrow("No merge conflict for entity 'main:point_99'");
      });

      it('should release the merge lease after a failed merge', async () => {
        await expect(session.mergeWorkspaces(mergeRequest(ws), agent)).rejects.toThrow();
        expect(await session.listLocks()).toEqual([]);
      });
    });

    it('should report a delete/modify conflict', async () => {
      const id = circle(main, 5);
      const ws = branch();
      session.deleteEntity(ws, id);
      setRadius(main, id, 9);

      await expect(session.mergeWorkspaces(mergeRequest(ws), agent)).rejects.toMatchObject({
        details: { conflicts: [{ entityId: id, conflictType: 'delete_modified', fields: [] }] },
      });

      const result = await session.mergeWorkspaces(mergeRequest(ws, { strategy: 'keep_source' }), agent);
      expect(result.entitiesDeleted).toEqual([id]);
    });

    it('should carry constraints added in the source', async () => {
      const p1 = session.createPoint(main, { x: 0, y: 0 }).entity;
      const p2 = session.createPoint(main, { x: 3, y: 4 }).entity;
      const ws = branch();
      const applied = session.applyConstraint(ws, {
        kind: 'distance',
        entities: [p1.id, p2.id],
        params: { distance: 5 },
      });

      const result = await session.mergeWorkspaces(mergeRequest(ws), agent);

      expect(result.constraintsAdded).toEqual([applied.constraint.id]);
      expect(result.reevaluated.map((e) => [e.constraintId, e.status])).toEqual([
        [applied.constraint.id, 'satisfied'],
      ]);
      expect(session.constraintStatus(ROOT_WORKSPACE_ID).counts.total).toBe(1);
    });

    it('should carry constraint removals', async () => {
      const p1 = session.createPoint(main, { x: 0, y: 0 }).entity;
      const p2 = session.createPoint(main, { x: 3, y: 4 }).entity;
      const applied = session.applyConstraint(main, {
        kind: 'distance',
        entities: [p1.id, p2.id],
        params: { distance: 5 },
      });
      const ws = branch();
      session.removeConstraint(ws, applied.constraint.id);

      const result = await session.mergeWorkspaces(mergeRequest(ws), agent);

      expect(result.constraintsRemoved).toEqual([applied.constraint.id]);
      expect(session.constraintStatus(ROOT_WORKSPACE_ID).counts.total).toBe(0);
    });

    it('should skip source constraints on entities the target deleted', async () => {
      const p1 = session.createPoint(main, { x: 0, y: 0 }).entity;
      const p2 = session.createPoint(main, { x: 3, y: 4 }).entity;
      const ws = branch();
      const applied = session.applyConstraint(ws, {
        kind: 'distance',
        entities: [p1.id, p2.id],
        params: { distance: 5 },
      });
      session.deleteEntity(main, p2.id);

      const result = await session.mergeWorkspaces(mergeRequest(ws), agent);

      expect(result.constraintsSkipped).toEqual([applied.constraint.id]);
      expect(result.constraintsAdded).toEqual([]);
    });

    it('should abort when the merged constraints contradict', async () => {
      const p1 = session.createPoint(main, { x: 0, y: 0 }).entity;
      const p2 = session.createPoint(main, { x: 3, y: 0 }).entity;
      const ws = branch();
      session.applyConstraint(ws, { kind: 'coincident', entities: [p1.id, p2.id] });
      session.applyConstraint(main, { kind: 'distance', entities: [p1.id, p2.id], params: { distance: 3 } });

      await expect(session.mergeWorkspaces(mergeRequest(ws), agent)).rejects.toBeInstanceOf(
        ConstraintConflictError
      );
      expect(session.history(ROOT_WORKSPACE_ID).total).toBe(3);
      expect(session.constraintStatus(ROOT_WORKSPACE_ID).counts.total).toBe(1);
    });

    it('should reject merging a workspace into itself', async () => {
      const ws = branch();
      await expect(
        session.mergeWorkspaces({ ...mergeRequest(ws), targetId: ws.workspaceId }, agent)
      ).rejects.toThrow('Cannot merge a workspace into itself');
    });

    it('should reject a missing source', async () => {
      await expect(
        session.mergeWorkspaces(mergeRequest(on(asWorkspaceId('ws_9'))), agent)
      ).rejects.toBeInstanceOf(BaseNotFoundError);
    });

    it('should refuse while another agent holds the target', async () => {
      const ws = branch();
      session.createPoint(ws, { x: 0, y: 0 });
      await session.acquireLock({ resourceType: 'workspace', resourceName: 'main' }, asAgentId('agent-2'), 60_000);

      await expect(session.mergeWorkspaces(mergeRequest(ws), agent)).rejects.toBeInstanceOf(
        AlreadyLockedError
      );
      expect(session.listEntities(ROOT_WORKSPACE_ID)).toEqual([]);
    });
  });
});
