/**
 * WorkspaceManager - branch isolation and reconciliation
 *
 * A workspace is a lineage over shared revision tables, not a copy: creating
 * a branch records its base and divergence point, and reads fall through to
 * the base as it stood at that point. Merge plans a three-way merge
 * (see merge.ts), verifies the result against the target's constraint graph
 * and records it as a single `workspace.merge` operation.
 */

import type { AgentId, WorkspaceId } from '../ids/types.js';
import { ROOT_WORKSPACE_ID, asAgentId } from '../ids/types.js';
import type { Lineage } from '../entities/LineageTable.js';
import type { NumericContext } from '../num/tolerance.js';
import type { Logger } from '../logging.js';
import {
  BaseNotFoundError,
  InvalidParameterError,
  WorkspaceConflictError,
  WorkspaceNotFoundError,
} from '../errors.js';
import type { RecordDeps } from '../history/record.js';
import { recordChangeSet } from '../history/record.js';
import { planMerge } from './merge.js';
import type { MergeRequest, MergeResult, Workspace, WorkspaceStatus } from './types.js';

export interface WorkspaceManagerOptions extends RecordDeps {
  ctx: NumericContext;
  logger: Logger;
  verbose?: boolean;
}

export class WorkspaceManager {
  private readonly records = new Map<WorkspaceId, Workspace>();
  private readonly logger: Logger;
  private readonly verbose: boolean;

  constructor(private readonly options: WorkspaceManagerOptions) {
    this.logger = options.logger;
    this.verbose = options.verbose ?? false;
    this.records.set(ROOT_WORKSPACE_ID, {
      id: ROOT_WORKSPACE_ID,
      name: ROOT_WORKSPACE_ID,
      baseId: null,
      divergencePoint: null,
      divergenceSeq: 0,
      lineage: [{ workspaceId: ROOT_WORKSPACE_ID, bound: Number.POSITIVE_INFINITY }],
      merged: false,
      mergedInto: null,
      deleted: false,
      createdBy: asAgentId('system'),
      createdAt: options.now(),
    });
  }

  // ==========================================================================
  // Lookup
  // ==========================================================================

  /**
   * A live workspace, or undefined
   */
  get(id: WorkspaceId): Workspace | undefined {
    const record = this.records.get(id);
    return record && !record.deleted ? snapshot(record) : undefined;
  }

  /**
   * @throws WorkspaceNotFoundError
   */
  require(id: WorkspaceId): Workspace {
    const workspace = this.get(id);
    if (!workspace) throw new WorkspaceNotFoundError(id);
    return workspace;
  }

  /**
   * Read path for a live workspace
   * @throws WorkspaceNotFoundError
   */
  lineage(id: WorkspaceId): Lineage {
    return this.require(id).lineage;
  }

  /**
   * Live workspaces in creation order
   */
  list(): Workspace[] {
    return [...this.records.values()].filter((w) => !w.deleted).map(snapshot);
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Branch a new workspace off `baseId`
   *
   * The divergence point is the base's latest operation, or the base's own
   * divergence point when it has none.
   *
   * @throws BaseNotFoundError if the base does not exist or was deleted
   */
  create(name: string, baseId: WorkspaceId, agent: AgentId): Workspace {
    const base = this.records.get(baseId);
    if (!base || base.deleted) throw new BaseNotFoundError(baseId);
    if (name.trim() === '') {
      throw new InvalidParameterError('Workspace name must not be empty', {
        field: 'name',
        providedValue: name,
      });
    }

    const head = this.options.log.last(base.id);
    const divergencePoint = head?.id ?? base.divergencePoint;
    const divergenceSeq = head?.seq ?? base.divergenceSeq;
    const id = this.options.allocator.allocateWorkspaceId();

    const workspace: Workspace = {
      id,
      name,
      baseId: base.id,
      divergencePoint,
      divergenceSeq,
      lineage: branchLineage(id, base.lineage, divergenceSeq),
      merged: false,
      mergedInto: null,
      deleted: false,
      createdBy: agent,
      createdAt: this.options.now(),
    };
    this.records.set(id, workspace);

    if (this.verbose) {
      this.logger.debug(`[workspace] created ${id} '${name}' from ${base.id} at ${divergencePoint ?? 'start'}`);
    }
    return snapshot(workspace);
  }

  /**
   * Delete a branch. The root and branches with unmerged live branches of
   * their own cannot be deleted.
   */
  delete(id: WorkspaceId): Workspace {
    const record = this.records.get(id);
    if (!record || record.deleted) throw new WorkspaceNotFoundError(id);
    if (record.baseId === null) {
      throw new InvalidParameterError(`Workspace '${id}' is the root and cannot be deleted`, {
        field: 'workspaceId',
        providedValue: id,
      });
    }

    const children = [...this.records.values()]
      .filter((w) => w.baseId === id && !w.deleted && !w.merged)
      .map((w) => w.id);
    if (children.length > 0) {
      throw new InvalidParameterError(`Workspace '${id}' has live branches`, {
        field: 'workspaceId',
        providedValue: id,
        branches: children,
      });
    }

    record.deleted = true;
    this.options.constraints.invalidate(id);
    return snapshot(record);
  }

  // ==========================================================================
  // Status
  // ==========================================================================

  status(id: WorkspaceId): WorkspaceStatus {
    const workspace = this.require(id);
    const { entities, constraints, log } = this.options;
    const operationCount = log.since(id, workspace.divergenceSeq).length;

    return {
      workspaceId: id,
      name: workspace.name,
      baseId: workspace.baseId,
      branchStatus: workspace.merged ? 'merged' : operationCount > 0 ? 'modified' : 'clean',
      canMerge: this.canMerge(workspace),
      divergencePoint: workspace.divergencePoint,
      head: log.head(id) ?? null,
      entityCount: entities.count(workspace.lineage),
      constraintCount: constraints.count(workspace.lineage),
      operationCount,
    };
  }

  /**
   * Whether a workspace can be merged back: not the root, not merged, and
   * its base still exists
   */
  canMerge(workspace: Workspace): boolean {
    if (workspace.baseId === null || workspace.merged || workspace.deleted) return false;
    const base = this.records.get(workspace.baseId);
    return base !== undefined && !base.deleted;
  }

  // ==========================================================================
  // Merge
  // ==========================================================================

  /**
   * Three-way merge of `sourceId` into `targetId`
   *
   * All or nothing: on any unresolved conflict, or if the merged target
   * would be over-constrained or contradictory, nothing is written.
   *
   * @throws BaseNotFoundError if either workspace does not exist
   * @throws WorkspaceConflictError with the conflict list
   * @throws ConstraintConflictError if the merged constraints are inconsistent
   */
  merge(request: MergeRequest, agent: AgentId): MergeResult {
    const source = this.records.get(request.sourceId);
    const target = this.records.get(request.targetId);
    if (!source || source.deleted) throw new BaseNotFoundError(request.sourceId);
    if (!target || target.deleted) throw new BaseNotFoundError(request.targetId);
    if (source.id === target.id) {
      throw new InvalidParameterError('Cannot merge a workspace into itself', {
        field: 'targetId',
        providedValue: target.id,
      });
    }
    if (!this.canMerge(source)) {
      throw new InvalidParameterError(
        `Workspace '${source.id}' cannot be merged (${source.merged ? 'already merged' : 'no base'})`,
        { field: 'sourceId', providedValue: source.id, merged: source.merged }
      );
    }

    const { entities, constraints, ctx } = this.options;
    const plan = planMerge(source, target, request, {
      entities,
      constraints,
      ctx,
      now: this.options.now(),
    });

    if (plan.unresolved.length > 0) {
      this.logger.warn(
        `[merge] ${source.id} -> ${target.id} aborted: ${plan.unresolved.length} unresolved conflict(s)`
      );
      throw new WorkspaceConflictError(
        `Merge of '${source.id}' into '${target.id}' has ${plan.unresolved.length} unresolved conflict(s)`,
        {
          sourceId: source.id,
          targetId: target.id,
          strategy: request.strategy,
          conflicts: plan.conflicts,
          unresolved: plan.unresolved.map((c) => c.entityId),
        }
      );
    }

    constraints.verify(target.lineage, plan.constraintChanges, plan.changes);

    const { entry, evaluations } = recordChangeSet(this.options, {
      lineage: target.lineage,
      type: 'workspace.merge',
      agentId: agent,
      changes: plan.changes,
      constraintChanges: plan.constraintChanges,
      mergedFrom: source.id,
    });

    source.divergencePoint = entry.id;
    source.divergenceSeq = entry.seq;
    source.lineage = branchLineage(source.id, target.lineage, entry.seq);
    source.merged = true;
    source.mergedInto = target.id;
    constraints.invalidate(source.id);

    if (plan.constraintsSkipped.length > 0) {
      this.logger.warn(
        `[merge] ${source.id} -> ${target.id}: skipped constraints on removed entities: ${plan.constraintsSkipped.join(', ')}`
      );
    }
    this.logger.info(
      `[merge] ${source.id} -> ${target.id}: +${plan.entitiesAdded.length} ~${plan.entitiesModified.length} ` +
        `-${plan.entitiesDeleted.length} entities as ${entry.id}`
    );

    return {
      sourceId: source.id,
      targetId: target.id,
      operationId: entry.id,
      entitiesAdded: plan.entitiesAdded,
      entitiesModified: plan.entitiesModified,
      entitiesDeleted: plan.entitiesDeleted,
      constraintsAdded: plan.constraintsAdded,
      constraintsRemoved: plan.constraintsRemoved,
      constraintsSkipped: plan.constraintsSkipped,
      conflicts: [],
      resolved: plan.resolved,
      reevaluated: evaluations,
    };
  }
}

/**
 * Lineage of a branch: itself, then the base's lineage capped at `seq`
 */
function branchLineage(id: WorkspaceId, base: Lineage, seq: number): Lineage {
  return [
    { workspaceId: id, bound: Number.POSITIVE_INFINITY },
    ...base.map((link) => ({ workspaceId: link.workspaceId, bound: Math.min(link.bound, seq) })),
  ];
}

function snapshot(workspace: Workspace): Workspace {
  return { ...workspace, lineage: [...workspace.lineage] };
}
