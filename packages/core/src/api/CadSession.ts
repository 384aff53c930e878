/**
 * CadSession - main entry point for agent operations
 *
 * Ties the entity store, constraint graph, operation log, workspace manager
 * and lock manager together. Every call names the workspace it targets;
 * there is no current workspace. Apart from lock calls and merge (which
 * holds a lease on its target), every operation is synchronous.
 */

import type {
  AgentId,
  ConstraintId,
  EntityId,
  WorkspaceId,
} from '../ids/types.js';
import type { IdAllocator } from '../ids/idAllocator.js';
import type {
  ArcGeometry,
  CircleGeometry,
  Entity,
  EntityGeometry,
  LineGeometry,
  PointGeometry,
  SketchPlane,
} from '../entities/types.js';
import type { EntityChange, EntityFilter } from '../entities/EntityStore.js';
import { EntityStore, newEntity, reviseEntity } from '../entities/EntityStore.js';
import type { Lineage } from '../entities/LineageTable.js';
import { validateGeometry } from '../entities/validate.js';
import type { NumericContext } from '../num/tolerance.js';
import type { GeometryEngine, EntityMeasures } from '../geometry/GeometryEngine.js';
import type {
  Constraint,
  ConstraintChange,
  ConstraintEvaluation,
  ConstraintRequest,
} from '../constraints/types.js';
import type { ApplyResult, ConstraintStatusReport, StatusScope } from '../constraints/ConstraintGraph.js';
import { ConstraintGraph } from '../constraints/ConstraintGraph.js';
import { OperationLog, inverseChanges } from '../history/OperationLog.js';
import type { ListOptions } from '../history/OperationLog.js';
import type { OperationEntry, OperationPage } from '../history/types.js';
import type { RecordDeps } from '../history/record.js';
import { recordChangeSet } from '../history/record.js';
import { WorkspaceManager } from '../workspace/WorkspaceManager.js';
import type { MergeRequest, MergeResult, Workspace, WorkspaceStatus } from '../workspace/types.js';
import { LockManager } from '../coordination/LockManager.js';
import type { ResourceKey, ResourceLock } from '../coordination/types.js';
import { InvalidParameterError } from '../errors.js';
import type { SessionOptions } from './options.js';
import { createSessionOptions } from './options.js';

// ============================================================================
// Call types
// ============================================================================

/**
 * Who is calling, and against which workspace
 */
export interface CallContext {
  workspaceId: WorkspaceId;
  agentId: AgentId;
}

/** Geometry entities may belong to a sketch */
interface InSketch {
  sketchId?: EntityId;
}

export type PointInput = Omit<PointGeometry, 'kind'> & InSketch;
export type LineInput = Omit<LineGeometry, 'kind'> & InSketch;
export type CircleInput = Omit<CircleGeometry, 'kind'> & InSketch;
export type ArcInput = Omit<ArcGeometry, 'kind'> & InSketch;

export interface ExtrudeInput {
  sketchId: EntityId;
  distance: number;
}

export interface MutationResult {
  entity: Entity;
  /** Constraints re-evaluated because the change touched their component */
  reevaluated: ConstraintEvaluation[];
  operation: OperationEntry;
}

export interface DeleteResult {
  entity: Entity;
  constraintsRemoved: ConstraintId[];
  operation: OperationEntry;
}

export interface ConstraintApplyResult extends ApplyResult {
  operation: OperationEntry;
}

export interface ConstraintRemoveResult {
  constraint: Constraint;
  reevaluated: ConstraintEvaluation[];
  operation: OperationEntry;
}

export interface HistoryResult {
  /** The entry that was reversed or replayed */
  target: OperationEntry;
  operation: OperationEntry;
  reevaluated: ConstraintEvaluation[];
}

// ============================================================================
// CadSession
// ============================================================================

export class CadSession {
  readonly entities: EntityStore;
  readonly constraints: ConstraintGraph;
  readonly log: OperationLog;
  readonly workspaces: WorkspaceManager;
  readonly locks: LockManager;

  private readonly ctx: NumericContext;
  private readonly engine: GeometryEngine;
  private readonly allocator: IdAllocator;
  private readonly now: () => number;
  private readonly mergeLockTtlMs: number;

  constructor(options: Partial<SessionOptions> = {}) {
    const opts = createSessionOptions(options);
    this.ctx = opts.ctx;
    this.engine = opts.engine;
    this.allocator = opts.allocator;
    this.now = opts.now;
    this.mergeLockTtlMs = opts.mergeLockTtlMs;

    this.entities = new EntityStore();
    this.constraints = new ConstraintGraph(this.entities, {
      ctx: opts.ctx,
      engine: opts.engine,
      logger: opts.logger,
      verbose: opts.verbose,
    });
    this.log = new OperationLog();
    this.workspaces = new WorkspaceManager({
      ...this.recordDeps(),
      ctx: opts.ctx,
      logger: opts.logger,
      verbose: opts.verbose,
    });
    this.locks = new LockManager(opts.lockStore, {
      now: opts.now,
      logger: opts.logger,
      verbose: opts.verbose,
      ...(opts.executionId !== undefined ? { executionId: opts.executionId } : {}),
    });
  }

  /**
   * Numeric context (tolerances) of this session
   */
  getContext(): NumericContext {
    return this.ctx;
  }

  // ==========================================================================
  // Entities
  // ==========================================================================

  createPoint(call: CallContext, input: PointInput): MutationResult {
    const { sketchId, ...coords } = input;
    return this.createEntity(call, { kind: 'point', ...coords }, sketchId);
  }

  createLine(call: CallContext, input: LineInput): MutationResult {
    return this.createEntity(
      call,
      { kind: 'line', start: { ...input.start }, end: { ...input.end } },
      input.sketchId
    );
  }

  createCircle(call: CallContext, input: CircleInput): MutationResult {
    return this.createEntity(
      call,
      { kind: 'circle', center: { ...input.center }, radius: input.radius },
      input.sketchId
    );
  }

  createArc(call: CallContext, input: ArcInput): MutationResult {
    return this.createEntity(
      call,
      {
        kind: 'arc',
        center: { ...input.center },
        radius: input.radius,
        startAngle: input.startAngle,
        endAngle: input.endAngle,
      },
      input.sketchId
    );
  }

  createSketch(call: CallContext, plane: SketchPlane = 'xy'): MutationResult {
    return this.createEntity(call, { kind: 'sketch', plane }, undefined);
  }

  /**
   * Record an extrusion of a sketch. The solid names the sketch as its
   * parent; the B-rep itself is the geometry kernel's business.
   */
  extrude(call: CallContext, input: ExtrudeInput): MutationResult {
    return this.createEntity(
      call,
      { kind: 'solid', operation: 'extrude', distance: input.distance },
      input.sketchId
    );
  }

  getEntity(workspaceId: WorkspaceId, entityId: EntityId): Entity {
    return this.entities.require(this.workspaces.lineage(workspaceId), entityId);
  }

  /**
   * Numeric properties of an entity from the geometry engine
   */
  measureEntity(workspaceId: WorkspaceId, entityId: EntityId): EntityMeasures {
    return this.engine.evaluate(this.getEntity(workspaceId, entityId));
  }

  listEntities(workspaceId: WorkspaceId, filter: EntityFilter = {}): Entity[] {
    return this.entities.list(this.workspaces.lineage(workspaceId), filter);
  }

  /**
   * Replace an entity's geometry, producing a new version. Only the
   * entity's connected component is re-evaluated.
   *
   * @throws InvalidConstraintError, ConstraintConflictError when the new
   *   geometry no longer fits the constraints on the entity
   */
  updateEntity(call: CallContext, entityId: EntityId, geometry: EntityGeometry): MutationResult {
    const lineage = this.workspaces.lineage(call.workspaceId);
    const current = this.entities.require(lineage, entityId);
    if (geometry.kind !== current.kind) {
      throw new InvalidParameterError(
        `Cannot change '${entityId}' from ${current.kind} to ${geometry.kind}`,
        { field: 'kind', providedValue: geometry.kind, expected: current.kind }
      );
    }
    validateGeometry(geometry, this.ctx);

    const changes = [{ entityId, before: current, after: reviseEntity(current, geometry, this.now()) }];
    this.constraints.verify(lineage, [], changes);
    const { entry, evaluations } = recordChangeSet(this.recordDeps(), {
      lineage,
      type: 'entity.update',
      agentId: call.agentId,
      changes,
      constraintChanges: [],
    });
    return { entity: this.entities.require(lineage, entityId), reevaluated: evaluations, operation: entry };
  }

  /**
   * Delete an entity and every constraint referencing it
   *
   * @throws InvalidParameterError while other entities name it as a parent
   */
  deleteEntity(call: CallContext, entityId: EntityId): DeleteResult {
    const lineage = this.workspaces.lineage(call.workspaceId);
    const current = this.entities.require(lineage, entityId);
    const children = this.entities.childrenOf(lineage, entityId).map((e) => e.id);
    if (children.length > 0) {
      throw new InvalidParameterError(`Entity '${entityId}' still has children`, {
        field: 'entityId',
        providedValue: entityId,
        children,
      });
    }

    const cascade = this.constraints.cascadeFor(lineage, entityId);
    const { entry } = recordChangeSet(this.recordDeps(), {
      lineage,
      type: 'entity.delete',
      agentId: call.agentId,
      changes: [{ entityId, before: current, after: null }],
      constraintChanges: cascade,
    });
    return {
      entity: current,
      constraintsRemoved: cascade.map((c) => c.constraintId),
      operation: entry,
    };
  }

  // ==========================================================================
  // Constraints
  // ==========================================================================

  /**
   * Declare a constraint
   *
   * @throws EntityNotFoundError, InvalidConstraintError, ConstraintConflictError
   */
  applyConstraint(call: CallContext, request: ConstraintRequest): ConstraintApplyResult {
    const lineage = this.workspaces.lineage(call.workspaceId);
    const now = this.now();
    const plan = this.constraints.planApply(lineage, request, call.agentId, now);

    const { id: operationId, seq } = this.allocator.allocateOperation();
    const constraintId = this.allocator.allocateConstraintId();
    const result = this.constraints.commitApply(lineage, plan, constraintId, seq);

    const operation: OperationEntry = {
      id: operationId,
      seq,
      workspaceId: call.workspaceId,
      type: 'constraint.apply',
      agentId: call.agentId,
      timestamp: now,
      entityIds: [...result.constraint.entities],
      constraintIds: [constraintId],
      changes: [],
      constraintChanges: [{ constraintId, before: null, after: result.constraint }],
    };
    this.log.append(operation);

    return { ...result, operation };
  }

  removeConstraint(call: CallContext, constraintId: ConstraintId): ConstraintRemoveResult {
    const lineage = this.workspaces.lineage(call.workspaceId);
    const constraint = this.constraints.require(lineage, constraintId);
    const { entry, evaluations } = recordChangeSet(this.recordDeps(), {
      lineage,
      type: 'constraint.remove',
      agentId: call.agentId,
      changes: [],
      constraintChanges: [{ constraintId, before: constraint, after: null }],
    });
    return { constraint, reevaluated: evaluations, operation: entry };
  }

  constraintStatus(workspaceId: WorkspaceId, scope: StatusScope = {}): ConstraintStatusReport {
    return this.constraints.status(this.workspaces.lineage(workspaceId), scope);
  }

  // ==========================================================================
  // Workspaces
  // ==========================================================================

  createWorkspace(name: string, baseId: WorkspaceId, agentId: AgentId): Workspace {
    return this.workspaces.create(name, baseId, agentId);
  }

  listWorkspaces(): Workspace[] {
    return this.workspaces.list();
  }

  workspaceStatus(workspaceId: WorkspaceId): WorkspaceStatus {
    return this.workspaces.status(workspaceId);
  }

  deleteWorkspace(workspaceId: WorkspaceId): Workspace {
    return this.workspaces.delete(workspaceId);
  }

  /**
   * Merge while holding an exclusive lease on the target workspace
   *
   * @throws AlreadyLockedError if another agent is merging into the target
   */
  mergeWorkspaces(request: MergeRequest, agentId: AgentId): Promise<MergeResult> {
    return this.locks.withLock(
      { resourceType: 'workspace', resourceName: request.targetId },
      agentId,
      this.mergeLockTtlMs,
      () => this.workspaces.merge(request, agentId)
    );
  }

  // ==========================================================================
  // History
  // ==========================================================================

  history(workspaceId: WorkspaceId, options: ListOptions = {}): OperationPage {
    this.workspaces.require(workspaceId);
    return this.log.list(workspaceId, options);
  }

  /**
   * Reverse the most recent undoable operation. Best-effort: constraint
   * satisfaction that depended on later state is not restored.
   */
  undo(call: CallContext): HistoryResult {
    const lineage = this.workspaces.lineage(call.workspaceId);
    const target = this.log.nextUndo(call.workspaceId);
    if (!target) {
      throw new InvalidParameterError(`Nothing to undo in workspace '${call.workspaceId}'`, {
        field: 'workspaceId',
        providedValue: call.workspaceId,
      });
    }
    const inverse = inverseChanges(target);
    return this.replay(call, lineage, 'history.undo', target, inverse.changes, inverse.constraintChanges);
  }

  /**
   * Replay the most recently undone operation
   */
  redo(call: CallContext): HistoryResult {
    const lineage = this.workspaces.lineage(call.workspaceId);
    const target = this.log.nextRedo(call.workspaceId);
    if (!target) {
      throw new InvalidParameterError(`Nothing to redo in workspace '${call.workspaceId}'`, {
        field: 'workspaceId',
        providedValue: call.workspaceId,
      });
    }
    return this.replay(call, lineage, 'history.redo', target, target.changes, target.constraintChanges);
  }

  // ==========================================================================
  // Locks
  // ==========================================================================

  acquireLock(resource: ResourceKey, holder: AgentId, ttlMs: number): Promise<ResourceLock> {
    return this.locks.acquire(resource, holder, ttlMs);
  }

  releaseLock(resource: ResourceKey, holder: AgentId): Promise<boolean> {
    return this.locks.release(resource, holder);
  }

  listLocks(): Promise<ResourceLock[]> {
    return this.locks.list();
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private recordDeps(): RecordDeps {
    return {
      entities: this.entities,
      constraints: this.constraints,
      log: this.log,
      allocator: this.allocator,
      now: this.now,
    };
  }

  private createEntity(
    call: CallContext,
    geometry: EntityGeometry,
    parentId: EntityId | undefined
  ): MutationResult {
    const lineage = this.workspaces.lineage(call.workspaceId);
    validateGeometry(geometry, this.ctx);

    const parents: EntityId[] = [];
    if (parentId !== undefined) {
      const parent = this.entities.require(lineage, parentId);
      if (parent.kind !== 'sketch') {
        throw new InvalidParameterError(`Entity '${parentId}' is not a sketch`, {
          field: 'sketchId',
          providedValue: parentId,
        });
      }
      parents.push(parent.id);
    } else if (geometry.kind === 'solid') {
      throw new InvalidParameterError('An extrusion needs a sketch', {
        field: 'sketchId',
        providedValue: null,
      });
    }

    const id = this.allocator.allocateEntityId(call.workspaceId, geometry.kind);
    const entity = newEntity(id, geometry, call.agentId, this.now(), parents);
    const { entry } = recordChangeSet(this.recordDeps(), {
      lineage,
      type: 'entity.create',
      agentId: call.agentId,
      changes: [{ entityId: id, before: null, after: entity }],
      constraintChanges: [],
    });
    return { entity, reevaluated: [], operation: entry };
  }

  /**
   * Bring the workspace to the `after` side of each change, rebased on the
   * current state, and record it as one history entry
   */
  private replay(
    call: CallContext,
    lineage: Lineage,
    type: 'history.undo' | 'history.redo',
    target: OperationEntry,
    desired: readonly EntityChange[],
    desiredConstraints: readonly ConstraintChange[]
  ): HistoryResult {
    const now = this.now();
    const changes: EntityChange[] = [];
    for (const { entityId, after } of desired) {
      const current = this.entities.get(lineage, entityId) ?? null;
      if (!after) {
        if (current) changes.push({ entityId, before: current, after: null });
        continue;
      }
      changes.push({
        entityId,
        before: current,
        after: {
          ...after,
          version: Math.max(after.version, current?.version ?? 0) + 1,
          modifiedAt: now,
        },
      });
    }

    const constraintChanges: ConstraintChange[] = [];
    const touched = new Set<ConstraintId>();
    for (const { constraintId, after } of desiredConstraints) {
      const current = this.constraints.get(lineage, constraintId) ?? null;
      if ((current === null) === (after === null)) continue;
      constraintChanges.push({ constraintId, before: current, after });
      touched.add(constraintId);
    }

    // Constraints left on entities this replay removes go with them
    const removed = new Set(changes.flatMap((c) => (c.after ? [] : [c.entityId])));
    for (const change of changes) {
      if (change.after) continue;
      const orphans = this.entities
        .childrenOf(lineage, change.entityId)
        .filter((child) => !removed.has(child.id))
        .map((child) => child.id);
      if (orphans.length > 0) {
        throw new InvalidParameterError(
          `Cannot ${type === 'history.undo' ? 'undo' : 'redo'} ${target.id}: '${change.entityId}' still has children`,
          { field: 'workspaceId', providedValue: call.workspaceId, children: orphans }
        );
      }
      for (const removal of this.constraints.cascadeFor(lineage, change.entityId)) {
        if (touched.has(removal.constraintId)) continue;
        constraintChanges.push(removal);
        touched.add(removal.constraintId);
      }
    }

    this.constraints.verify(lineage, constraintChanges, changes);
    const { entry, evaluations } = recordChangeSet(this.recordDeps(), {
      lineage,
      type,
      agentId: call.agentId,
      changes,
      constraintChanges,
      reverts: target.id,
    });
    return { target, operation: entry, reevaluated: evaluations };
  }
}
