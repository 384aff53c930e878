/**
 * ConstraintGraph - per-workspace constraint storage, DOF checks and
 * incremental evaluation
 *
 * Constraints are stored as lineage revisions, like entities. For each
 * workspace the graph keeps a materialised index (constraints by id plus
 * entity adjacency) and an evaluation cache, both built lazily on first use
 * and then maintained incrementally by every commit.
 *
 * Adding a constraint is two-phase: `planApply` validates and runs the
 * component DOF and contradiction checks without touching any state, and
 * `commitApply` writes the planned constraint under an allocated id. A
 * rejected request therefore leaves the graph and the id counters alone.
 */

import type { AgentId, ConstraintId, EntityId, WorkspaceId } from '../ids/types.js';
import { asConstraintId } from '../ids/types.js';
import type { Entity } from '../entities/types.js';
import type { EntityChange, EntityStore } from '../entities/EntityStore.js';
import { compareIds } from '../entities/EntityStore.js';
import type { Lineage } from '../entities/LineageTable.js';
import { LineageTable } from '../entities/LineageTable.js';
import type { GeometryEngine } from '../geometry/GeometryEngine.js';
import type { NumericContext } from '../num/tolerance.js';
import type { Logger } from '../logging.js';
import {
  ConstraintConflictError,
  EntityNotFoundError,
  InvalidConstraintError,
  InvalidParameterError,
} from '../errors.js';
import type { ConflictingConstraint } from '../errors.js';
import type {
  Constraint,
  ConstraintChange,
  ConstraintEvaluation,
  ConstraintRequest,
  ConstraintStatus,
} from './types.js';
import { constraintParams } from './types.js';
import { CONSTRAINT_RULES, defaultTolerance, specFromRequest } from './rules.js';
import { isWithinTolerance, measureConstraint } from './evaluate.js';
import type { Adjacency, ComponentAnalysis } from './graph.js';
import {
  addToAdjacency,
  analyzeComponent,
  buildAdjacency,
  findComponent,
  findConnectedComponents,
  findContradictions,
  removeFromAdjacency,
} from './graph.js';

// ============================================================================
// Types
// ============================================================================

export interface ConstraintGraphOptions {
  ctx: NumericContext;
  engine: GeometryEngine;
  logger: Logger;
  verbose?: boolean;
}

/**
 * A validated constraint that has passed the DOF and contradiction checks
 */
export interface ApplyPlan {
  draft: Constraint;
  analysis: ComponentAnalysis;
}

export interface ApplyResult {
  constraint: Constraint;
  status: ConstraintStatus;
  dofRemoved: number;
  componentEntities: EntityId[];
  dofRemaining: number;
  evaluation: ConstraintEvaluation;
}

/**
 * Scope for status queries. Without `sketchId` the whole workspace is
 * reported.
 */
export interface StatusScope {
  sketchId?: EntityId;
}

export interface ConstraintStatusReport {
  counts: {
    total: number;
    satisfied: number;
    violated: number;
    redundant: number;
  };
  /** Remaining DOF summed over the components touching the scope */
  dofRemaining: number;
  componentCount: number;
  constraints: ConstraintEvaluation[];
}

interface GraphState {
  constraints: Map<ConstraintId, Constraint>;
  adjacency: Adjacency;
  evaluations: Map<ConstraintId, ConstraintEvaluation>;
}

type EntityLookup = (id: EntityId) => Entity | undefined;

/** Placeholder id for a constraint that has not been committed */
const PENDING_ID = asConstraintId('pending');

// ============================================================================
// ConstraintGraph
// ============================================================================

export class ConstraintGraph {
  private readonly table = new LineageTable<ConstraintId, Constraint>();
  private readonly states = new Map<WorkspaceId, GraphState>();
  private readonly ctx: NumericContext;
  private readonly engine: GeometryEngine;
  private readonly logger: Logger;
  private readonly verbose: boolean;

  constructor(
    private readonly entities: EntityStore,
    options: ConstraintGraphOptions
  ) {
    this.ctx = options.ctx;
    this.engine = options.engine;
    this.logger = options.logger;
    this.verbose = options.verbose ?? false;
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  get(lineage: Lineage, id: ConstraintId): Constraint | undefined {
    return this.state(lineage).constraints.get(id);
  }

  /**
   * @throws InvalidParameterError when the constraint is not visible
   */
  require(lineage: Lineage, id: ConstraintId): Constraint {
    const constraint = this.get(lineage, id);
    if (!constraint) {
      throw new InvalidParameterError(
        `Constraint '${id}' not found in workspace '${lineage[0].workspaceId}'`,
        { field: 'constraintId', providedValue: id }
      );
    }
    return constraint;
  }

  /**
   * All visible constraints in declaration order
   */
  list(lineage: Lineage): Constraint[] {
    return [...this.state(lineage).constraints.values()].sort(bySeq);
  }

  count(lineage: Lineage): number {
    return this.state(lineage).constraints.size;
  }

  /**
   * Constraints visible along an arbitrary lineage, read straight from
   * storage. Used for base snapshots, which have no cached index.
   */
  snapshot(lineage: Lineage): Map<ConstraintId, Constraint> {
    return new Map(this.table.values(lineage).map((c) => [c.id, c]));
  }

  /**
   * Visible constraints that reference an entity
   */
  referencing(lineage: Lineage, entityId: EntityId): Constraint[] {
    const state = this.state(lineage);
    const ids = state.adjacency.get(entityId) ?? [];
    return [...ids].flatMap((id) => state.constraints.get(id) ?? []).sort(bySeq);
  }

  /**
   * Removals for every constraint referencing `entityId`
   */
  cascadeFor(lineage: Lineage, entityId: EntityId): ConstraintChange[] {
    return this.referencing(lineage, entityId).map((c) => ({
      constraintId: c.id,
      before: c,
      after: null,
    }));
  }

  /**
   * Cached evaluation of a constraint
   */
  evaluation(lineage: Lineage, id: ConstraintId): ConstraintEvaluation | undefined {
    return this.state(lineage).evaluations.get(id);
  }

  /**
   * DOF analysis of the component(s) containing `entityIds`
   */
  componentOf(lineage: Lineage, entityIds: EntityId[]): ComponentAnalysis {
    const state = this.state(lineage);
    const lookup = this.lookupFor(lineage);
    const component = findComponent(entityIds, state.adjacency, state.constraints);
    return analyzeComponent(
      [...component.entities].flatMap((id) => lookup(id) ?? []),
      [...component.constraints].flatMap((id) => state.constraints.get(id) ?? [])
    );
  }

  // ==========================================================================
  // Apply
  // ==========================================================================

  /**
   * Validate a request and check that the constraint can be added
   *
   * @throws EntityNotFoundError if a referenced entity is not visible
   * @throws InvalidConstraintError on a bad kind/entity combination or params
   * @throws ConstraintConflictError if the component would be over-constrained
   *   or the constraint contradicts an existing one
   */
  planApply(lineage: Lineage, request: ConstraintRequest, agent: AgentId, now: number): ApplyPlan {
    const rule = CONSTRAINT_RULES[request.kind];

    if (request.entities.length !== rule.arity) {
      throw new InvalidConstraintError(
        `${request.kind} constraint takes ${rule.arity} ${rule.arity === 1 ? 'entity' : 'entities'}, got ${request.entities.length}`,
        { constraintKind: request.kind, entities: request.entities }
      );
    }
    if (new Set(request.entities).size !== request.entities.length) {
      throw new InvalidConstraintError(`${request.kind} constraint references the same entity twice`, {
        constraintKind: request.kind,
        entities: request.entities,
      });
    }

    const referenced = request.entities.map((id) => this.entities.require(lineage, id));
    if (!rule.accepts(referenced.map((e) => e.geometry))) {
      throw new InvalidConstraintError(`${request.kind} constraint requires ${rule.requires}`, {
        constraintKind: request.kind,
        entities: request.entities,
        entityKinds: referenced.map((e) => e.kind),
      });
    }

    const spec = specFromRequest(request);
    const tolerance = request.params?.tolerance ?? defaultTolerance(request.kind, this.ctx);
    if (!Number.isFinite(tolerance) || tolerance <= 0) {
      throw new InvalidConstraintError(`${request.kind} constraint tolerance must be positive`, {
        constraintKind: request.kind,
        parameter: 'tolerance',
        providedValue: tolerance,
      });
    }

    const draft: Constraint = {
      ...spec,
      id: PENDING_ID,
      entities: [...request.entities],
      tolerance,
      createdBy: agent,
      createdAt: now,
      seq: Number.POSITIVE_INFINITY,
    };

    // The draft joins the components of its entities; nothing else can change
    const state = this.state(lineage);
    const lookup = this.lookupFor(lineage);
    const component = findComponent(draft.entities, state.adjacency, state.constraints);
    const analysis = analyzeComponent(
      [...component.entities].flatMap((id) => lookup(id) ?? []),
      [...[...component.constraints].flatMap((id) => state.constraints.get(id) ?? []), draft]
    );
    this.assertConsistent(lineage, analysis, [draft]);

    return { draft, analysis };
  }

  /**
   * Write a planned constraint under its allocated id and sequence number
   */
  commitApply(lineage: Lineage, plan: ApplyPlan, id: ConstraintId, seq: number): ApplyResult {
    const constraint: Constraint = { ...plan.draft, id, seq };
    this.commit(lineage, seq, [{ constraintId: id, before: null, after: constraint }]);

    const redundantOf = plan.analysis.redundantOf.get(PENDING_ID);
    const dofRemoved = plan.analysis.dofByConstraint.get(PENDING_ID) ?? 0;
    const evaluation = this.evaluate(lineage, constraint, dofRemoved, redundantOf);
    this.state(lineage).evaluations.set(id, evaluation);

    if (this.verbose) {
      this.logger.debug(
        `[constraints] ${lineage[0].workspaceId}: ${constraint.kind} ${id} ${evaluation.status}, ` +
          `${plan.analysis.dofRemaining} DOF remaining`
      );
    }

    return {
      constraint,
      status: evaluation.status,
      dofRemoved,
      componentEntities: plan.analysis.entities,
      dofRemaining: plan.analysis.dofRemaining,
      evaluation,
    };
  }

  // ==========================================================================
  // Change sets
  // ==========================================================================

  /**
   * Check a prospective batch of constraint changes (with the entity changes
   * made alongside them) before anything is written. Every component that
   * gains a constraint or holds a changed entity must stay within its DOF,
   * and every constraint on a changed entity must still accept its
   * geometry.
   *
   * @throws InvalidConstraintError if a changed entity no longer fits a
   *   constraint on it (a 2D point made 3D under a coincident)
   * @throws ConstraintConflictError on over-constraint or contradiction
   */
  verify(
    lineage: Lineage,
    changes: readonly ConstraintChange[],
    entityChanges: readonly EntityChange[] = []
  ): void {
    const added = changes.flatMap((c) => (c.after && !c.before ? [c.after] : []));
    const changed = entityChanges.flatMap((c) => (c.after ? [c.entityId] : []));
    if (added.length === 0 && changed.length === 0) return;

    const state = this.state(lineage);
    const prospective = new Map(state.constraints);
    for (const change of changes) {
      if (change.after) prospective.set(change.constraintId, change.after);
      else prospective.delete(change.constraintId);
    }

    const overrides = new Map(entityChanges.map((c) => [c.entityId, c.after]));
    const base = this.lookupFor(lineage);
    const lookup: EntityLookup = (id) => {
      const override = overrides.get(id);
      return override === undefined ? base(id) : (override ?? undefined);
    };

    for (const c of added) {
      for (const entityId of c.entities) {
        if (!lookup(entityId)) {
          throw new EntityNotFoundError(entityId, lineage[0].workspaceId);
        }
      }
    }

    const adjacency = buildAdjacency(prospective.values());
    const changedIds = new Set(changed);
    for (const c of prospective.values()) {
      if (c.entities.some((id) => changedIds.has(id))) {
        this.assertAccepted(lineage, c, lookup);
      }
    }

    const seeds = [...added.flatMap((c) => c.entities), ...changed];
    for (const entityIds of findConnectedComponents(seeds, adjacency, prospective)) {
      const component = findComponent(entityIds, adjacency, prospective);
      if (component.constraints.size === 0) continue;
      const analysis = analyzeComponent(
        entityIds.flatMap((id) => lookup(id) ?? []),
        [...component.constraints].flatMap((id) => prospective.get(id) ?? [])
      );
      this.assertConsistent(
        lineage,
        analysis,
        added.filter((c) => component.constraints.has(c.id))
      );
    }
  }

  /**
   * Write constraint revisions and keep the cached index in step. Does not
   * evaluate; callers propagate afterwards.
   */
  commit(lineage: Lineage, seq: number, changes: readonly ConstraintChange[]): void {
    const workspaceId = lineage[0].workspaceId;
    const state = this.states.get(workspaceId);

    for (const change of changes) {
      this.table.write(workspaceId, change.constraintId, seq, change.after);
      if (!state) continue;

      const previous = state.constraints.get(change.constraintId);
      if (previous) {
        removeFromAdjacency(state.adjacency, previous);
        state.constraints.delete(change.constraintId);
        state.evaluations.delete(change.constraintId);
      }
      if (change.after) {
        state.constraints.set(change.constraintId, change.after);
        addToAdjacency(state.adjacency, change.after);
      }
    }
  }

  /**
   * Re-evaluate the constraints in the component(s) of `entityIds`, and
   * nothing else
   */
  propagate(lineage: Lineage, entityIds: Iterable<EntityId>): ConstraintEvaluation[] {
    return this.reevaluate(lineage, this.state(lineage), [...entityIds]);
  }

  /**
   * Drop the cached index of a workspace, e.g. after its lineage changed
   */
  invalidate(workspaceId: WorkspaceId): void {
    this.states.delete(workspaceId);
  }

  // ==========================================================================
  // Status
  // ==========================================================================

  status(lineage: Lineage, scope: StatusScope = {}): ConstraintStatusReport {
    const state = this.state(lineage);
    const lookup = this.lookupFor(lineage);

    let scopeIds: EntityId[];
    if (scope.sketchId !== undefined) {
      const sketch = this.entities.require(lineage, scope.sketchId);
      if (sketch.kind !== 'sketch') {
        throw new InvalidParameterError(`Entity '${sketch.id}' is not a sketch`, {
          field: 'sketchId',
          providedValue: sketch.id,
        });
      }
      scopeIds = this.entities.list(lineage, { parent: sketch.id }).map((e) => e.id);
    } else {
      scopeIds = this.entities.list(lineage).map((e) => e.id);
    }

    let dofRemaining = 0;
    const constraintIds = new Set<ConstraintId>();
    const components = findConnectedComponents(scopeIds, state.adjacency, state.constraints);

    for (const entityIds of components) {
      const component = findComponent(entityIds, state.adjacency, state.constraints);
      const analysis = analyzeComponent(
        entityIds.flatMap((id) => lookup(id) ?? []),
        [...component.constraints].flatMap((id) => state.constraints.get(id) ?? [])
      );
      dofRemaining += analysis.dofRemaining;
      for (const id of component.constraints) constraintIds.add(id);
    }

    const constraints = [...constraintIds]
      .flatMap((id) => state.constraints.get(id) ?? [])
      .sort(bySeq)
      .map((c) => this.cachedEvaluation(lineage, state, c));

    const counts = { total: constraints.length, satisfied: 0, violated: 0, redundant: 0 };
    for (const e of constraints) {
      counts[e.status]++;
    }

    return { counts, dofRemaining, componentCount: components.length, constraints };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private state(lineage: Lineage): GraphState {
    const workspaceId = lineage[0].workspaceId;
    let state = this.states.get(workspaceId);
    if (!state) {
      const constraints = new Map(this.table.values(lineage).map((c) => [c.id, c]));
      state = {
        constraints,
        adjacency: buildAdjacency(constraints.values()),
        evaluations: new Map(),
      };
      this.states.set(workspaceId, state);
      this.reevaluate(lineage, state, [...state.adjacency.keys()]);
    }
    return state;
  }

  private lookupFor(lineage: Lineage): EntityLookup {
    return (id) => this.entities.get(lineage, id);
  }

  private cachedEvaluation(lineage: Lineage, state: GraphState, c: Constraint): ConstraintEvaluation {
    const cached = state.evaluations.get(c.id);
    if (cached) return cached;
    const [evaluation] = this.reevaluate(lineage, state, c.entities).filter(
      (e) => e.constraintId === c.id
    );
    return evaluation;
  }

  private reevaluate(lineage: Lineage, state: GraphState, seeds: EntityId[]): ConstraintEvaluation[] {
    if (seeds.length === 0) return [];
    const lookup = this.lookupFor(lineage);
    const evaluations: ConstraintEvaluation[] = [];

    for (const entityIds of findConnectedComponents(seeds, state.adjacency, state.constraints)) {
      const component = findComponent(entityIds, state.adjacency, state.constraints);
      if (component.constraints.size === 0) continue;
      const analysis = analyzeComponent(
        entityIds.flatMap((id) => lookup(id) ?? []),
        [...component.constraints].flatMap((id) => state.constraints.get(id) ?? [])
      );
      for (const c of analysis.constraints) {
        const evaluation = this.evaluate(
          lineage,
          c,
          analysis.dofByConstraint.get(c.id) ?? 0,
          analysis.redundantOf.get(c.id)
        );
        state.evaluations.set(c.id, evaluation);
        evaluations.push(evaluation);
      }
    }

    if (this.verbose && evaluations.length > 0) {
      this.logger.debug(
        `[constraints] ${lineage[0].workspaceId}: re-evaluated ${evaluations.length} constraint(s)`
      );
    }
    return evaluations;
  }

  private evaluate(
    lineage: Lineage,
    c: Constraint,
    dofRemoved: number,
    redundantOf: ConstraintId | undefined
  ): ConstraintEvaluation {
    const referenced = c.entities.map((id) => this.entities.require(lineage, id));
    const measurement = measureConstraint(c, referenced, this.engine);
    const withinTolerance = isWithinTolerance(measurement, c.tolerance);

    return {
      constraintId: c.id,
      kind: c.kind,
      entities: [...c.entities],
      status: redundantOf ? 'redundant' : withinTolerance ? 'satisfied' : 'violated',
      withinTolerance,
      expected: measurement.expected,
      actual: measurement.actual,
      tolerance: c.tolerance,
      dofRemoved,
      ...(redundantOf ? { redundantOf } : {}),
    };
  }

  private assertAccepted(lineage: Lineage, c: Constraint, lookup: EntityLookup): void {
    const referenced = c.entities.flatMap((id) => lookup(id) ?? []);
    // Missing entities are reported by the existence check, not here
    if (referenced.length !== c.entities.length) return;

    const rule = CONSTRAINT_RULES[c.kind];
    if (!rule.accepts(referenced.map((e) => e.geometry))) {
      this.logger.warn(
        `[constraints] ${lineage[0].workspaceId}: ${c.kind} ${c.id} no longer fits its entities`
      );
      throw new InvalidConstraintError(`${c.kind} constraint ${c.id} requires ${rule.requires}`, {
        constraintKind: c.kind,
        constraintId: c.id,
        entities: [...c.entities],
        entityKinds: referenced.map((e) => e.kind),
      });
    }
  }

  /**
   * Throw ConstraintConflictError if `analysis` is over-constrained or any
   * of `candidates` contradicts another constraint in the component
   */
  private assertConsistent(
    lineage: Lineage,
    analysis: ComponentAnalysis,
    candidates: Constraint[]
  ): void {
    const summary = {
      componentEntities: analysis.entities,
      baseDof: analysis.baseDof,
      dofRemoved: analysis.dofRemoved,
      dofRemaining: analysis.dofRemaining,
    };

    for (const candidate of candidates) {
      const [contradiction] = findContradictions(candidate, analysis.constraints);
      if (contradiction) {
        const [existing] = contradiction.constraints;
        this.logger.warn(
          `[constraints] ${lineage[0].workspaceId}: rejected ${candidate.kind}: ${contradiction.message}`
        );
        throw new ConstraintConflictError(
          `${candidate.kind} constraint conflicts with ${existing.id}: ${contradiction.message}`,
          {
            reason: 'contradiction',
            ...summary,
            requested: describe(candidate),
            conflictingWith: [describe(existing)],
          }
        );
      }
    }

    if (analysis.isOverConstrained) {
      const candidateIds = new Set(candidates.map((c) => c.id));
      this.logger.warn(
        `[constraints] ${lineage[0].workspaceId}: rejected, component would have ${analysis.dofRemaining} DOF`
      );
      throw new ConstraintConflictError(
        `Over-constrained: component of ${analysis.entities.length} entities would have ` +
          `${analysis.dofRemaining} DOF remaining (${analysis.baseDof} available, ${analysis.dofRemoved} removed)`,
        {
          reason: 'over_constrained',
          ...summary,
          requested: candidates.map(describe),
          conflictingWith: analysis.constraints
            .filter((c) => !candidateIds.has(c.id) && !analysis.redundantOf.has(c.id))
            .map(describe),
        }
      );
    }
  }
}

function bySeq(a: Constraint, b: Constraint): number {
  return a.seq - b.seq || compareIds(a.id, b.id);
}

function describe(c: Constraint): ConflictingConstraint {
  return {
    constraintId: c.id,
    kind: c.kind,
    entities: [...c.entities],
    params: constraintParams(c),
  };
}
