/**
 * Constraint Graph analysis
 *
 * Pure functions over a set of entities and constraints: adjacency building,
 * connected components, per-component DOF accounting, redundancy
 * classification and conflict detection.
 *
 * Key concepts:
 * - Constraint graph: nodes are entities, edges are constraints
 * - Connected component: entities linked transitively by shared constraints
 * - DOF analysis: computed per component, so a check only touches the
 *   subgraph a change can affect
 */

import type { ConstraintId, EntityId } from '../ids/types.js';
import type { Entity } from '../entities/types.js';
import { entityDof } from '../entities/types.js';
import { compareIds } from '../entities/EntityStore.js';
import { within } from '../num/tolerance.js';
import type { Constraint } from './types.js';
import { constraintParams } from './types.js';
import { CONSTRAINT_RULES } from './rules.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Entity -> constraints touching it
 */
export type Adjacency = Map<EntityId, Set<ConstraintId>>;

/**
 * DOF analysis of one connected component
 */
export interface ComponentAnalysis {
  /** Entities in this component, sorted */
  entities: EntityId[];
  /** Constraints among those entities, in declaration order */
  constraints: Constraint[];
  /** Total DOF of the entities before constraints */
  baseDof: number;
  /** DOF removed by non-redundant constraints */
  dofRemoved: number;
  /** Remaining DOF (negative when over-constrained) */
  dofRemaining: number;
  isUnderConstrained: boolean;
  isFullyConstrained: boolean;
  isOverConstrained: boolean;
  /** Redundant constraint -> the earlier constraint it duplicates */
  redundantOf: Map<ConstraintId, ConstraintId>;
  /** DOF removed per constraint (0 for redundant ones) */
  dofByConstraint: Map<ConstraintId, number>;
}

/**
 * A pair of constraints that cannot hold together
 */
export interface ConstraintContradiction {
  constraints: [Constraint, Constraint];
  message: string;
}

// ============================================================================
// Graph Building
// ============================================================================

/**
 * Build the adjacency map for a set of constraints
 */
export function buildAdjacency(constraints: Iterable<Constraint>): Adjacency {
  const adjacency: Adjacency = new Map();
  for (const c of constraints) {
    addToAdjacency(adjacency, c);
  }
  return adjacency;
}

export function addToAdjacency(adjacency: Adjacency, c: Constraint): void {
  for (const entityId of c.entities) {
    let edges = adjacency.get(entityId);
    if (!edges) {
      edges = new Set();
      adjacency.set(entityId, edges);
    }
    edges.add(c.id);
  }
}

export function removeFromAdjacency(adjacency: Adjacency, c: Constraint): void {
  for (const entityId of c.entities) {
    const edges = adjacency.get(entityId);
    if (!edges) continue;
    edges.delete(c.id);
    if (edges.size === 0) adjacency.delete(entityId);
  }
}

// ============================================================================
// Component Finding
// ============================================================================

/**
 * BFS from `seeds` across shared constraints
 *
 * Returns the component's entity ids and constraint ids. Seeds with no
 * constraints form single-entity components.
 */
export function findComponent(
  seeds: Iterable<EntityId>,
  adjacency: Adjacency,
  constraintsById: ReadonlyMap<ConstraintId, Constraint>
): { entities: Set<EntityId>; constraints: Set<ConstraintId> } {
  const entities = new Set<EntityId>();
  const constraints = new Set<ConstraintId>();
  const queue: EntityId[] = [...seeds];

  while (queue.length > 0) {
    const current = queue.pop();
    if (current === undefined || entities.has(current)) continue;
    entities.add(current);

    for (const cid of adjacency.get(current) ?? []) {
      if (constraints.has(cid)) continue;
      constraints.add(cid);
      const c = constraintsById.get(cid);
      if (!c) continue;
      for (const next of c.entities) {
        if (!entities.has(next)) queue.push(next);
      }
    }
  }

  return { entities, constraints };
}

/**
 * Partition entities into connected components
 */
export function findConnectedComponents(
  entityIds: Iterable<EntityId>,
  adjacency: Adjacency,
  constraintsById: ReadonlyMap<ConstraintId, Constraint>
): EntityId[][] {
  const visited = new Set<EntityId>();
  const components: EntityId[][] = [];

  for (const id of entityIds) {
    if (visited.has(id)) continue;
    const { entities } = findComponent([id], adjacency, constraintsById);
    for (const e of entities) visited.add(e);
    components.push([...entities].sort(compareIds));
  }

  return components;
}

// ============================================================================
// Redundancy
// ============================================================================

function sortedPair(c: Constraint): string {
  return [...c.entities].sort(compareIds).join('|');
}

/**
 * Whether `b` restates `a`: same kind, same entities, parameters equal
 * within the looser of the two tolerances
 */
export function isDuplicate(a: Constraint, b: Constraint): boolean {
  if (a.kind !== b.kind || sortedPair(a) !== sortedPair(b)) return false;
  const tol = Math.max(a.tolerance, b.tolerance);
  const pa = constraintParams(a);
  const pb = constraintParams(b);
  return Object.keys(pa).every((k) => within(pa[k], pb[k], tol));
}

/**
 * Classify redundant constraints: each one that duplicates an earlier
 * (lower seq) constraint maps to that earlier constraint.
 */
export function classifyRedundancy(constraints: Constraint[]): Map<ConstraintId, ConstraintId> {
  const ordered = [...constraints].sort((a, b) => a.seq - b.seq || compareIds(a.id, b.id));
  const primaries: Constraint[] = [];
  const redundantOf = new Map<ConstraintId, ConstraintId>();

  for (const c of ordered) {
    const original = primaries.find((p) => isDuplicate(p, c));
    if (original) {
      redundantOf.set(c.id, original.id);
    } else {
      primaries.push(c);
    }
  }

  return redundantOf;
}

// ============================================================================
// DOF Analysis
// ============================================================================

/**
 * Analyze DOF for a single component
 */
export function analyzeComponent(
  entities: Entity[],
  constraints: Constraint[]
): ComponentAnalysis {
  const byId = new Map(entities.map((e) => [e.id, e]));

  let baseDof = 0;
  for (const e of entities) {
    baseDof += entityDof(e.geometry);
  }

  const redundantOf = classifyRedundancy(constraints);
  const dofByConstraint = new Map<ConstraintId, number>();
  let dofRemoved = 0;

  for (const c of constraints) {
    if (redundantOf.has(c.id)) {
      dofByConstraint.set(c.id, 0);
      continue;
    }
    const geometries = c.entities.flatMap((id) => {
      const e = byId.get(id);
      return e ? [e.geometry] : [];
    });
    const removed = CONSTRAINT_RULES[c.kind].dofRemoved(geometries);
    dofByConstraint.set(c.id, removed);
    dofRemoved += removed;
  }

  const dofRemaining = baseDof - dofRemoved;

  return {
    entities: entities.map((e) => e.id).sort(compareIds),
    constraints: [...constraints].sort((a, b) => a.seq - b.seq),
    baseDof,
    dofRemoved,
    dofRemaining,
    isUnderConstrained: dofRemaining > 0,
    isFullyConstrained: dofRemaining === 0,
    isOverConstrained: dofRemaining < 0,
    redundantOf,
    dofByConstraint,
  };
}

// ============================================================================
// Conflict Detection
// ============================================================================

function nearAny(value: number, targets: number[], tol: number): boolean {
  return targets.some((t) => within(value, t, tol));
}

/**
 * Why two constraints on the same entities contradict, or null
 */
function contradiction(a: Constraint, b: Constraint): string | null {
  if (sortedPair(a) !== sortedPair(b) || isDuplicate(a, b)) return null;
  const tol = Math.max(a.tolerance, b.tolerance);
  const kinds = new Set([a.kind, b.kind]);

  if (kinds.has('parallel') && kinds.has('perpendicular')) {
    return 'Lines cannot be both parallel and perpendicular';
  }
  if (a.kind === 'angle' && b.kind === 'angle') {
    return `Conflicting angles ${a.angle} and ${b.angle}`;
  }
  if (a.kind === 'distance' && b.kind === 'distance') {
    return `Conflicting distances ${a.distance} and ${b.distance}`;
  }
  if (a.kind === 'radius' && b.kind === 'radius') {
    return `Conflicting radii ${a.radius} and ${b.radius}`;
  }

  const angle = a.kind === 'angle' ? a : b.kind === 'angle' ? b : undefined;
  if (angle && kinds.has('parallel') && !nearAny(angle.angle, [0, Math.PI], tol)) {
    return `Parallel lines cannot meet at angle ${angle.angle}`;
  }
  if (angle && kinds.has('perpendicular') && !nearAny(angle.angle, [Math.PI / 2], tol)) {
    return `Perpendicular lines cannot meet at angle ${angle.angle}`;
  }

  const distance = a.kind === 'distance' ? a : b.kind === 'distance' ? b : undefined;
  if (distance && kinds.has('coincident') && distance.distance > tol) {
    return `Coincident points cannot be ${distance.distance} apart`;
  }

  return null;
}

/**
 * Contradictions between `candidate` and `existing` constraints
 */
export function findContradictions(
  candidate: Constraint,
  existing: Iterable<Constraint>
): ConstraintContradiction[] {
  const found: ConstraintContradiction[] = [];
  for (const other of existing) {
    if (other.id === candidate.id) continue;
    const message = contradiction(other, candidate);
    if (message) found.push({ constraints: [other, candidate], message });
  }
  return found;
}

/**
 * All pairwise contradictions within a constraint set
 */
export function detectConflicts(constraints: Constraint[]): ConstraintContradiction[] {
  const ordered = [...constraints].sort((a, b) => a.seq - b.seq);
  const found: ConstraintContradiction[] = [];
  for (let i = 0; i < ordered.length; i++) {
    found.push(...findContradictions(ordered[i], ordered.slice(0, i)));
  }
  return found;
}
