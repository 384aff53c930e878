/**
 * Constraint Types
 *
 * Constraints are the edges of the constraint graph. Each kind is a variant
 * of a closed union; code that dispatches on kind switches over the union
 * (or indexes a `Record<ConstraintKind, ...>`) so adding a kind is a compile
 * error everywhere it is not handled.
 *
 * Supported constraints:
 * - coincident: two points at the same location
 * - parallel: two lines parallel
 * - perpendicular: two lines perpendicular
 * - tangent: a line and a circle/arc, or two circles/arcs, tangent
 * - distance: distance between two positioned entities, or from one to a line
 * - angle: angle between two lines (radians)
 * - radius: a circle or arc has a given radius
 */

import type { AgentId, ConstraintId, EntityId } from '../ids/types.js';

// ============================================================================
// Kinds
// ============================================================================

export type ConstraintKind =
  | 'coincident'
  | 'parallel'
  | 'perpendicular'
  | 'tangent'
  | 'distance'
  | 'angle'
  | 'radius';

export const CONSTRAINT_KINDS: readonly ConstraintKind[] = [
  'coincident',
  'parallel',
  'perpendicular',
  'tangent',
  'distance',
  'angle',
  'radius',
];

/**
 * Kind-specific parameters
 */
export type ConstraintSpec =
  | { kind: 'coincident' }
  | { kind: 'parallel' }
  | { kind: 'perpendicular' }
  | { kind: 'tangent' }
  | { kind: 'distance'; distance: number }
  | { kind: 'angle'; angle: number }
  | { kind: 'radius'; radius: number };

/**
 * Fields shared by every constraint
 */
export interface BaseConstraint {
  id: ConstraintId;
  /** One or two referenced entities */
  entities: EntityId[];
  /** Satisfaction tolerance (length units or radians, by kind) */
  tolerance: number;
  createdBy: AgentId;
  createdAt: number;
  /** Operation sequence that declared it; orders redundancy checks */
  seq: number;
}

export type Constraint = BaseConstraint & ConstraintSpec;

export type ConstraintOf<K extends ConstraintKind> = Extract<Constraint, { kind: K }>;

/**
 * Numeric parameters of a constraint, keyed by name
 */
export function constraintParams(c: ConstraintSpec): Record<string, number> {
  switch (c.kind) {
    case 'distance':
      return { distance: c.distance };
    case 'angle':
      return { angle: c.angle };
    case 'radius':
      return { radius: c.radius };
    case 'coincident':
    case 'parallel':
    case 'perpendicular':
    case 'tangent':
      return {};
  }
}

// ============================================================================
// Requests
// ============================================================================

/**
 * Input to ConstraintGraph.apply, as an agent sends it
 */
export interface ConstraintRequest {
  kind: ConstraintKind;
  entities: EntityId[];
  params?: {
    distance?: number;
    angle?: number;
    radius?: number;
    /** Overrides the default tolerance for this constraint */
    tolerance?: number;
  };
}

// ============================================================================
// Evaluation
// ============================================================================

export type ConstraintStatus = 'satisfied' | 'violated' | 'redundant';

/**
 * Result of checking one constraint against current geometry
 */
export interface ConstraintEvaluation {
  constraintId: ConstraintId;
  kind: ConstraintKind;
  entities: EntityId[];
  status: ConstraintStatus;
  /** Whether the measured value is within tolerance, regardless of redundancy */
  withinTolerance: boolean;
  expected: number;
  actual: number;
  tolerance: number;
  /** DOF this constraint removes from its component (0 when redundant) */
  dofRemoved: number;
  /** The earlier constraint this one duplicates */
  redundantOf?: ConstraintId;
}

/**
 * Before/after pair recorded for every constraint write
 */
export interface ConstraintChange {
  constraintId: ConstraintId;
  before: Constraint | null;
  after: Constraint | null;
}
