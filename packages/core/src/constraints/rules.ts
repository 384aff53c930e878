/**
 * Constraint rules
 *
 * Per-kind arity, accepted entity combinations, required parameters, DOF
 * removed and the tolerance family. The table is a
 * `Record<ConstraintKind, ConstraintRule>`, so a new kind does not compile
 * until it has a rule.
 */

import type { EntityGeometry } from '../entities/types.js';
import { isCurved } from '../entities/types.js';
import { anchorOf } from '../geometry/GeometryEngine.js';
import type { NumericContext } from '../num/tolerance.js';
import { InvalidConstraintError } from '../errors.js';
import type { ConstraintKind, ConstraintRequest, ConstraintSpec } from './types.js';

export interface ConstraintRule {
  arity: 1 | 2;
  /** Description of what the rule accepts, used in error messages */
  requires: string;
  accepts(geometries: EntityGeometry[]): boolean;
  /** DOF removed when the constraint is not redundant */
  dofRemoved(geometries: EntityGeometry[]): number;
  /** Which default tolerance applies */
  measure: 'length' | 'angle';
}

const both =
  (pred: (g: EntityGeometry) => boolean) =>
  (gs: EntityGeometry[]): boolean =>
    gs.every(pred);

const isLine = (g: EntityGeometry): boolean => g.kind === 'line';
const isPositioned = (g: EntityGeometry): boolean => anchorOf(g) !== undefined;

export const CONSTRAINT_RULES: Record<ConstraintKind, ConstraintRule> = {
  coincident: {
    arity: 2,
    requires: 'two points of the same dimension',
    accepts: ([a, b]) =>
      a.kind === 'point' && b.kind === 'point' && (a.z === undefined) === (b.z === undefined),
    dofRemoved: ([a]) => (a.kind === 'point' && a.z !== undefined ? 3 : 2),
    measure: 'length',
  },
  parallel: {
    arity: 2,
    requires: 'two lines',
    accepts: both(isLine),
    dofRemoved: () => 1,
    measure: 'angle',
  },
  perpendicular: {
    arity: 2,
    requires: 'two lines',
    accepts: both(isLine),
    dofRemoved: () => 1,
    measure: 'angle',
  },
  tangent: {
    arity: 2,
    requires: 'a circle or arc and a line, circle or arc',
    accepts: ([a, b]) =>
      (isCurved(a) && (isCurved(b) || isLine(b))) || (isLine(a) && isCurved(b)),
    dofRemoved: () => 1,
    measure: 'length',
  },
  distance: {
    arity: 2,
    requires: 'two points/circles/arcs, or one of those and a line',
    accepts: ([a, b]) =>
      (isPositioned(a) && (isPositioned(b) || isLine(b))) || (isLine(a) && isPositioned(b)),
    dofRemoved: () => 1,
    measure: 'length',
  },
  angle: {
    arity: 2,
    requires: 'two lines',
    accepts: both(isLine),
    dofRemoved: () => 1,
    measure: 'angle',
  },
  radius: {
    arity: 1,
    requires: 'one circle or arc',
    accepts: ([a]) => isCurved(a),
    dofRemoved: () => 1,
    measure: 'length',
  },
};

/**
 * Default tolerance for a kind
 */
export function defaultTolerance(kind: ConstraintKind, ctx: NumericContext): number {
  return CONSTRAINT_RULES[kind].measure === 'angle' ? ctx.tol.angle : ctx.tol.length;
}

function requireParam(
  request: ConstraintRequest,
  name: 'distance' | 'angle' | 'radius',
  check: (v: number) => boolean,
  message: string
): number {
  const value = request.params?.[name];
  if (value === undefined || !Number.isFinite(value) || !check(value)) {
    throw new InvalidConstraintError(`${request.kind} constraint requires ${message}`, {
      constraintKind: request.kind,
      parameter: name,
      providedValue: value ?? null,
    });
  }
  return value;
}

/**
 * Extract the kind-specific parameters of a request
 * @throws InvalidConstraintError on missing or out-of-range parameters
 */
export function specFromRequest(request: ConstraintRequest): ConstraintSpec {
  switch (request.kind) {
    case 'coincident':
    case 'parallel':
    case 'perpendicular':
    case 'tangent':
      return { kind: request.kind };
    case 'distance':
      return {
        kind: 'distance',
        distance: requireParam(request, 'distance', (v) => v >= 0, 'a non-negative distance'),
      };
    case 'angle':
      return {
        kind: 'angle',
        angle: requireParam(
          request,
          'angle',
          (v) => v >= 0 && v <= Math.PI,
          'an angle in [0, π] radians'
        ),
      };
    case 'radius':
      return {
        kind: 'radius',
        radius: requireParam(request, 'radius', (v) => v > 0, 'a positive radius'),
      };
  }
}
