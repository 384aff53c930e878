/**
 * Constraint evaluation
 *
 * Measures each constraint against current entity geometry through the
 * GeometryEngine and compares the measured value to its target within the
 * constraint's tolerance. Evaluation never moves geometry.
 */

import type { Entity } from '../entities/types.js';
import { hasKind, isCurved } from '../entities/types.js';
import type { GeometryEngine } from '../geometry/GeometryEngine.js';
import { within } from '../num/tolerance.js';
import { InternalSolverError } from '../errors.js';
import type { Constraint } from './types.js';

/**
 * Measured and target values for one constraint
 */
export interface Measurement {
  expected: number;
  actual: number;
}

/**
 * Fold an unsigned line angle in [0, π] to the acute angle in [0, π/2]
 */
function acute(theta: number): number {
  return Math.min(theta, Math.PI - theta);
}

function lineAngle(engine: GeometryEngine, a: Entity, b: Entity, c: Constraint): number {
  if (!hasKind(a, 'line') || !hasKind(b, 'line')) {
    throw new InternalSolverError(`${c.kind} constraint ${c.id} references a non-line`, {
      constraintId: c.id,
    });
  }
  return engine.angleBetween(a, b);
}

function radiusOf(engine: GeometryEngine, e: Entity, c: Constraint): number {
  const radius = engine.evaluate(e).radius;
  if (radius === undefined) {
    throw new InternalSolverError(`${c.kind} constraint ${c.id} references an entity without a radius`, {
      constraintId: c.id,
      entityId: e.id,
    });
  }
  return radius;
}

/**
 * Measure a constraint. `entities` are the referenced entities in the
 * constraint's order.
 */
export function measureConstraint(
  c: Constraint,
  entities: Entity[],
  engine: GeometryEngine
): Measurement {
  const [a, b] = entities;
  switch (c.kind) {
    case 'coincident':
      return { expected: 0, actual: engine.distance(a, b) };
    case 'parallel':
      return { expected: 0, actual: acute(lineAngle(engine, a, b, c)) };
    case 'perpendicular':
      return { expected: Math.PI / 2, actual: acute(lineAngle(engine, a, b, c)) };
    case 'angle':
      return { expected: c.angle, actual: lineAngle(engine, a, b, c) };
    case 'distance':
      return { expected: c.distance, actual: engine.distance(a, b) };
    case 'radius':
      return { expected: c.radius, actual: radiusOf(engine, a, c) };
    case 'tangent': {
      const actual = engine.distance(a, b);
      if (isCurved(a.geometry) && isCurved(b.geometry)) {
        const ra = radiusOf(engine, a, c);
        const rb = radiusOf(engine, b, c);
        const external = ra + rb;
        const internal = Math.abs(ra - rb);
        const expected =
          Math.abs(actual - external) <= Math.abs(actual - internal) ? external : internal;
        return { expected, actual };
      }
      const curve = isCurved(a.geometry) ? a : b;
      return { expected: radiusOf(engine, curve, c), actual };
    }
  }
}

/**
 * Whether a measurement is within the constraint's tolerance
 */
export function isWithinTolerance(m: Measurement, tolerance: number): boolean {
  return Number.isFinite(m.actual) && within(m.actual, m.expected, tolerance);
}
