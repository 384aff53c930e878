/**
 * Tolerance model and numeric context
 *
 * Constraint satisfaction is tolerance based: a constraint holds when the
 * measured value is within tolerance of the target. All such comparisons go
 * through these helpers rather than raw comparisons.
 */

/**
 * Tolerance values for a session
 */
export interface Tolerances {
  /** Model-space length tolerance (absolute distance) */
  length: number;
  /** Angle tolerance in radians */
  angle: number;
}

/**
 * Numeric context containing tolerance information
 */
export interface NumericContext {
  tol: Tolerances;
  /** Largest absolute coordinate or length accepted on entities */
  coordinateLimit: number;
}

/**
 * Default tolerances (agent-scale modelling in mm)
 */
export const DEFAULT_TOLERANCES: Tolerances = {
  length: 0.01,
  angle: 0.01,
};

export const DEFAULT_COORDINATE_LIMIT = 1e6;

/**
 * Create a numeric context, filling gaps with the defaults
 */
export function createNumericContext(
  tol?: Partial<Tolerances>,
  coordinateLimit: number = DEFAULT_COORDINATE_LIMIT
): NumericContext {
  return {
    tol: {
      length: tol?.length ?? DEFAULT_TOLERANCES.length,
      angle: tol?.angle ?? DEFAULT_TOLERANCES.angle,
    },
    coordinateLimit,
  };
}

/**
 * Check if two values agree within an explicit tolerance
 */
export function within(a: number, b: number, tolerance: number): boolean {
  return Math.abs(a - b) <= tolerance;
}

/**
 * Check that a number is finite and inside the coordinate limit
 */
export function inRange(value: number, ctx: NumericContext): boolean {
  return Number.isFinite(value) && Math.abs(value) <= ctx.coordinateLimit;
}
