/**
 * Planar vector helpers over `{x, y}` records
 *
 * Entities store coordinates as records so they serialise directly; these
 * helpers keep the arithmetic out of the evaluators.
 */

import type { XY } from '../entities/types.js';

export function subXY(a: XY, b: XY): XY {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function dotXY(a: XY, b: XY): number {
  return a.x * b.x + a.y * b.y;
}

/**
 * z-component of the 3D cross product
 */
export function crossXY(a: XY, b: XY): number {
  return a.x * b.y - a.y * b.x;
}

export function lengthXY(v: XY): number {
  return Math.hypot(v.x, v.y);
}

export function distanceXY(a: XY, b: XY): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

/**
 * Distance from a point to the infinite line through `start` and `end`
 */
export function pointLineDistance(p: XY, start: XY, end: XY): number {
  const dir = subXY(end, start);
  const len = lengthXY(dir);
  if (len === 0) return distanceXY(p, start);
  return Math.abs(crossXY(dir, subXY(p, start))) / len;
}
