/**
 * Geometry Engine boundary
 *
 * The constraint graph never computes exact B-rep geometry. It asks a
 * GeometryEngine for the analytic quantities a satisfaction test needs:
 * lengths, radii, distances between entities and angles between lines. A
 * host can plug in a binding to a real kernel; AnalyticGeometryEngine covers
 * the closed-form cases for points, lines, circles and arcs.
 */

import type {
  ArcGeometry,
  CircleGeometry,
  Entity,
  EntityGeometry,
  LineGeometry,
  XY,
} from '../entities/types.js';
import { crossXY, distanceXY, dotXY, pointLineDistance, subXY } from './vec.js';

/**
 * Numeric properties of a single entity. Absent keys do not apply.
 */
export interface EntityMeasures {
  length?: number;
  area?: number;
  radius?: number;
  perimeter?: number;
}

export interface GeometryEngine {
  /** Numeric properties of one entity */
  evaluate(entity: Entity): EntityMeasures;
  /**
   * Distance between two entities. Points, circles and arcs are measured at
   * their position or centre; a line is measured as an infinite line.
   */
  distance(a: Entity, b: Entity): number;
  /**
   * Unsigned angle between the directions of two lines, in [0, π]
   */
  angleBetween(a: Entity<LineGeometry>, b: Entity<LineGeometry>): number;
}

/**
 * Position used for distance measurement, or undefined for lines and
 * containers
 */
export function anchorOf(geometry: EntityGeometry): (XY & { z?: number }) | undefined {
  switch (geometry.kind) {
    case 'point':
      return { x: geometry.x, y: geometry.y, z: geometry.z };
    case 'circle':
    case 'arc':
      return geometry.center;
    default:
      return undefined;
  }
}

function arcSweep(arc: ArcGeometry): number {
  const sweep = (arc.endAngle - arc.startAngle) % (2 * Math.PI);
  return sweep <= 0 ? sweep + 2 * Math.PI : sweep;
}

export class AnalyticGeometryEngine implements GeometryEngine {
  evaluate(entity: Entity): EntityMeasures {
    const g = entity.geometry;
    switch (g.kind) {
      case 'line':
        return { length: distanceXY(g.start, g.end) };
      case 'circle':
        return circleMeasures(g);
      case 'arc':
        return { radius: g.radius, length: g.radius * arcSweep(g) };
      default:
        return {};
    }
  }

  distance(a: Entity, b: Entity): number {
    const pa = anchorOf(a.geometry);
    const pb = anchorOf(b.geometry);
    if (pa && pb) {
      const dz = (pa.z ?? 0) - (pb.z ?? 0);
      return Math.hypot(pa.x - pb.x, pa.y - pb.y, dz);
    }
    if (pa && b.geometry.kind === 'line') {
      return pointLineDistance(pa, b.geometry.start, b.geometry.end);
    }
    if (pb && a.geometry.kind === 'line') {
      return pointLineDistance(pb, a.geometry.start, a.geometry.end);
    }
    return Number.NaN;
  }

  angleBetween(a: Entity<LineGeometry>, b: Entity<LineGeometry>): number {
    const da = subXY(a.geometry.end, a.geometry.start);
    const db = subXY(b.geometry.end, b.geometry.start);
    return Math.atan2(Math.abs(crossXY(da, db)), dotXY(da, db));
  }
}

function circleMeasures(c: CircleGeometry): EntityMeasures {
  return {
    radius: c.radius,
    perimeter: 2 * Math.PI * c.radius,
    area: Math.PI * c.radius * c.radius,
  };
}
