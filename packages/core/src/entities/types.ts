/**
 * Entity Types
 *
 * Entities are the nodes of the constraint graph: points, lines, circles and
 * arcs carry geometry and degrees of freedom; sketches and solids are
 * containers and derived bodies with no DOF of their own.
 *
 * Entities are immutable values. A mutation produces a new Entity with a
 * higher version, written as a new revision; history is never overwritten.
 */

import type { AgentId, EntityId } from '../ids/types.js';

// ============================================================================
// Geometry
// ============================================================================

/**
 * A 2D coordinate pair
 */
export interface XY {
  x: number;
  y: number;
}

/**
 * A point, 2D unless `z` is present
 */
export interface PointGeometry {
  kind: 'point';
  x: number;
  y: number;
  z?: number;
}

/**
 * A line segment between two endpoints
 */
export interface LineGeometry {
  kind: 'line';
  start: XY;
  end: XY;
}

export interface CircleGeometry {
  kind: 'circle';
  center: XY;
  radius: number;
}

/**
 * A circular arc, angles in radians counter-clockwise from +X
 */
export interface ArcGeometry {
  kind: 'arc';
  center: XY;
  radius: number;
  startAngle: number;
  endAngle: number;
}

export type SketchPlane = 'xy' | 'yz' | 'zx';

export const SKETCH_PLANES: readonly SketchPlane[] = ['xy', 'yz', 'zx'];

/**
 * A sketch groups 2D entities on a plane. Members name it as their parent.
 */
export interface SketchGeometry {
  kind: 'sketch';
  plane: SketchPlane;
}

/**
 * A solid derived from a sketch. The B-rep itself belongs to the external
 * geometry kernel; only the feature parameters are recorded here.
 */
export interface SolidGeometry {
  kind: 'solid';
  operation: 'extrude';
  distance: number;
}

/**
 * Closed union of all entity geometries
 */
export type EntityGeometry =
  | PointGeometry
  | LineGeometry
  | CircleGeometry
  | ArcGeometry
  | SketchGeometry
  | SolidGeometry;

export type EntityKind = EntityGeometry['kind'];

export const ENTITY_KINDS: readonly EntityKind[] = [
  'point',
  'line',
  'circle',
  'arc',
  'sketch',
  'solid',
];

/**
 * Entity kinds that carry 2D/3D geometry and take part in constraints
 */
export type GeometricKind = 'point' | 'line' | 'circle' | 'arc';

export type GeometryOf<K extends EntityKind> = Extract<EntityGeometry, { kind: K }>;

// ============================================================================
// Entity
// ============================================================================

/**
 * An entity revision
 */
export interface Entity<G extends EntityGeometry = EntityGeometry> {
  /** Workspace-qualified id */
  id: EntityId;
  kind: G['kind'];
  geometry: G;
  /** Starts at 1, incremented by every mutation */
  version: number;
  createdBy: AgentId;
  /** Epoch milliseconds */
  createdAt: number;
  modifiedAt: number;
  /** Entities this one is derived from or belongs to */
  parents: EntityId[];
}

/**
 * Degrees of freedom contributed by an entity
 */
export function entityDof(geometry: EntityGeometry): number {
  switch (geometry.kind) {
    case 'point':
      return geometry.z === undefined ? 2 : 3;
    case 'line':
      return 4;
    case 'circle':
      return 3;
    case 'arc':
      return 5;
    case 'sketch':
    case 'solid':
      return 0;
  }
}

/**
 * Narrow an entity by geometry kind
 */
export function hasKind<K extends EntityKind>(
  entity: Entity,
  kind: K
): entity is Entity<GeometryOf<K>> {
  return entity.geometry.kind === kind;
}

export function isGeometricKind(kind: EntityKind): kind is GeometricKind {
  return kind === 'point' || kind === 'line' || kind === 'circle' || kind === 'arc';
}

/**
 * Circles and arcs
 */
export function isCurved(
  geometry: EntityGeometry
): geometry is CircleGeometry | ArcGeometry {
  return geometry.kind === 'circle' || geometry.kind === 'arc';
}

/**
 * Compare the modelled content of two entity revisions, ignoring version and
 * timestamps. Used by merge to decide whether two branches made the same
 * edit.
 */
export function sameEntityContent(a: Entity | undefined, b: Entity | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  return (
    a.kind === b.kind &&
    sameGeometry(a.geometry, b.geometry) &&
    a.parents.length === b.parents.length &&
    a.parents.every((p, i) => p === b.parents[i])
  );
}

/**
 * Structural equality of geometry values
 */
export function sameGeometry(a: EntityGeometry, b: EntityGeometry): boolean {
  return sameValue(a, b);
}

/**
 * Structural equality of plain data, ignoring key order and undefined fields
 */
export function sameValue(a: unknown, b: unknown): boolean {
  return canonicalJson(a) === canonicalJson(b);
}

function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(',')}}`;
  }
  return JSON.stringify(value);
}
