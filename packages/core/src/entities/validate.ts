/**
 * Geometry validation
 *
 * Every number an entity carries must be finite and inside the coordinate
 * limit; radii and extrude distances must be usable; line endpoints must be
 * distinct. Checked on create and on every update.
 */

import type { NumericContext } from '../num/tolerance.js';
import { inRange } from '../num/tolerance.js';
import { InvalidParameterError } from '../errors.js';
import type { EntityGeometry, XY } from './types.js';
import { distanceXY } from '../geometry/vec.js';

function fail(field: string, value: unknown, message: string): never {
  throw new InvalidParameterError(message, {
    field,
    providedValue: value,
  });
}

function checkNumber(field: string, value: number, ctx: NumericContext): void {
  if (!inRange(value, ctx)) {
    fail(field, value, `${field} must be finite and within ±${ctx.coordinateLimit}`);
  }
}

function checkXY(field: string, value: XY, ctx: NumericContext): void {
  checkNumber(`${field}.x`, value.x, ctx);
  checkNumber(`${field}.y`, value.y, ctx);
}

/**
 * Throw InvalidParameterError if the geometry is unusable
 */
export function validateGeometry(geometry: EntityGeometry, ctx: NumericContext): void {
  switch (geometry.kind) {
    case 'point':
      checkNumber('x', geometry.x, ctx);
      checkNumber('y', geometry.y, ctx);
      if (geometry.z !== undefined) checkNumber('z', geometry.z, ctx);
      return;
    case 'line':
      checkXY('start', geometry.start, ctx);
      checkXY('end', geometry.end, ctx);
      if (distanceXY(geometry.start, geometry.end) <= ctx.tol.length) {
        fail('end', geometry.end, 'Line endpoints must be distinct');
      }
      return;
    case 'circle':
    case 'arc':
      checkXY('center', geometry.center, ctx);
      checkNumber('radius', geometry.radius, ctx);
      if (geometry.radius <= 0) {
        fail('radius', geometry.radius, 'radius must be positive');
      }
      if (geometry.kind === 'arc') {
        if (!Number.isFinite(geometry.startAngle)) {
          fail('startAngle', geometry.startAngle, 'startAngle must be finite');
        }
        if (!Number.isFinite(geometry.endAngle)) {
          fail('endAngle', geometry.endAngle, 'endAngle must be finite');
        }
      }
      return;
    case 'sketch':
      return;
    case 'solid':
      checkNumber('distance', geometry.distance, ctx);
      if (geometry.distance === 0) {
        fail('distance', geometry.distance, 'Extrude distance must be non-zero');
      }
      return;
  }
}
