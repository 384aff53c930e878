/**
 * Tests for geometry validation
 */

import { describe, it, expect } from 'vitest';
import { createNumericContext } from '../num/tolerance.js';
import { InvalidParameterError } from '../errors.js';
import { validateGeometry } from './validate.js';

const ctx = createNumericContext();

describe('validateGeometry', () => {
  it('should accept ordinary geometry', () => {
    expect(() => validateGeometry({ kind: 'point', x: 1, y: -2, z: 3 }, ctx)).not.toThrow();
    expect(() =>
      validateGeometry({ kind: 'arc', center: { x: 0, y: 0 }, radius: 1, startAngle: 0, endAngle: 3 }, ctx)
    ).not.toThrow();
  });

  it('should reject non-finite coordinates', () => {
    expect(() => validateGeometry({ kind: 'point', x: Number.NaN, y: 0 }, ctx)).toThrow(
      InvalidParameterError
    );
  });

  it('should reject coordinates beyond the limit', () => {
    expect(() =>
      validateGeometry({ kind: 'circle', center: { x: 2e6, y: 0 }, radius: 1 }, ctx)
    ).toThrow('center.x must be finite and within ±1000000');
  });

  it('should reject a non-positive radius', () => {
    expect(() =>
      validateGeometry({ kind: 'circle', center: { x: 0, y: 0 }, radius: 0 }, ctx)
    ).toThrow('radius must be positive');
  });

  it('should reject a line with coincident endpoints', () => {
    expect(() =>
      validateGeometry({ kind: 'line', start: { x: 1, y: 1 }, end: { x: 1, y: 1.001 } }, ctx)
    ).toThrow('Line endpoints must be distinct');
  });

  it('should reject a zero extrusion', () => {
    expect(() => validateGeometry({ kind: 'solid', operation: 'extrude', distance: 0 }, ctx)).toThrow(
      'Extrude distance must be non-zero'
    );
  });

  it('should name the offending field', () => {
    try {
      validateGeometry({ kind: 'point', x: 0, y: Number.POSITIVE_INFINITY }, ctx);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidParameterError);
      if (err instanceof InvalidParameterError) {
        expect(err.details.field).toBe('y');
      }
    }
  });
});
