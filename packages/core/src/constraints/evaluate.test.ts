/**
 * Tests for constraint measurement
 */

import { describe, it, expect } from 'vitest';
import type { Entity, EntityGeometry } from '../entities/types.js';
import { newEntity } from '../entities/EntityStore.js';
import { AnalyticGeometryEngine } from '../geometry/GeometryEngine.js';
import { asAgentId, asConstraintId, asEntityId } from '../ids/types.js';
import type { Constraint, ConstraintSpec } from './types.js';
import { isWithinTolerance, measureConstraint } from './evaluate.js';

const engine = new AnalyticGeometryEngine();
const agent = asAgentId('agent-1');

function entity(id: string, geometry: EntityGeometry): Entity {
  return newEntity(asEntityId(id), geometry, agent, 0);
}

function constraintOn(spec: ConstraintSpec, entities: Entity[]): Constraint {
  return {
    ...spec,
    id: asConstraintId('c_1'),
    entities: entities.map((e) => e.id),
    tolerance: 0.01,
    createdBy: agent,
    createdAt: 0,
    seq: 1,
  };
}

function measure(spec: ConstraintSpec, entities: Entity[]) {
  return measureConstraint(constraintOn(spec, entities), entities, engine);
}

const horizontal = entity('l1', { kind: 'line', start: { x: 0, y: 0 }, end: { x: 10, y: 0 } });
const vertical = entity('l2', { kind: 'line', start: { x: 5, y: -5 }, end: { x: 5, y: 5 } });
const reversed = entity('l3', { kind: 'line', start: { x: 10, y: 2 }, end: { x: 0, y: 2 } });

describe('measureConstraint', () => {
  it('should measure the distance between points', () => {
    const p1 = entity('p1', { kind: 'point', x: 0, y: 0 });
    const p2 = entity('p2', { kind: 'point', x: 3, y: 4 });
    expect(measure({ kind: 'distance', distance: 5 }, [p1, p2])).toEqual({ expected: 5, actual: 5 });
  });

  it('should include z for 3D points', () => {
    const p1 = entity('p1', { kind: 'point', x: 0, y: 0, z: 0 });
    const p2 = entity('p2', { kind: 'point', x: 0, y: 3, z: 4 });
    expect(measure({ kind: 'coincident' }, [p1, p2]).actual).toBe(5);
  });

  it('should measure point to line distance against the infinite line', () => {
    const p = entity('p1', { kind: 'point', x: 20, y: 3 });
    expect(measure({ kind: 'distance', distance: 3 }, [p, horizontal]).actual).toBe(3);
  });

  it('should treat reversed lines as parallel', () => {
    const m = measure({ kind: 'parallel' }, [horizontal, reversed]);
    expect(m.expected).toBe(0);
    expect(m.actual).toBe(0);
  });

  it('should measure perpendicular lines', () => {
    const m = measure({ kind: 'perpendicular' }, [horizontal, vertical]);
    expect(m.expected).toBeCloseTo(Math.PI / 2);
    expect(isWithinTolerance(m, 0.01)).toBe(true);
  });

  it('should report the unsigned angle between line directions', () => {
    expect(measure({ kind: 'angle', angle: Math.PI }, [horizontal, reversed]).actual).toBe(Math.PI);
  });

  it('should measure a circle radius', () => {
    const circle = entity('c1', { kind: 'circle', center: { x: 0, y: 0 }, radius: 4 });
    expect(measure({ kind: 'radius', radius: 5 }, [circle])).toEqual({ expected: 5, actual: 4 });
  });

  it('should compare line to circle tangency against the radius', () => {
    const circle = entity('c1', { kind: 'circle', center: { x: 5, y: 2 }, radius: 2 });
    expect(measure({ kind: 'tangent' }, [horizontal, circle])).toEqual({ expected: 2, actual: 2 });
  });

  it('should pick external or internal tangency for two circles', () => {
    const a = entity('c1', { kind: 'circle', center: { x: 0, y: 0 }, radius: 3 });
    const outside = entity('c2', { kind: 'circle', center: { x: 5, y: 0 }, radius: 2 });
    const inside = entity('c3', { kind: 'circle', center: { x: 1, y: 0 }, radius: 2 });

    expect(measure({ kind: 'tangent' }, [a, outside])).toEqual({ expected: 5, actual: 5 });
    expect(measure({ kind: 'tangent' }, [a, inside])).toEqual({ expected: 1, actual: 1 });
  });
});

describe('isWithinTolerance', () => {
  it('should accept values inside the tolerance', () => {
    expect(isWithinTolerance({ expected: 5, actual: 5.005 }, 0.01)).toBe(true);
    expect(isWithinTolerance({ expected: 5, actual: 5.02 }, 0.01)).toBe(false);
  });

  it('should reject non-finite measurements', () => {
    expect(isWithinTolerance({ expected: 0, actual: Number.NaN }, 0.01)).toBe(false);
  });
});
