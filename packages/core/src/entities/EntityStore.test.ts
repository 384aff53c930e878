/**
 * Tests for EntityStore
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ROOT_WORKSPACE_ID, asAgentId, asEntityId } from '../ids/types.js';
import { EntityNotFoundError } from '../errors.js';
import type { Lineage } from './LineageTable.js';
import { EntityStore, compareIds, newEntity, reviseEntity } from './EntityStore.js';
import { entityDof, sameEntityContent } from './types.js';

const agent = asAgentId('agent-1');
const lineage: Lineage = [{ workspaceId: ROOT_WORKSPACE_ID, bound: Number.POSITIVE_INFINITY }];

describe('EntityStore', () => {
  let store: EntityStore;

  beforeEach(() => {
    store = new EntityStore();
  });

  it('should store and read back an entity', () => {
    const p = newEntity(asEntityId('main:point_1'), { kind: 'point', x: 1, y: 2 }, agent, 100);
    store.commit(ROOT_WORKSPACE_ID, 1, [{ entityId: p.id, before: null, after: p }]);

    expect(store.get(lineage, p.id)).toEqual(p);
    expect(store.count(lineage)).toBe(1);
  });

  it('should throw EntityNotFoundError for unknown ids', () => {
    expect(() => store.require(lineage, asEntityId('main:point_1'))).toThrow(
      "Entity 'main:point_1' not found in workspace 'main'"
    );
    expect(() => store.require(lineage, asEntityId('main:point_1'))).toThrow(EntityNotFoundError);
  });

  it('should keep deleted ids visible to ids() only', () => {
    const p = newEntity(asEntityId('main:point_1'), { kind: 'point', x: 0, y: 0 }, agent, 0);
    store.commit(ROOT_WORKSPACE_ID, 1, [{ entityId: p.id, before: null, after: p }]);
    store.commit(ROOT_WORKSPACE_ID, 2, [{ entityId: p.id, before: p, after: null }]);

    expect(store.get(lineage, p.id)).toBeUndefined();
    expect(store.list(lineage)).toEqual([]);
    expect(store.ids(lineage).has(p.id)).toBe(true);
  });

  it('should filter by kind and parent', () => {
    const sketch = newEntity(asEntityId('main:sketch_1'), { kind: 'sketch', plane: 'xy' }, agent, 1);
    const inSketch = newEntity(
      asEntityId('main:point_2'),
      { kind: 'point', x: 0, y: 0 },
      agent,
      2,
      [sketch.id]
    );
    const loose = newEntity(asEntityId('main:point_3'), { kind: 'point', x: 1, y: 1 }, agent, 3);
    store.commit(ROOT_WORKSPACE_ID, 1, [
      { entityId: sketch.id, before: null, after: sketch },
      { entityId: inSketch.id, before: null, after: inSketch },
      { entityId: loose.id, before: null, after: loose },
    ]);

    expect(store.list(lineage, { kind: 'point' }).map((e) => e.id)).toEqual([
      'main:point_2',
      'main:point_3',
    ]);
    expect(store.list(lineage, { parent: sketch.id }).map((e) => e.id)).toEqual(['main:point_2']);
    expect(store.childrenOf(lineage, sketch.id).map((e) => e.id)).toEqual(['main:point_2']);
  });

  it('should bump the version on revision', () => {
    const p = newEntity(asEntityId('main:point_1'), { kind: 'point', x: 0, y: 0 }, agent, 10);
    const next = reviseEntity(p, { kind: 'point', x: 5, y: 0 }, 20);

    expect(next.version).toBe(2);
    expect(next.createdAt).toBe(10);
    expect(next.modifiedAt).toBe(20);
    expect(sameEntityContent(p, next)).toBe(false);
    expect(sameEntityContent(p, { ...p, version: 7, modifiedAt: 99 })).toBe(true);
  });
});

describe('entityDof', () => {
  it('should give each kind its degrees of freedom', () => {
    expect(entityDof({ kind: 'point', x: 0, y: 0 })).toBe(2);
    expect(entityDof({ kind: 'point', x: 0, y: 0, z: 0 })).toBe(3);
    expect(entityDof({ kind: 'line', start: { x: 0, y: 0 }, end: { x: 1, y: 0 } })).toBe(4);
    expect(entityDof({ kind: 'circle', center: { x: 0, y: 0 }, radius: 1 })).toBe(3);
    expect(
      entityDof({ kind: 'arc', center: { x: 0, y: 0 }, radius: 1, startAngle: 0, endAngle: 1 })
    ).toBe(5);
    expect(entityDof({ kind: 'sketch', plane: 'xy' })).toBe(0);
  });
});

describe('compareIds', () => {
  it('should order numeric suffixes numerically', () => {
    expect(['main:point_10', 'main:point_2'].sort(compareIds)).toEqual([
      'main:point_2',
      'main:point_10',
    ]);
  });
});
