/**
 * EntityStore - canonical entity storage
 *
 * Holds every entity revision of a session, keyed by workspace. Reads take a
 * lineage (see LineageTable) so a branch sees its own edits layered over its
 * base as of the divergence point. Parent/child relations are ids plus a
 * reverse index; an entity's lifetime belongs to its workspace's table.
 */

import type { AgentId, EntityId, WorkspaceId } from '../ids/types.js';
import type { Entity, EntityGeometry, EntityKind } from './types.js';
import type { Lineage } from './LineageTable.js';
import { LineageTable } from './LineageTable.js';
import { EntityNotFoundError } from '../errors.js';

/**
 * Before/after pair recorded for every entity write. `null` on one side
 * means the entity did not exist (create) or was removed (delete).
 */
export interface EntityChange {
  entityId: EntityId;
  before: Entity | null;
  after: Entity | null;
}

/**
 * Filters accepted by EntityStore.list
 */
export interface EntityFilter {
  kind?: EntityKind;
  /** Only entities naming this parent */
  parent?: EntityId;
}

export class EntityStore {
  private readonly table = new LineageTable<EntityId, Entity>();
  /** parent id -> ids that named it as a parent in some revision */
  private readonly childIndex = new Map<EntityId, Set<EntityId>>();

  /**
   * Visible revision of an entity, or undefined
   */
  get(lineage: Lineage, id: EntityId): Entity | undefined {
    return this.table.resolve(lineage, id);
  }

  /**
   * Visible revision of an entity
   * @throws EntityNotFoundError
   */
  require(lineage: Lineage, id: EntityId): Entity {
    const entity = this.get(lineage, id);
    if (!entity) {
      throw new EntityNotFoundError(id, lineage[0].workspaceId);
    }
    return entity;
  }

  /**
   * All visible entities, ordered by creation time then id
   */
  list(lineage: Lineage, filter: EntityFilter = {}): Entity[] {
    return this.table
      .values(lineage)
      .filter((e) => filter.kind === undefined || e.kind === filter.kind)
      .filter((e) => filter.parent === undefined || e.parents.includes(filter.parent))
      .sort((a, b) => a.createdAt - b.createdAt || compareIds(a.id, b.id));
  }

  /**
   * Ids with any revision along the lineage, including deleted ones
   */
  ids(lineage: Lineage): Set<EntityId> {
    return this.table.keys(lineage);
  }

  count(lineage: Lineage): number {
    return this.table.values(lineage).length;
  }

  /**
   * Visible entities that name `id` as a parent
   */
  childrenOf(lineage: Lineage, id: EntityId): Entity[] {
    const candidates = this.childIndex.get(id);
    if (!candidates) return [];
    const children: Entity[] = [];
    for (const childId of candidates) {
      const child = this.get(lineage, childId);
      if (child && child.parents.includes(id)) children.push(child);
    }
    return children;
  }

  /**
   * Write the `after` side of each change as a revision of `workspaceId`
   */
  commit(workspaceId: WorkspaceId, seq: number, changes: readonly EntityChange[]): void {
    for (const change of changes) {
      this.table.write(workspaceId, change.entityId, seq, change.after);
      if (change.after) {
        for (const parent of change.after.parents) {
          let children = this.childIndex.get(parent);
          if (!children) {
            children = new Set();
            this.childIndex.set(parent, children);
          }
          children.add(change.entityId);
        }
      }
    }
  }
}

// ============================================================================
// Revision builders
// ============================================================================

/**
 * First revision of a new entity
 */
export function newEntity<G extends EntityGeometry>(
  id: EntityId,
  geometry: G,
  createdBy: AgentId,
  now: number,
  parents: EntityId[] = []
): Entity<G> {
  return {
    id,
    kind: geometry.kind,
    geometry,
    version: 1,
    createdBy,
    createdAt: now,
    modifiedAt: now,
    parents: [...parents],
  };
}

/**
 * Next revision of an existing entity with new geometry
 */
export function reviseEntity(entity: Entity, geometry: EntityGeometry, now: number): Entity {
  return {
    ...entity,
    geometry,
    version: entity.version + 1,
    modifiedAt: now,
  };
}

/**
 * Order ids so that `main:point_2` sorts before `main:point_10`
 */
export function compareIds(a: string, b: string): number {
  return a.localeCompare(b, 'en', { numeric: true });
}
