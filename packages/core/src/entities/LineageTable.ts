/**
 * LineageTable - append-only, per-workspace revision storage
 *
 * Each workspace owns its own revisions. A branch does not copy its base:
 * a lookup walks the lineage, checking the workspace's own revisions first
 * and falling back to the base's revisions as they stood at the divergence
 * point. Deletions are tombstone revisions, so a branch can hide an entity
 * its base still has.
 */

import type { WorkspaceId } from '../ids/types.js';
import { InternalSolverError } from '../errors.js';

/**
 * One revision of a value. `value === null` marks a deletion.
 */
export interface Revision<V> {
  seq: number;
  value: V | null;
}

/**
 * One step of a lineage walk: the workspace to read, and the highest
 * operation sequence visible from it.
 */
export interface LineageLink {
  workspaceId: WorkspaceId;
  bound: number;
}

/**
 * Ordered lineage, nearest workspace first
 */
export type Lineage = readonly LineageLink[];

export class LineageTable<K, V> {
  private readonly tables = new Map<WorkspaceId, Map<K, Revision<V>[]>>();

  /**
   * Append a revision for `key` in `workspaceId`
   */
  write(workspaceId: WorkspaceId, key: K, seq: number, value: V | null): void {
    let table = this.tables.get(workspaceId);
    if (!table) {
      table = new Map();
      this.tables.set(workspaceId, table);
    }
    let revisions = table.get(key);
    if (!revisions) {
      revisions = [];
      table.set(key, revisions);
    }
    const last = revisions[revisions.length - 1];
    if (last && last.seq > seq) {
      throw new InternalSolverError(`Revision ${seq} written after ${last.seq}`, {
        workspaceId,
        seq,
        lastSeq: last.seq,
      });
    }
    revisions.push({ seq, value });
  }

  /**
   * Latest local revision at or below `bound`, without walking the lineage
   */
  latest(workspaceId: WorkspaceId, key: K, bound = Infinity): Revision<V> | undefined {
    const revisions = this.tables.get(workspaceId)?.get(key);
    if (!revisions) return undefined;
    for (let i = revisions.length - 1; i >= 0; i--) {
      if (revisions[i].seq <= bound) return revisions[i];
    }
    return undefined;
  }

  /**
   * Resolve the visible value of `key` along a lineage
   */
  resolve(lineage: Lineage, key: K): V | undefined {
    for (const link of lineage) {
      const revision = this.latest(link.workspaceId, key, link.bound);
      if (revision) return revision.value ?? undefined;
    }
    return undefined;
  }

  /**
   * All keys with any revision anywhere along the lineage
   */
  keys(lineage: Lineage): Set<K> {
    const keys = new Set<K>();
    for (const link of lineage) {
      const table = this.tables.get(link.workspaceId);
      if (!table) continue;
      for (const [key, revisions] of table) {
        if (revisions[0].seq <= link.bound) keys.add(key);
      }
    }
    return keys;
  }

  /**
   * All visible values along a lineage
   */
  values(lineage: Lineage): V[] {
    const values: V[] = [];
    for (const key of this.keys(lineage)) {
      const value = this.resolve(lineage, key);
      if (value !== undefined) values.push(value);
    }
    return values;
  }

  /**
   * Keys written locally in a workspace
   */
  localKeys(workspaceId: WorkspaceId): K[] {
    return [...(this.tables.get(workspaceId)?.keys() ?? [])];
  }
}
