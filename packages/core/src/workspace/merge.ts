/**
 * Three-way merge
 *
 * Plans a merge of a source workspace into a target, keyed by entity id.
 * `base` is the source's view at its divergence point, `source` and `target`
 * are the two heads. Planning reads only; the caller verifies the plan
 * against the target's constraint graph and records it as one operation.
 *
 * Per entity:
 * - unchanged in source: keep target
 * - changed only in source: take the source revision (add, modify or delete)
 * - changed in both to the same content: no-op
 * - changed in both, disjoint geometry fields: combine field by field
 * - otherwise: conflict (`both_modified`, or `delete_modified` when one side
 *   deleted it)
 *
 * Constraints are immutable keyed records, so they merge without conflicts:
 * added or removed in the source since divergence carries over. Constraints
 * left referencing an entity the merged target no longer has are removed,
 * the same cascade a delete performs.
 */

import type { ConstraintId, EntityId } from '../ids/types.js';
import type { Entity, EntityGeometry } from '../entities/types.js';
import { sameEntityContent, sameValue } from '../entities/types.js';
import type { EntityChange, EntityStore } from '../entities/EntityStore.js';
import { compareIds } from '../entities/EntityStore.js';
import { validateGeometry } from '../entities/validate.js';
import type { ConstraintGraph } from '../constraints/ConstraintGraph.js';
import type { ConstraintChange } from '../constraints/types.js';
import type { NumericContext } from '../num/tolerance.js';
import { InvalidParameterError } from '../errors.js';
import type {
  ConflictResolution,
  MergeConflict,
  MergeRequest,
  ResolutionOption,
  Workspace,
} from './types.js';
import { RESOLUTION_OPTIONS } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface MergeInputs {
  entities: EntityStore;
  constraints: ConstraintGraph;
  ctx: NumericContext;
  now: number;
}

export interface MergePlan {
  changes: EntityChange[];
  constraintChanges: ConstraintChange[];
  entitiesAdded: EntityId[];
  entitiesModified: EntityId[];
  entitiesDeleted: EntityId[];
  constraintsAdded: ConstraintId[];
  constraintsRemoved: ConstraintId[];
  /** Added in the source on entities the merged target no longer has */
  constraintsSkipped: ConstraintId[];
  /** Every conflict found, resolved or not */
  conflicts: MergeConflict[];
  /** Conflicts that still need a resolution */
  unresolved: MergeConflict[];
  resolved: { entityId: EntityId; choice: ResolutionOption }[];
}

/**
 * Outcome for one entity: the revision the target should end up with
 * (`null` = deleted), or a conflict
 */
type EntityOutcome =
  | { kind: 'keep' }
  | { kind: 'take'; entity: Entity | null }
  | { kind: 'conflict'; conflict: MergeConflict };

// ============================================================================
// Planning
// ============================================================================

/**
 * Plan a merge of `source` into `target`
 *
 * @throws InvalidParameterError for a resolution naming an entity that has
 *   no conflict, or a manual geometry that does not fit the entity
 */
export function planMerge(
  source: Workspace,
  target: Workspace,
  request: Pick<MergeRequest, 'strategy' | 'resolutions'>,
  inputs: MergeInputs
): MergePlan {
  const { entities, now } = inputs;
  const baseLineage = source.lineage.slice(1);
  const sourceLineage = source.lineage;
  const targetLineage = target.lineage;

  const ids = new Set([...entities.ids(sourceLineage), ...entities.ids(targetLineage)]);
  const after = new Map<EntityId, Entity | null>();
  const conflicts: MergeConflict[] = [];
  const unresolved: MergeConflict[] = [];
  const resolved: MergePlan['resolved'] = [];
  const resolutions = request.resolutions ?? {};

  for (const id of [...ids].sort(compareIds)) {
    const b = entities.get(baseLineage, id);
    const s = entities.get(sourceLineage, id);
    const t = entities.get(targetLineage, id);
    const outcome = classify(id, b, s, t, now);

    if (outcome.kind === 'take') {
      after.set(id, outcome.entity);
      continue;
    }
    if (outcome.kind === 'keep') continue;

    const { conflict } = outcome;
    conflicts.push(conflict);
    const resolution = pickResolution(request.strategy, resolutions[id]);
    if (!resolution) {
      unresolved.push(conflict);
      continue;
    }
    resolved.push({ entityId: id, choice: resolution.choice });
    const chosen = resolve(conflict, resolution, inputs.ctx, now);
    if (chosen !== undefined) after.set(id, chosen);
  }

  const conflictIds = new Set<string>(conflicts.map((c) => c.entityId));
  for (const id of Object.keys(resolutions)) {
    if (!conflictIds.has(id)) {
      throw new InvalidParameterError(`No merge conflict for entity '${id}'`, {
        field: 'resolutions',
        providedValue: id,
      });
    }
  }

  // Entity changes relative to the target head
  const changes: EntityChange[] = [];
  const entitiesAdded: EntityId[] = [];
  const entitiesModified: EntityId[] = [];
  const entitiesDeleted: EntityId[] = [];

  for (const [id, next] of after) {
    const current = entities.get(targetLineage, id) ?? null;
    if (sameEntityContent(current ?? undefined, next ?? undefined)) continue;
    changes.push({ entityId: id, before: current, after: next });
    if (!current) entitiesAdded.push(id);
    else if (!next) entitiesDeleted.push(id);
    else entitiesModified.push(id);
  }

  const exists = (id: EntityId): boolean => {
    const next = after.get(id);
    return next === undefined ? entities.get(targetLineage, id) !== undefined : next !== null;
  };

  const constraintPlan = planConstraints(source, target, inputs, exists);

  return {
    changes,
    ...constraintPlan,
    entitiesAdded,
    entitiesModified,
    entitiesDeleted,
    conflicts,
    unresolved,
    resolved,
  };
}

function classify(
  id: EntityId,
  b: Entity | undefined,
  s: Entity | undefined,
  t: Entity | undefined,
  now: number
): EntityOutcome {
  const sourceChanged = !sameEntityContent(b, s);
  const targetChanged = !sameEntityContent(b, t);

  if (!sourceChanged) return { kind: 'keep' };
  if (!targetChanged) return { kind: 'take', entity: s ? adopt(s, t, now) : null };
  if (sameEntityContent(s, t)) return { kind: 'keep' };

  if (b && s && t && s.kind === t.kind) {
    const combined = combine(b, s, t, now);
    if (combined.fields.length === 0) {
      return { kind: 'take', entity: combined.entity };
    }
    return { kind: 'conflict', conflict: conflictFor(id, 'both_modified', b, s, t, combined.fields) };
  }

  const conflictType = s && t ? 'both_modified' : 'delete_modified';
  return { kind: 'conflict', conflict: conflictFor(id, conflictType, b, s, t, []) };
}

function conflictFor(
  entityId: EntityId,
  conflictType: MergeConflict['conflictType'],
  base: Entity | undefined,
  source: Entity | undefined,
  target: Entity | undefined,
  fields: string[]
): MergeConflict {
  return {
    entityId,
    conflictType,
    base: base ?? null,
    source: source ?? null,
    target: target ?? null,
    fields,
    resolutionOptions: [...RESOLUTION_OPTIONS],
  };
}

/**
 * Source revision as a revision of the target, keeping versions increasing
 */
function adopt(s: Entity, t: Entity | undefined, now: number): Entity {
  if (!t || s.version > t.version) return s;
  return { ...s, version: t.version + 1, modifiedAt: now };
}

/**
 * Field-level merge of two revisions of one entity
 */
function combine(
  b: Entity,
  s: Entity,
  t: Entity,
  now: number
): { entity: Entity; fields: string[] } {
  const geometry = mergeFields(b.geometry, s.geometry, t.geometry);
  const fields = [...geometry.conflicts];

  let parents = t.parents;
  if (!sameValue(s.parents, b.parents)) {
    if (sameValue(t.parents, b.parents)) parents = s.parents;
    else if (!sameValue(s.parents, t.parents)) fields.push('parents');
  }

  return {
    entity: {
      ...t,
      geometry: geometry.merged,
      parents: [...parents],
      version: Math.max(s.version, t.version) + 1,
      modifiedAt: now,
    },
    fields,
  };
}

function mergeFields<G extends EntityGeometry>(
  base: G,
  source: G,
  target: G
): { merged: G; conflicts: string[] } {
  const merged: G = { ...target };
  const conflicts: string[] = [];
  const all: G = { ...base, ...source, ...target };

  for (const key in all) {
    if (sameValue(source[key], base[key])) continue;
    if (sameValue(target[key], base[key]) || sameValue(target[key], source[key])) {
      merged[key] = source[key];
      continue;
    }
    conflicts.push(key);
  }

  return { merged, conflicts };
}

// ============================================================================
// Resolutions
// ============================================================================

function pickResolution(
  strategy: MergeRequest['strategy'],
  explicit: ConflictResolution | undefined
): ConflictResolution | undefined {
  switch (strategy) {
    case 'auto':
      return undefined;
    case 'keep_source':
      return explicit ?? { choice: 'keep_source' };
    case 'keep_target':
      return explicit ?? { choice: 'keep_target' };
    case 'manual':
      return explicit;
  }
}

/**
 * The revision a resolution leaves in the target (`null` = deleted), or
 * undefined to keep the target as it is
 */
function resolve(
  conflict: MergeConflict,
  resolution: ConflictResolution,
  ctx: NumericContext,
  now: number
): Entity | null | undefined {
  const { source, target } = conflict;
  switch (resolution.choice) {
    case 'keep_target':
      return undefined;
    case 'keep_source':
      return source ? adopt(source, target ?? undefined, now) : null;
    case 'manual_merge': {
      const survivor = target ?? source;
      if (!survivor) return null;
      if (resolution.geometry.kind !== survivor.kind) {
        throw new InvalidParameterError(
          `Manual merge for '${conflict.entityId}' must keep kind '${survivor.kind}'`,
          { field: 'resolutions', entityId: conflict.entityId, providedValue: resolution.geometry.kind }
        );
      }
      validateGeometry(resolution.geometry, ctx);
      return {
        ...survivor,
        geometry: resolution.geometry,
        version: Math.max(source?.version ?? 0, target?.version ?? 0) + 1,
        modifiedAt: now,
      };
    }
  }
}

// ============================================================================
// Constraints
// ============================================================================

function planConstraints(
  source: Workspace,
  target: Workspace,
  inputs: MergeInputs,
  exists: (id: EntityId) => boolean
): Pick<
  MergePlan,
  'constraintChanges' | 'constraintsAdded' | 'constraintsRemoved' | 'constraintsSkipped'
> {
  const { constraints } = inputs;
  const base = constraints.snapshot(source.lineage.slice(1));
  const fromSource = constraints.snapshot(source.lineage);
  const inTarget = constraints.snapshot(target.lineage);

  const constraintChanges: ConstraintChange[] = [];
  const constraintsAdded: ConstraintId[] = [];
  const constraintsRemoved: ConstraintId[] = [];
  const constraintsSkipped: ConstraintId[] = [];
  const removed = new Set<ConstraintId>();

  const ids = new Set([...base.keys(), ...fromSource.keys()]);
  for (const id of [...ids].sort(compareIds)) {
    const b = base.get(id);
    const s = fromSource.get(id);
    const t = inTarget.get(id);

    if (!b && s && !t) {
      if (s.entities.every(exists)) {
        constraintChanges.push({ constraintId: id, before: null, after: s });
        constraintsAdded.push(id);
      } else {
        constraintsSkipped.push(id);
      }
    } else if (b && !s && t) {
      constraintChanges.push({ constraintId: id, before: t, after: null });
      constraintsRemoved.push(id);
      removed.add(id);
    }
  }

  // Cascade: target constraints on entities the merge deletes
  for (const t of inTarget.values()) {
    if (removed.has(t.id) || t.entities.every(exists)) continue;
    constraintChanges.push({ constraintId: t.id, before: t, after: null });
    constraintsRemoved.push(t.id);
  }

  return { constraintChanges, constraintsAdded, constraintsRemoved, constraintsSkipped };
}
