/**
 * Workspace and merge types
 */

import type { AgentId, ConstraintId, EntityId, OperationId, WorkspaceId } from '../ids/types.js';
import type { Entity, EntityGeometry } from '../entities/types.js';
import type { Lineage } from '../entities/LineageTable.js';
import type { ConstraintEvaluation } from '../constraints/types.js';

// ============================================================================
// Workspace
// ============================================================================

export type BranchStatus = 'clean' | 'modified' | 'merged';

export interface Workspace {
  id: WorkspaceId;
  name: string;
  /** null for the root workspace */
  baseId: WorkspaceId | null;
  /** Last operation shared with the base, null if the base had none */
  divergencePoint: OperationId | null;
  /** Sequence number of the divergence point, 0 when there is none */
  divergenceSeq: number;
  /** Read path: this workspace first, then its bases as of divergence */
  lineage: Lineage;
  merged: boolean;
  mergedInto: WorkspaceId | null;
  deleted: boolean;
  createdBy: AgentId;
  createdAt: number;
}

export interface WorkspaceStatus {
  workspaceId: WorkspaceId;
  name: string;
  baseId: WorkspaceId | null;
  branchStatus: BranchStatus;
  canMerge: boolean;
  divergencePoint: OperationId | null;
  head: OperationId | null;
  entityCount: number;
  constraintCount: number;
  /** Local operations since the divergence point */
  operationCount: number;
}

// ============================================================================
// Merge
// ============================================================================

/**
 * - auto: abort on any conflict
 * - keep_source / keep_target: resolve every conflict that way
 * - manual: every conflict needs an explicit resolution
 */
export type MergeStrategy = 'auto' | 'keep_source' | 'keep_target' | 'manual';

export const MERGE_STRATEGIES: readonly MergeStrategy[] = [
  'auto',
  'keep_source',
  'keep_target',
  'manual',
];

export type ConflictKind = 'both_modified' | 'delete_modified';

export type ResolutionOption = 'keep_source' | 'keep_target' | 'manual_merge';

export const RESOLUTION_OPTIONS: readonly ResolutionOption[] = [
  'keep_source',
  'keep_target',
  'manual_merge',
];

export interface MergeConflict {
  entityId: EntityId;
  conflictType: ConflictKind;
  base: Entity | null;
  source: Entity | null;
  target: Entity | null;
  /** Geometry fields (or `parents`) both sides changed differently */
  fields: string[];
  resolutionOptions: ResolutionOption[];
}

export type ConflictResolution =
  | { choice: 'keep_source' }
  | { choice: 'keep_target' }
  | { choice: 'manual_merge'; geometry: EntityGeometry };

export interface MergeRequest {
  sourceId: WorkspaceId;
  targetId: WorkspaceId;
  strategy: MergeStrategy;
  /** Per-entity resolutions keyed by entity id; take precedence over a keep_* strategy */
  resolutions?: Record<string, ConflictResolution>;
}

export interface MergeResult {
  sourceId: WorkspaceId;
  targetId: WorkspaceId;
  operationId: OperationId;
  entitiesAdded: EntityId[];
  entitiesModified: EntityId[];
  entitiesDeleted: EntityId[];
  constraintsAdded: ConstraintId[];
  constraintsRemoved: ConstraintId[];
  /** Added in the source on entities the merged target no longer has */
  constraintsSkipped: ConstraintId[];
  /** Unresolved conflicts; always empty on success */
  conflicts: MergeConflict[];
  /** Conflicts settled by the strategy or an explicit resolution */
  resolved: { entityId: EntityId; choice: ResolutionOption }[];
  /** Evaluations of every constraint in the affected components */
  reevaluated: ConstraintEvaluation[];
}
