/**
 * Operation log entry types
 */

import type { AgentId, ConstraintId, EntityId, OperationId, WorkspaceId } from '../ids/types.js';
import type { EntityChange } from '../entities/EntityStore.js';
import type { ConstraintChange } from '../constraints/types.js';

export type OperationType =
  | 'entity.create'
  | 'entity.update'
  | 'entity.delete'
  | 'constraint.apply'
  | 'constraint.remove'
  | 'workspace.merge'
  | 'history.undo'
  | 'history.redo';

/**
 * One mutation, with before/after snapshots of everything it wrote
 */
export interface OperationEntry {
  id: OperationId;
  /** Session-wide sequence number; orders entries within a workspace */
  seq: number;
  workspaceId: WorkspaceId;
  type: OperationType;
  agentId: AgentId;
  timestamp: number;
  entityIds: EntityId[];
  constraintIds: ConstraintId[];
  changes: EntityChange[];
  constraintChanges: ConstraintChange[];
  /** The entry an undo reverses or a redo replays */
  reverts?: OperationId;
  /** Source workspace of a merge */
  mergedFrom?: WorkspaceId;
}

/**
 * A page of entries, most recent first
 */
export interface OperationPage {
  entries: OperationEntry[];
  total: number;
  canUndo: boolean;
  canRedo: boolean;
}
