/**
 * ID Allocator
 *
 * Session-scoped allocation of entity, constraint, workspace and operation
 * ids. Operation sequence numbers are shared by every workspace in a session,
 * which is what lets a divergence point be compared against another
 * workspace's log.
 *
 * Each CadSession owns an allocator unless one is passed in.
 */

import type { ConstraintId, EntityId, OperationId, WorkspaceId } from './types.js';
import { operationIdForSeq } from './types.js';

// ============================================================================
// IdAllocator Class
// ============================================================================

/**
 * Allocator for session ids
 *
 * Each instance maintains its own counters, allowing isolated id spaces in
 * tests or parallel sessions.
 */
export class IdAllocator {
  private _nextEntity = 1;
  private _nextConstraint = 1;
  private _nextWorkspace = 1;
  private _nextSeq = 1;

  /**
   * Allocate an entity id qualified by the workspace that creates it
   */
  allocateEntityId(workspaceId: WorkspaceId, kind: string): EntityId {
    return `${workspaceId}:${kind}_${this._nextEntity++}` as EntityId;
  }

  allocateConstraintId(): ConstraintId {
    return `c_${this._nextConstraint++}` as ConstraintId;
  }

  allocateWorkspaceId(): WorkspaceId {
    return `ws_${this._nextWorkspace++}` as WorkspaceId;
  }

  /**
   * Allocate the next operation sequence number and its id
   */
  allocateOperation(): { id: OperationId; seq: number } {
    const seq = this._nextSeq++;
    return { id: operationIdForSeq(seq), seq };
  }

  /**
   * Reset all counters
   */
  reset(): void {
    this._nextEntity = 1;
    this._nextConstraint = 1;
    this._nextWorkspace = 1;
    this._nextSeq = 1;
  }

  /**
   * Get current counter values (for debugging/testing)
   */
  getState(): { entity: number; constraint: number; workspace: number; seq: number } {
    return {
      entity: this._nextEntity,
      constraint: this._nextConstraint,
      workspace: this._nextWorkspace,
      seq: this._nextSeq,
    };
  }
}
