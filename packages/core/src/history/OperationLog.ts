/**
 * OperationLog - append-only per-workspace record of mutations
 *
 * Every mutating call appends exactly one entry. Entries within a workspace
 * are strictly ordered by sequence number; entries of different workspaces
 * interleave in the shared sequence but carry no ordering guarantee until a
 * merge serialises them.
 *
 * Undo is best-effort: it appends an entry whose snapshots reverse the most
 * recent undoable entry. It does not restore constraint satisfaction if a
 * later operation depended on the undone state. Redo replays the most
 * recently undone entry; any other mutation clears the redo stack. A merge
 * is not undoable and clears both stacks of its target.
 */

import type { OperationId, WorkspaceId } from '../ids/types.js';
import { InternalSolverError } from '../errors.js';
import type { EntityChange } from '../entities/EntityStore.js';
import type { ConstraintChange } from '../constraints/types.js';
import type { OperationEntry, OperationPage } from './types.js';

export interface ListOptions {
  limit?: number;
  offset?: number;
}

export class OperationLog {
  private readonly logs = new Map<WorkspaceId, OperationEntry[]>();
  private readonly undoable = new Map<WorkspaceId, OperationEntry[]>();
  private readonly undone = new Map<WorkspaceId, OperationEntry[]>();

  /**
   * Append an entry and update the undo/redo stacks
   */
  append(entry: OperationEntry): void {
    const log = this.entriesOf(entry.workspaceId);
    const last = log[log.length - 1];
    if (last && last.seq >= entry.seq) {
      throw new InternalSolverError(`Operation ${entry.id} appended after ${last.id}`, {
        workspaceId: entry.workspaceId,
        seq: entry.seq,
        lastSeq: last.seq,
      });
    }
    log.push(entry);

    const undoable = stack(this.undoable, entry.workspaceId);
    const undone = stack(this.undone, entry.workspaceId);

    switch (entry.type) {
      case 'history.undo': {
        const reverted = undoable.pop();
        if (!reverted || reverted.id !== entry.reverts) {
          throw new InternalSolverError(`Undo ${entry.id} does not reverse the latest entry`, {
            workspaceId: entry.workspaceId,
            reverts: entry.reverts ?? null,
          });
        }
        undone.push(reverted);
        return;
      }
      case 'history.redo':
        undone.pop();
        undoable.push(entry);
        return;
      case 'workspace.merge':
        undoable.length = 0;
        undone.length = 0;
        return;
      default:
        undoable.push(entry);
        undone.length = 0;
    }
  }

  /**
   * All entries of a workspace, oldest first
   */
  entries(workspaceId: WorkspaceId): readonly OperationEntry[] {
    return this.logs.get(workspaceId) ?? [];
  }

  /**
   * Entries with a sequence number greater than `seq`
   */
  since(workspaceId: WorkspaceId, seq: number): OperationEntry[] {
    return this.entries(workspaceId).filter((e) => e.seq > seq);
  }

  last(workspaceId: WorkspaceId): OperationEntry | undefined {
    const log = this.entries(workspaceId);
    return log[log.length - 1];
  }

  head(workspaceId: WorkspaceId): OperationId | undefined {
    return this.last(workspaceId)?.id;
  }

  get(workspaceId: WorkspaceId, id: OperationId): OperationEntry | undefined {
    return this.entries(workspaceId).find((e) => e.id === id);
  }

  /**
   * A page of entries, most recent first
   */
  list(workspaceId: WorkspaceId, options: ListOptions = {}): OperationPage {
    const { limit = 50, offset = 0 } = options;
    const log = this.entries(workspaceId);
    const entries = [...log].reverse().slice(offset, offset + limit);
    return {
      entries,
      total: log.length,
      canUndo: this.nextUndo(workspaceId) !== undefined,
      canRedo: this.nextRedo(workspaceId) !== undefined,
    };
  }

  /**
   * Entry the next undo would reverse
   */
  nextUndo(workspaceId: WorkspaceId): OperationEntry | undefined {
    const undoable = this.undoable.get(workspaceId) ?? [];
    return undoable[undoable.length - 1];
  }

  /**
   * Entry the next redo would replay
   */
  nextRedo(workspaceId: WorkspaceId): OperationEntry | undefined {
    const undone = this.undone.get(workspaceId) ?? [];
    return undone[undone.length - 1];
  }

  private entriesOf(workspaceId: WorkspaceId): OperationEntry[] {
    return stack(this.logs, workspaceId);
  }
}

function stack(map: Map<WorkspaceId, OperationEntry[]>, workspaceId: WorkspaceId): OperationEntry[] {
  let entries = map.get(workspaceId);
  if (!entries) {
    entries = [];
    map.set(workspaceId, entries);
  }
  return entries;
}

/**
 * Snapshots that reverse an entry: before and after swapped, last change
 * first
 */
export function inverseChanges(entry: OperationEntry): {
  changes: EntityChange[];
  constraintChanges: ConstraintChange[];
} {
  return {
    changes: [...entry.changes]
      .reverse()
      .map((c) => ({ entityId: c.entityId, before: c.after, after: c.before })),
    constraintChanges: [...entry.constraintChanges]
      .reverse()
      .map((c) => ({ constraintId: c.constraintId, before: c.after, after: c.before })),
  };
}
