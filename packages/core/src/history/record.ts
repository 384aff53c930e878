/**
 * Recording change sets
 *
 * Writes a batch of entity and constraint changes as one operation: one
 * sequence number, one log entry, then re-evaluation of the components the
 * batch touched. Validation happens before this point; nothing here throws
 * for user input.
 */

import type { AgentId, EntityId, WorkspaceId } from '../ids/types.js';
import type { IdAllocator } from '../ids/idAllocator.js';
import type { EntityChange, EntityStore } from '../entities/EntityStore.js';
import type { Lineage } from '../entities/LineageTable.js';
import type { ConstraintGraph } from '../constraints/ConstraintGraph.js';
import type { ConstraintChange, ConstraintEvaluation } from '../constraints/types.js';
import type { OperationLog } from './OperationLog.js';
import type { OperationEntry, OperationType } from './types.js';

export interface RecordDeps {
  entities: EntityStore;
  constraints: ConstraintGraph;
  log: OperationLog;
  allocator: IdAllocator;
  now: () => number;
}

export interface ChangeSet {
  lineage: Lineage;
  type: OperationType;
  agentId: AgentId;
  changes: EntityChange[];
  constraintChanges: ConstraintChange[];
  reverts?: OperationEntry['reverts'];
  mergedFrom?: WorkspaceId;
}

export interface Recorded {
  entry: OperationEntry;
  /** Constraints re-evaluated because the change set touched their component */
  evaluations: ConstraintEvaluation[];
}

/**
 * Commit a change set as a single operation
 */
export function recordChangeSet(deps: RecordDeps, set: ChangeSet): Recorded {
  const workspaceId = set.lineage[0].workspaceId;
  const { id, seq } = deps.allocator.allocateOperation();

  deps.entities.commit(workspaceId, seq, set.changes);
  deps.constraints.commit(set.lineage, seq, set.constraintChanges);

  const entry: OperationEntry = {
    id,
    seq,
    workspaceId,
    type: set.type,
    agentId: set.agentId,
    timestamp: deps.now(),
    entityIds: touchedEntities(set),
    constraintIds: set.constraintChanges.map((c) => c.constraintId),
    changes: set.changes,
    constraintChanges: set.constraintChanges,
    ...(set.reverts ? { reverts: set.reverts } : {}),
    ...(set.mergedFrom ? { mergedFrom: set.mergedFrom } : {}),
  };
  deps.log.append(entry);

  const seeds = new Set<EntityId>();
  for (const change of set.changes) {
    if (change.after) seeds.add(change.entityId);
  }
  for (const change of set.constraintChanges) {
    for (const entityId of (change.after ?? change.before)?.entities ?? []) {
      if (deps.entities.get(set.lineage, entityId)) seeds.add(entityId);
    }
  }

  return { entry, evaluations: deps.constraints.propagate(set.lineage, seeds) };
}

function touchedEntities(set: ChangeSet): EntityId[] {
  const ids = new Set(set.changes.map((c) => c.entityId));
  for (const change of set.constraintChanges) {
    for (const entityId of (change.after ?? change.before)?.entities ?? []) ids.add(entityId);
  }
  return [...ids];
}
