/**
 * Branded identifiers
 *
 * Every identifier is a plain string at runtime. The brand keeps an entity id
 * from being passed where a constraint or workspace id is expected.
 */

/**
 * Workspace-qualified entity identifier, e.g. `main:point_3`
 */
export type EntityId = string & { __brand: 'EntityId' };

/**
 * Constraint identifier, e.g. `c_12`
 */
export type ConstraintId = string & { __brand: 'ConstraintId' };

/**
 * Workspace identifier. The root workspace is always `main`.
 */
export type WorkspaceId = string & { __brand: 'WorkspaceId' };

/**
 * Operation identifier, `op_<seq>`
 */
export type OperationId = string & { __brand: 'OperationId' };

/**
 * Identifier of the agent issuing a call
 */
export type AgentId = string & { __brand: 'AgentId' };

/**
 * The root workspace every lineage ends in
 */
export const ROOT_WORKSPACE_ID = 'main' as WorkspaceId;

/**
 * Cast a string to an EntityId
 * @internal
 */
export function asEntityId(id: string): EntityId {
  return id as EntityId;
}

/**
 * Cast a string to a ConstraintId
 * @internal
 */
export function asConstraintId(id: string): ConstraintId {
  return id as ConstraintId;
}

/**
 * Cast a string to a WorkspaceId
 * @internal
 */
export function asWorkspaceId(id: string): WorkspaceId {
  return id as WorkspaceId;
}

/**
 * Cast a string to an AgentId
 * @internal
 */
export function asAgentId(id: string): AgentId {
  return id as AgentId;
}

/**
 * Operation id for a sequence number
 */
export function operationIdForSeq(seq: number): OperationId {
  return `op_${seq}` as OperationId;
}

/**
 * Parse the sequence number out of an operation id.
 * Returns undefined for strings that are not operation ids.
 */
export function seqOfOperationId(id: string): number | undefined {
  const match = /^op_(\d+)$/.exec(id);
  return match ? Number(match[1]) : undefined;
}
