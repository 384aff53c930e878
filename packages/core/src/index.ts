/**
 * @cadbranch/core - multi-agent parametric CAD core
 *
 * ## Primary API
 * - CadSession: entry point; every call names its workspace
 *
 * ## Modules
 * - entities: versioned entity storage over workspace lineages
 * - constraints: constraint graph, DOF analysis, evaluation
 * - workspace: branches and three-way merge
 * - history: operation log, undo/redo
 * - coordination: lease locks over a pluggable store
 */

// =============================================================================
// Session
// =============================================================================
export {
  CadSession,
  type CallContext,
  type PointInput,
  type LineInput,
  type CircleInput,
  type ArcInput,
  type ExtrudeInput,
  type MutationResult,
  type DeleteResult,
  type ConstraintApplyResult,
  type ConstraintRemoveResult,
  type HistoryResult,
} from './api/CadSession.js';
export {
  createSessionOptions,
  DEFAULT_MERGE_LOCK_TTL_MS,
  type SessionOptions,
} from './api/options.js';

// =============================================================================
// Ids, numerics, logging, errors
// =============================================================================
export {
  ROOT_WORKSPACE_ID,
  asAgentId,
  asConstraintId,
  asEntityId,
  asWorkspaceId,
  operationIdForSeq,
  seqOfOperationId,
  type AgentId,
  type ConstraintId,
  type EntityId,
  type OperationId,
  type WorkspaceId,
} from './ids/types.js';
export { IdAllocator } from './ids/idAllocator.js';
export {
  DEFAULT_COORDINATE_LIMIT,
  DEFAULT_TOLERANCES,
  createNumericContext,
  type NumericContext,
  type Tolerances,
} from './num/tolerance.js';
export { silentLogger, type Logger } from './logging.js';
export * from './errors.js';

// =============================================================================
// Entities and geometry
// =============================================================================
export * from './entities/types.js';
export { EntityStore, type EntityChange, type EntityFilter } from './entities/EntityStore.js';
export { validateGeometry } from './entities/validate.js';
export type { Lineage, LineageLink } from './entities/LineageTable.js';
export {
  AnalyticGeometryEngine,
  type EntityMeasures,
  type GeometryEngine,
} from './geometry/GeometryEngine.js';

// =============================================================================
// Constraints
// =============================================================================
export * from './constraints/types.js';
export { CONSTRAINT_RULES } from './constraints/rules.js';
export {
  ConstraintGraph,
  type ApplyResult,
  type ConstraintStatusReport,
  type StatusScope,
} from './constraints/ConstraintGraph.js';
export type { ComponentAnalysis } from './constraints/graph.js';

// =============================================================================
// History, workspaces, coordination
// =============================================================================
export type { OperationEntry, OperationPage, OperationType } from './history/types.js';
export { OperationLog, type ListOptions } from './history/OperationLog.js';
export * from './workspace/types.js';
export { WorkspaceManager } from './workspace/WorkspaceManager.js';
export { LockManager } from './coordination/LockManager.js';
export { MemoryLockStore } from './coordination/MemoryLockStore.js';
export { isExpired, type LockStore, type ResourceKey, type ResourceLock } from './coordination/types.js';
