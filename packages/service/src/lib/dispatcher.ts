/**
 * Method dispatcher
 *
 * Maps JSON-RPC 2.0 requests onto CadSession calls:
 * 1. Validates the envelope and looks up the method
 * 2. Validates params with the method's zod schema
 * 3. Runs the handler and wraps its result (or error) in an envelope
 *
 * Every call is recorded in the agent metrics, keyed by `agent_id`.
 */

import { z } from "zod";
import {
  asAgentId,
  asConstraintId,
  asEntityId,
  asWorkspaceId,
  isCadError,
} from "@cadbranch/core";
import type {
  CadSession,
  CallContext,
  ConflictResolution,
  EntityFilter,
  Logger,
  MutationResult,
  OperationEntry,
  Workspace,
} from "@cadbranch/core";
import {
  acquireLockSchema,
  agentMetricsSchema,
  applyConstraintSchema,
  constraintStatusSchema,
  createArcSchema,
  createCircleSchema,
  createLineSchema,
  createPointSchema,
  createSketchSchema,
  createWorkspaceSchema,
  deleteEntitySchema,
  deleteWorkspaceSchema,
  extrudeSchema,
  historyStepSchema,
  listEntitiesSchema,
  listHistorySchema,
  listLocksSchema,
  listWorkspacesSchema,
  mergeWorkspaceSchema,
  queryEntitySchema,
  releaseLockSchema,
  removeConstraintSchema,
  updateEntitySchema,
  workspaceStatusSchema,
} from "../validators/index.js";
import type { ConflictResolutionInput } from "../validators/index.js";
import { toGeometry } from "./geometry.js";
import type { AgentMetricsTracker } from "./metrics.js";
import {
  CAD_ERROR_CODES,
  INTERNAL_ERROR,
  InvalidRequestError,
  MethodNotFoundError,
  RpcError,
  fromZodError,
  toErrorResponse,
  toSuccessResponse,
} from "./rpc/index.js";
import type { RpcId, RpcResponse } from "./rpc/index.js";

/** Agent recorded for calls that name none */
export const ANONYMOUS_AGENT = "default_agent";

export interface DispatchContext {
  session: CadSession;
  metrics: AgentMetricsTracker;
  logger: Logger;
  verbose: boolean;
  now: () => number;
}

/**
 * A method with its params validation closed over
 */
export interface RpcMethod {
  run(ctx: DispatchContext, params: unknown): Promise<unknown>;
}

function defineMethod<S extends z.ZodType>(
  schema: S,
  handler: (ctx: DispatchContext, params: z.output<S>) => unknown
): RpcMethod {
  return {
    async run(ctx, params) {
      const parsed = schema.safeParse(params ?? {});
      if (!parsed.success) {
        throw fromZodError(parsed.error);
      }
      return handler(ctx, parsed.data);
    },
  };
}

// ============================================================================
// Payload shaping
// ============================================================================

function call(params: { agent_id: string; workspace_id: string }): CallContext {
  return { workspaceId: asWorkspaceId(params.workspace_id), agentId: asAgentId(params.agent_id) };
}

function sketchOf(params: { sketch_id?: string | undefined }) {
  return params.sketch_id === undefined ? {} : { sketchId: asEntityId(params.sketch_id) };
}

function mutationPayload({ entity, reevaluated, operation }: MutationResult) {
  return { entityId: entity.id, entity, reevaluated, operationId: operation.id };
}

function workspacePayload(ws: Workspace) {
  return {
    workspaceId: ws.id,
    name: ws.name,
    baseWorkspaceId: ws.baseId,
    divergencePoint: ws.divergencePoint,
    merged: ws.merged,
    mergedInto: ws.mergedInto,
    deleted: ws.deleted,
    createdBy: ws.createdBy,
    createdAt: ws.createdAt,
  };
}

function operationPayload(entry: OperationEntry) {
  return {
    operationId: entry.id,
    type: entry.type,
    agentId: entry.agentId,
    timestamp: entry.timestamp,
    entityIds: entry.entityIds,
    constraintIds: entry.constraintIds,
    reverts: entry.reverts,
  };
}

function toResolution(input: ConflictResolutionInput): ConflictResolution {
  return input.choice === "manual_merge"
    ? { choice: "manual_merge", geometry: toGeometry(input.geometry) }
    : { choice: input.choice };
}

// ============================================================================
// Methods
// ============================================================================

export const METHODS: Record<string, RpcMethod> = {
  // Entities
  "entity.create.point": defineMethod(createPointSchema, ({ session }, p) =>
    mutationPayload(
      session.createPoint(call(p), {
        x: p.x,
        y: p.y,
        ...(p.z === undefined ? {} : { z: p.z }),
        ...sketchOf(p),
      })
    )
  ),
  "entity.create.line": defineMethod(createLineSchema, ({ session }, p) =>
    mutationPayload(session.createLine(call(p), { start: p.start, end: p.end, ...sketchOf(p) }))
  ),
  "entity.create.circle": defineMethod(createCircleSchema, ({ session }, p) =>
    mutationPayload(session.createCircle(call(p), { center: p.center, radius: p.radius, ...sketchOf(p) }))
  ),
  "entity.create.arc": defineMethod(createArcSchema, ({ session }, p) =>
    mutationPayload(
      session.createArc(call(p), {
        center: p.center,
        radius: p.radius,
        startAngle: p.start_angle,
        endAngle: p.end_angle,
        ...sketchOf(p),
      })
    )
  ),
  "entity.create.sketch": defineMethod(createSketchSchema, ({ session }, p) =>
    mutationPayload(session.createSketch(call(p), p.plane))
  ),
  "solid.extrude": defineMethod(extrudeSchema, ({ session }, p) =>
    mutationPayload(
      session.extrude(call(p), { sketchId: asEntityId(p.sketch_id), distance: p.distance })
    )
  ),
  "entity.query": defineMethod(queryEntitySchema, ({ session }, p) => {
    const workspaceId = asWorkspaceId(p.workspace_id);
    const entityId = asEntityId(p.entity_id);
    return {
      entity: session.getEntity(workspaceId, entityId),
      measures: session.measureEntity(workspaceId, entityId),
    };
  }),
  "entity.list": defineMethod(listEntitiesSchema, ({ session }, p) => {
    const filter: EntityFilter = {
      ...(p.kind === undefined ? {} : { kind: p.kind }),
      ...(p.parent_id === undefined ? {} : { parent: asEntityId(p.parent_id) }),
    };
    const entities = session.listEntities(asWorkspaceId(p.workspace_id), filter);
    return { entities, count: entities.length };
  }),
  "entity.update": defineMethod(updateEntitySchema, ({ session }, p) =>
    mutationPayload(session.updateEntity(call(p), asEntityId(p.entity_id), toGeometry(p.geometry)))
  ),
  "entity.delete": defineMethod(deleteEntitySchema, ({ session }, p) => {
    const result = session.deleteEntity(call(p), asEntityId(p.entity_id));
    return {
      entityId: result.entity.id,
      constraintsRemoved: result.constraintsRemoved,
      operationId: result.operation.id,
    };
  }),

  // Constraints
  "constraint.apply": defineMethod(applyConstraintSchema, ({ session }, p) => {
    const result = session.applyConstraint(call(p), {
      kind: p.type,
      entities: p.entities.map(asEntityId),
      ...(p.parameters === undefined ? {} : { params: p.parameters }),
    });
    return {
      constraintId: result.constraint.id,
      status: result.status,
      dofRemoved: result.dofRemoved,
      dofRemaining: result.dofRemaining,
      componentEntities: result.componentEntities,
      evaluation: result.evaluation,
      operationId: result.operation.id,
    };
  }),
  "constraint.remove": defineMethod(removeConstraintSchema, ({ session }, p) => {
    const result = session.removeConstraint(call(p), asConstraintId(p.constraint_id));
    return {
      constraintId: result.constraint.id,
      reevaluated: result.reevaluated,
      operationId: result.operation.id,
    };
  }),
  "constraint.status": defineMethod(constraintStatusSchema, ({ session }, p) =>
    session.constraintStatus(
      asWorkspaceId(p.workspace_id),
      p.sketch_id === undefined ? {} : { sketchId: asEntityId(p.sketch_id) }
    )
  ),

  // Workspaces
  "workspace.create": defineMethod(createWorkspaceSchema, ({ session }, p) =>
    workspacePayload(
      session.createWorkspace(p.name, asWorkspaceId(p.base_workspace_id), asAgentId(p.agent_id))
    )
  ),
  "workspace.list": defineMethod(listWorkspacesSchema, ({ session }) => ({
    workspaces: session.listWorkspaces().map(workspacePayload),
  })),
  "workspace.status": defineMethod(workspaceStatusSchema, ({ session }, p) =>
    session.workspaceStatus(asWorkspaceId(p.workspace_id))
  ),
  "workspace.delete": defineMethod(deleteWorkspaceSchema, ({ session }, p) =>
    workspacePayload(session.deleteWorkspace(asWorkspaceId(p.workspace_id)))
  ),
  "workspace.merge": defineMethod(mergeWorkspaceSchema, async ({ session }, p) => {
    const resolutions: Record<string, ConflictResolution> = {};
    for (const [entityId, resolution] of Object.entries(p.resolutions ?? {})) {
      resolutions[entityId] = toResolution(resolution);
    }
    const result = await session.mergeWorkspaces(
      {
        sourceId: asWorkspaceId(p.source_workspace_id),
        targetId: asWorkspaceId(p.target_workspace_id),
        strategy: p.strategy,
        resolutions,
      },
      asAgentId(p.agent_id)
    );
    return {
      mergeResult: "success",
      sourceWorkspaceId: result.sourceId,
      targetWorkspaceId: result.targetId,
      entitiesAdded: result.entitiesAdded.length,
      entitiesModified: result.entitiesModified.length,
      entitiesDeleted: result.entitiesDeleted.length,
      addedIds: result.entitiesAdded,
      modifiedIds: result.entitiesModified,
      deletedIds: result.entitiesDeleted,
      constraintsAdded: result.constraintsAdded,
      constraintsRemoved: result.constraintsRemoved,
      constraintsSkipped: result.constraintsSkipped,
      conflicts: result.conflicts,
      resolved: result.resolved,
      reevaluated: result.reevaluated,
      operationId: result.operationId,
    };
  }),

  // History
  "history.list": defineMethod(listHistorySchema, ({ session }, p) => {
    const page = session.history(asWorkspaceId(p.workspace_id), { limit: p.limit, offset: p.offset });
    return {
      operations: page.entries.map(operationPayload),
      total: page.total,
      canUndo: page.canUndo,
      canRedo: page.canRedo,
    };
  }),
  "history.undo": defineMethod(historyStepSchema, ({ session }, p) => {
    const result = session.undo(call(p));
    const page = session.history(asWorkspaceId(p.workspace_id), { limit: 1 });
    return {
      undoneOperation: operationPayload(result.target),
      operationId: result.operation.id,
      reevaluated: result.reevaluated,
      canUndo: page.canUndo,
      canRedo: page.canRedo,
    };
  }),
  "history.redo": defineMethod(historyStepSchema, ({ session }, p) => {
    const result = session.redo(call(p));
    const page = session.history(asWorkspaceId(p.workspace_id), { limit: 1 });
    return {
      redoneOperation: operationPayload(result.target),
      operationId: result.operation.id,
      reevaluated: result.reevaluated,
      canUndo: page.canUndo,
      canRedo: page.canRedo,
    };
  }),

  // Locks
  "lock.acquire": defineMethod(acquireLockSchema, async ({ session }, p) => {
    const lock = await session.acquireLock(
      { resourceType: p.resource_type, resourceName: p.resource_name },
      asAgentId(p.agent_id),
      Math.round(p.ttl * 1000)
    );
    return { granted: true, ...lock };
  }),
  "lock.release": defineMethod(releaseLockSchema, async ({ session }, p) => ({
    released: await session.releaseLock(
      { resourceType: p.resource_type, resourceName: p.resource_name },
      asAgentId(p.agent_id)
    ),
  })),
  "lock.list": defineMethod(listLocksSchema, async ({ session }) => ({
    locks: await session.listLocks(),
  })),

  // Agents
  "agent.metrics": defineMethod(agentMetricsSchema, ({ metrics }, p) => metrics.summary(p.agent_id)),
};

// ============================================================================
// Dispatch
// ============================================================================

const requestSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  method: z.string().min(1),
  params: z.record(z.string(), z.unknown()).optional(),
});

/** Methods that only report on the service itself are not counted */
const UNRECORDED = new Set(["agent.metrics"]);

function idOf(raw: unknown): RpcId {
  if (typeof raw !== "object" || raw === null || !("id" in raw)) return null;
  const { id } = raw;
  return typeof id === "string" || typeof id === "number" ? id : null;
}

function agentOf(params: Record<string, unknown> | undefined): string {
  const agent = params?.agent_id;
  return typeof agent === "string" && agent.length > 0 ? agent : ANONYMOUS_AGENT;
}

function errorCodeOf(err: unknown): number {
  if (isCadError(err)) return CAD_ERROR_CODES[err.kind];
  if (err instanceof RpcError) return err.code;
  return INTERNAL_ERROR;
}

/**
 * Handle one request. Never throws: every failure becomes an error envelope.
 */
export async function dispatch(ctx: DispatchContext, raw: unknown): Promise<RpcResponse> {
  const envelope = requestSchema.safeParse(raw);
  if (!envelope.success) {
    return toErrorResponse(idOf(raw), new InvalidRequestError(), ctx.logger);
  }

  const { method, params } = envelope.data;
  const id = envelope.data.id ?? null;
  const agentId = agentOf(params);
  const recorded = !UNRECORDED.has(method);
  const started = ctx.now();

  try {
    const handler = Object.hasOwn(METHODS, method) ? METHODS[method] : undefined;
    if (!handler) {
      throw new MethodNotFoundError(method);
    }
    const data = await handler.run(ctx, params);
    const durationMs = ctx.now() - started;

    if (recorded) {
      ctx.metrics.record(agentId, { method, success: true, durationMs, timestamp: started });
    }
    if (ctx.verbose) {
      ctx.logger.debug(`[rpc] ${agentId} ${method} ok in ${durationMs}ms`);
    }
    return toSuccessResponse(id, data, method, durationMs);
  } catch (err) {
    const durationMs = ctx.now() - started;
    const errorCode = errorCodeOf(err);
    if (recorded) {
      ctx.metrics.record(agentId, { method, success: false, errorCode, durationMs, timestamp: started });
    }
    if (ctx.verbose) {
      ctx.logger.debug(`[rpc] ${agentId} ${method} failed with ${errorCode}`);
    }
    return toErrorResponse(id, err, ctx.logger);
  }
}
