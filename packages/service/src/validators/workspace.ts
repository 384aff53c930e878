/**
 * Workspace Validators
 *
 * Zod schemas for branching and merging.
 */

import { z } from "zod";
import { MERGE_STRATEGIES } from "@cadbranch/core";
import { agentIdField, workspaceIdField } from "./common.js";
import { geometrySchema } from "./entity.js";

// ============================================================================
// Query Schemas
// ============================================================================

export const listWorkspacesSchema = z.object({});

export const workspaceStatusSchema = z.object({
  workspace_id: workspaceIdField,
});

// ============================================================================
// Mutation Schemas
// ============================================================================

export const createWorkspaceSchema = z.object({
  agent_id: agentIdField,
  name: z.string().min(1, "Name is required").max(100, "Name too long"),
  base_workspace_id: workspaceIdField.default("main"),
});

export const deleteWorkspaceSchema = z.object({
  agent_id: agentIdField,
  workspace_id: workspaceIdField,
});

export const conflictResolutionSchema = z.discriminatedUnion("choice", [
  z.object({ choice: z.literal("keep_source") }),
  z.object({ choice: z.literal("keep_target") }),
  z.object({ choice: z.literal("manual_merge"), geometry: geometrySchema }),
]);

export const mergeWorkspaceSchema = z.object({
  agent_id: agentIdField,
  source_workspace_id: workspaceIdField,
  target_workspace_id: workspaceIdField.default("main"),
  strategy: z.enum(MERGE_STRATEGIES).default("auto"),
  /** Keyed by entity id */
  resolutions: z.record(z.string(), conflictResolutionSchema).optional(),
});

// ============================================================================
// Types
// ============================================================================

export type CreateWorkspaceInput = z.infer<typeof createWorkspaceSchema>;
export type WorkspaceStatusInput = z.infer<typeof workspaceStatusSchema>;
export type DeleteWorkspaceInput = z.infer<typeof deleteWorkspaceSchema>;
export type ConflictResolutionInput = z.infer<typeof conflictResolutionSchema>;
export type MergeWorkspaceInput = z.infer<typeof mergeWorkspaceSchema>;
