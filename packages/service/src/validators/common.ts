/**
 * Common Validators
 *
 * Fields shared by every method.
 */

import { z } from "zod";

export const agentIdField = z.string().min(1, "agent_id is required").max(100, "agent_id too long");

export const workspaceIdField = z.string().min(1, "workspace_id is required");

export const entityIdField = z.string().min(1, "entity_id is required");

/** Every mutating call names its workspace and its agent */
export const callSchema = z.object({
  agent_id: agentIdField,
  workspace_id: workspaceIdField,
});

export const xySchema = z.object({
  x: z.number(),
  y: z.number(),
});
