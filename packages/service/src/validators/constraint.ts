/**
 * Constraint Validators
 */

import { z } from "zod";
import { CONSTRAINT_KINDS } from "@cadbranch/core";
import { callSchema, entityIdField, workspaceIdField } from "./common.js";

export const applyConstraintSchema = callSchema.extend({
  type: z.enum(CONSTRAINT_KINDS),
  entities: z.array(entityIdField).min(1).max(2),
  parameters: z
    .object({
      distance: z.number().optional(),
      angle: z.number().optional(),
      radius: z.number().optional(),
      tolerance: z.number().positive().optional(),
    })
    .optional(),
});

export const removeConstraintSchema = callSchema.extend({
  constraint_id: z.string().min(1, "constraint_id is required"),
});

export const constraintStatusSchema = z.object({
  workspace_id: workspaceIdField,
  sketch_id: entityIdField.optional(),
});

export type ApplyConstraintInput = z.infer<typeof applyConstraintSchema>;
export type RemoveConstraintInput = z.infer<typeof removeConstraintSchema>;
export type ConstraintStatusInput = z.infer<typeof constraintStatusSchema>;
