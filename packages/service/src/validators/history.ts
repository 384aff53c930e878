/**
 * History Validators
 */

import { z } from "zod";
import { callSchema, workspaceIdField } from "./common.js";

export const listHistorySchema = z.object({
  workspace_id: workspaceIdField,
  limit: z.number().int().min(1).max(500).default(50),
  offset: z.number().int().min(0).default(0),
});

/** Undo and redo take the same input */
export const historyStepSchema = callSchema;

export type ListHistoryInput = z.infer<typeof listHistorySchema>;
export type HistoryStepInput = z.infer<typeof historyStepSchema>;
