/**
 * Lock Validators
 */

import { z } from "zod";
import { agentIdField } from "./common.js";

const resourceFields = {
  agent_id: agentIdField,
  resource_type: z.string().min(1, "resource_type is required").max(50),
  resource_name: z.string().min(1, "resource_name is required").max(100),
};

export const acquireLockSchema = z.object({
  ...resourceFields,
  /** Lease length in seconds */
  ttl: z.number().positive().max(86_400).default(30),
});

export const releaseLockSchema = z.object(resourceFields);

export const listLocksSchema = z.object({});

export type AcquireLockInput = z.infer<typeof acquireLockSchema>;
export type ReleaseLockInput = z.infer<typeof releaseLockSchema>;
