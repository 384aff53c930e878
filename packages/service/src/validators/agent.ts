/**
 * Agent Validators
 */

import { z } from "zod";
import { agentIdField } from "./common.js";

export const agentMetricsSchema = z.object({
  agent_id: agentIdField,
});

export type AgentMetricsInput = z.infer<typeof agentMetricsSchema>;
