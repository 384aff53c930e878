/**
 * Service configuration from environment variables
 */

import { z } from "zod";
import { DEFAULT_COORDINATE_LIMIT, DEFAULT_MERGE_LOCK_TTL_MS, DEFAULT_TOLERANCES } from "@cadbranch/core";

const flag = z
  .enum(["true", "false", "1", "0", ""])
  .optional()
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
  CAD_LENGTH_TOLERANCE: z.coerce.number().positive().default(DEFAULT_TOLERANCES.length),
  CAD_ANGLE_TOLERANCE: z.coerce.number().positive().default(DEFAULT_TOLERANCES.angle),
  CAD_COORDINATE_LIMIT: z.coerce.number().positive().default(DEFAULT_COORDINATE_LIMIT),
  CAD_MERGE_LOCK_TTL_SECONDS: z.coerce
    .number()
    .positive()
    .default(DEFAULT_MERGE_LOCK_TTL_MS / 1000),
  CAD_VERBOSE: flag,
});

export interface ServiceConfig {
  /** Leases go to PostgreSQL when set, otherwise they stay in memory */
  databaseUrl?: string;
  tolerances: {
    length: number;
    angle: number;
  };
  coordinateLimit: number;
  mergeLockTtlMs: number;
  verbose: boolean;
}

/**
 * Parse configuration from `env`
 *
 * @throws Error naming every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ServiceConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join("; ")}`);
  }

  const vars = parsed.data;
  return {
    ...(vars.DATABASE_URL !== undefined ? { databaseUrl: vars.DATABASE_URL } : {}),
    tolerances: {
      length: vars.CAD_LENGTH_TOLERANCE,
      angle: vars.CAD_ANGLE_TOLERANCE,
    },
    coordinateLimit: vars.CAD_COORDINATE_LIMIT,
    mergeLockTtlMs: Math.round(vars.CAD_MERGE_LOCK_TTL_SECONDS * 1000),
    verbose: vars.CAD_VERBOSE,
  };
}
