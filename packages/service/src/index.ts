/**
 * @cadbranch/service - call boundary for the cadbranch core
 *
 * ## Primary API
 * - createService(config): session + dispatcher, leases in PostgreSQL when
 *   DATABASE_URL is set
 * - dispatch(request): one JSON-RPC 2.0 request in, one envelope out
 *
 * The transport (stdio, HTTP) is up to the host.
 */

import { CadSession, createNumericContext } from "@cadbranch/core";
import type { LockStore, Logger } from "@cadbranch/core";
import type { ServiceConfig } from "./config.js";
import { loadConfig } from "./config.js";
import { createDatabase } from "./lib/db.js";
import { dispatch } from "./lib/dispatcher.js";
import type { DispatchContext } from "./lib/dispatcher.js";
import { AgentMetricsTracker } from "./lib/metrics.js";
import type { RpcResponse } from "./lib/rpc/index.js";
import { PgLockStore } from "./repos/index.js";

export interface ServiceOptions {
  logger?: Logger;
  now?: () => number;
  /** Overrides the store chosen from the configuration */
  lockStore?: LockStore;
}

export interface Service {
  session: CadSession;
  metrics: AgentMetricsTracker;
  dispatch(request: unknown): Promise<RpcResponse>;
  /** Release the database pool, if any */
  close(): Promise<void>;
}

/**
 * Build a service from configuration
 */
export async function createService(
  config: ServiceConfig = loadConfig(),
  options: ServiceOptions = {}
): Promise<Service> {
  const logger = options.logger ?? console;
  const now = options.now ?? Date.now;

  let lockStore = options.lockStore;
  let close = async (): Promise<void> => {};
  if (!lockStore && config.databaseUrl !== undefined) {
    const { db, pool } = createDatabase(config.databaseUrl);
    lockStore = new PgLockStore(db);
    close = () => pool.end();
    logger.info("[service] leases stored in PostgreSQL");
  }

  const session = new CadSession({
    ctx: createNumericContext(config.tolerances, config.coordinateLimit),
    now,
    logger,
    verbose: config.verbose,
    mergeLockTtlMs: config.mergeLockTtlMs,
    ...(lockStore ? { lockStore } : {}),
  });
  const metrics = new AgentMetricsTracker();
  const ctx: DispatchContext = { session, metrics, logger, verbose: config.verbose, now };

  return {
    session,
    metrics,
    dispatch: (request) => dispatch(ctx, request),
    close,
  };
}

export { loadConfig, type ServiceConfig } from "./config.js";
export { createDatabase, type Database } from "./lib/db.js";
export { dispatch, METHODS, ANONYMOUS_AGENT, type DispatchContext, type RpcMethod } from "./lib/dispatcher.js";
export { AgentMetricsTracker, type AgentMetricsSummary, type LearningStatus } from "./lib/metrics.js";
export * from "./lib/rpc/index.js";
export { PgLockStore } from "./repos/index.js";
export { resourceLocks, type ResourceLockRow, type NewResourceLockRow } from "./db/schema/index.js";
export * from "./validators/index.js";
