/**
 * Resource locks table schema
 *
 * One row per leased resource. A row whose `expires_at` has passed is
 * treated as absent and may be taken over or swept.
 */

import { pgTable, text, bigint, index, primaryKey } from "drizzle-orm/pg-core";

export const resourceLocks = pgTable(
  "resource_locks",
  {
    resourceType: text("resource_type").notNull(), // e.g. "workspace", "global_constraints"
    resourceName: text("resource_name").notNull(),

    // Lease holder
    holder: text("holder").notNull(), // agent id
    executionId: text("execution_id").notNull(),

    // Epoch milliseconds
    acquiredAt: bigint("acquired_at", { mode: "number" }).notNull(),
    expiresAt: bigint("expires_at", { mode: "number" }).notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.resourceType, table.resourceName] }),
    // Sweeps scan by expiry
    index("idx_resource_locks_expires").on(table.expiresAt),
  ]
);

// Types
export type ResourceLockRow = typeof resourceLocks.$inferSelect;
export type NewResourceLockRow = typeof resourceLocks.$inferInsert;
