/**
 * Database schema exports
 *
 * All schema definitions are exported from here for use with Drizzle.
 */

export { resourceLocks } from "./resource-locks.js";
export type { ResourceLockRow, NewResourceLockRow } from "./resource-locks.js";
