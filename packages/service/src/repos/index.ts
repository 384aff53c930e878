/**
 * Repositories
 *
 * Database access layer.
 */

export { PgLockStore } from "./resource-locks.js";
