/**
 * Validators
 *
 * Centralized Zod schemas for all method parameters.
 */

export * from "./common.js";
export * from "./entity.js";
export * from "./constraint.js";
export * from "./workspace.js";
export * from "./history.js";
export * from "./lock.js";
export * from "./agent.js";
