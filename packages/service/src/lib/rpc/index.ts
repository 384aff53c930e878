/**
 * RPC Utilities
 *
 * Centralized helpers for error codes and response envelopes.
 */

export * from "./errors.js";
export * from "./respond.js";
