/**
 * RPC Response Helpers
 *
 * Build JSON-RPC 2.0 envelopes and convert thrown values into structured
 * error payloads. Payload keys are snake_case on the wire.
 */

import { isCadError } from "@cadbranch/core";
import type { Logger } from "@cadbranch/core";
import { CAD_ERROR_CODES, INTERNAL_ERROR, RpcError } from "./errors.js";

export type RpcId = string | number | null;

export interface RpcErrorObject {
  code: number;
  message: string;
  data: {
    kind: string;
    retryable: boolean;
    details: unknown;
  };
}

export interface RpcSuccessResponse {
  jsonrpc: "2.0";
  id: RpcId;
  result: {
    status: "success";
    data: unknown;
    metadata: {
      operation_type: string;
      execution_time_ms: number;
    };
  };
}

export interface RpcErrorResponse {
  jsonrpc: "2.0";
  id: RpcId;
  error: RpcErrorObject;
}

export type RpcResponse = RpcSuccessResponse | RpcErrorResponse;

function snakeCase(key: string): string {
  return key
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/([a-zA-Z])(\d+)/g, "$1_$2")
    .toLowerCase();
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Rename object keys to snake_case, recursively. Arrays and primitives pass
 * through; Maps become plain objects.
 */
export function toWire(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(toWire);
  if (value instanceof Map) {
    return toWire(Object.fromEntries(value));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      if (inner === undefined) continue;
      out[snakeCase(key)] = toWire(inner);
    }
    return out;
  }
  if (typeof value === "number" && !Number.isFinite(value)) {
    return null;
  }
  return value;
}

export function toSuccessResponse(
  id: RpcId,
  data: unknown,
  operationType: string,
  executionTimeMs: number
): RpcSuccessResponse {
  return {
    jsonrpc: "2.0",
    id,
    result: {
      status: "success",
      data: toWire(data),
      metadata: {
        operation_type: operationType,
        execution_time_ms: executionTimeMs,
      },
    },
  };
}

/**
 * Convert an error to an error response. Unexpected errors are logged to
 * `logger` and reported without their message.
 */
export function toErrorResponse(
  id: RpcId,
  err: unknown,
  logger: Pick<Logger, "error"> = console
): RpcErrorResponse {
  // Handle known core errors
  if (isCadError(err)) {
    return {
      jsonrpc: "2.0",
      id,
      error: {
        code: CAD_ERROR_CODES[err.kind],
        message: err.message,
        data: { kind: err.kind, retryable: err.retryable, details: toWire(err.details) },
      },
    };
  }

  // Handle protocol errors
  if (err instanceof RpcError) {
    return {
      jsonrpc: "2.0",
      id,
      error: {
        code: err.code,
        message: err.message,
        data: { kind: err.kind, retryable: false, details: {} },
      },
    };
  }

  // Log unexpected errors
  if (err instanceof Error) {
    logger.error("Unexpected error:", err);
  } else {
    logger.error("Unknown error type:", err);
  }

  return {
    jsonrpc: "2.0",
    id,
    error: {
      code: INTERNAL_ERROR,
      message: "Internal error",
      data: { kind: "InternalSolverError", retryable: false, details: {} },
    },
  };
}
