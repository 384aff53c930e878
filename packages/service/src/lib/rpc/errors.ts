/**
 * RPC Error Types
 *
 * Error codes for the JSON-RPC 2.0 envelope. Core failures map onto codes by
 * kind; protocol failures (bad envelope, unknown method) have their own
 * classes.
 */

import type { CadErrorKind } from "@cadbranch/core";
import { InvalidParameterError } from "@cadbranch/core";
import type { z } from "zod";

/**
 * Codes for every core error kind
 */
export const CAD_ERROR_CODES = {
  EntityNotFound: -32001,
  ConstraintConflict: -32002,
  InvalidConstraint: -32004,
  WorkspaceConflict: -32007,
  BaseNotFound: -32013,
  WorkspaceNotFound: -32014,
  AlreadyLocked: -32015,
  InvalidParameter: -32602,
  InternalSolverError: -32603,
} as const satisfies Record<CadErrorKind, number>;

export const INVALID_REQUEST = -32600;
export const METHOD_NOT_FOUND = -32601;
export const INTERNAL_ERROR = -32603;

/**
 * Base class for protocol-level errors
 */
export abstract class RpcError extends Error {
  abstract readonly code: number;
  abstract readonly kind: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * The envelope is not a JSON-RPC 2.0 request
 */
export class InvalidRequestError extends RpcError {
  readonly code = INVALID_REQUEST;
  readonly kind = "InvalidRequest";

  constructor(message = "Invalid request") {
    super(message);
  }
}

export class MethodNotFoundError extends RpcError {
  readonly code = METHOD_NOT_FOUND;
  readonly kind = "MethodNotFound";

  constructor(method: string) {
    super(`Unknown method '${method}'`);
  }
}

/**
 * Convert a zod failure into InvalidParameter with a per-field errors map
 */
export function fromZodError(err: z.ZodError): InvalidParameterError {
  const errors: Record<string, string[]> = {};
  for (const issue of err.issues) {
    const field = issue.path.length > 0 ? issue.path.map(String).join(".") : "(params)";
    (errors[field] ??= []).push(issue.message);
  }
  const fields = Object.keys(errors);
  return new InvalidParameterError(`Invalid parameters: ${fields.join(", ")}`, { errors });
}
