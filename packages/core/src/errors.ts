/**
 * Error taxonomy
 *
 * Every failure the core reports is a CadError subclass carrying a `kind`
 * discriminant and a structured `details` record. Callers branch on `kind`
 * and read `details`; the message is for humans only.
 */

import type { ConstraintId, EntityId, WorkspaceId } from './ids/types.js';

/**
 * All error kinds
 */
export type CadErrorKind =
  | 'EntityNotFound'
  | 'InvalidConstraint'
  | 'ConstraintConflict'
  | 'WorkspaceConflict'
  | 'BaseNotFound'
  | 'WorkspaceNotFound'
  | 'AlreadyLocked'
  | 'InvalidParameter'
  | 'InternalSolverError';

/**
 * Base class for core errors
 */
export abstract class CadError extends Error {
  abstract readonly kind: CadErrorKind;
  /** Whether resubmitting (possibly later, or with resolutions) can succeed */
  abstract readonly retryable: boolean;
  readonly details: Record<string, unknown>;

  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;
  }
}

/**
 * Narrow an unknown thrown value to a CadError
 */
export function isCadError(err: unknown): err is CadError {
  return err instanceof CadError;
}

export class EntityNotFoundError extends CadError {
  readonly kind = 'EntityNotFound';
  readonly retryable = false;

  constructor(entityId: string, workspaceId: WorkspaceId) {
    super(`Entity '${entityId}' not found in workspace '${workspaceId}'`, {
      entityId,
      workspaceId,
    });
  }
}

/**
 * Bad constraint kind / entity combination or missing parameters
 */
export class InvalidConstraintError extends CadError {
  readonly kind = 'InvalidConstraint';
  readonly retryable = false;
}

/**
 * A constraint that cannot coexist with an existing one
 */
export interface ConflictingConstraint {
  constraintId: ConstraintId;
  kind: string;
  entities: EntityId[];
  params: Record<string, number>;
}

/**
 * Over-constrained or contradictory constraint set
 *
 * Not retryable without changing the request.
 */
export class ConstraintConflictError extends CadError {
  readonly kind = 'ConstraintConflict';
  readonly retryable = false;

  constructor(
    message: string,
    details: {
      reason: 'over_constrained' | 'contradiction';
      componentEntities: EntityId[];
      baseDof: number;
      dofRemoved: number;
      dofRemaining: number;
      conflictingWith: ConflictingConstraint[];
      [key: string]: unknown;
    }
  ) {
    super(message, details);
  }
}

/**
 * Merge aborted because of unresolved conflicts. `details.conflicts` holds
 * the full conflict list; resubmitting with resolutions can succeed.
 */
export class WorkspaceConflictError extends CadError {
  readonly kind = 'WorkspaceConflict';
  readonly retryable = true;
}

export class BaseNotFoundError extends CadError {
  readonly kind = 'BaseNotFound';
  readonly retryable = false;

  constructor(workspaceId: string) {
    super(`Workspace '${workspaceId}' not found`, { workspaceId });
  }
}

export class WorkspaceNotFoundError extends CadError {
  readonly kind = 'WorkspaceNotFound';
  readonly retryable = false;

  constructor(workspaceId: string) {
    super(`Workspace '${workspaceId}' not found`, { workspaceId });
  }
}

/**
 * Lease held by another holder. Retryable once `details.expiresAt` passes.
 */
export class AlreadyLockedError extends CadError {
  readonly kind = 'AlreadyLocked';
  readonly retryable = true;
}

export class InvalidParameterError extends CadError {
  readonly kind = 'InvalidParameter';
  readonly retryable = false;
}

/**
 * An internal invariant was broken. Signals a bug.
 */
export class InternalSolverError extends CadError {
  readonly kind = 'InternalSolverError';
  readonly retryable = false;
}
