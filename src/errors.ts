/**
 * Error taxonomy for planning and execution operations.
 *
 * Every error is raised synchronously from the failing operation and is
 * never retried by the engine.
 */

export type PlancraftErrorCode = 'NOT_FOUND' | 'INVALID_ARGUMENT' | 'PRECONDITION_FAILED';

/**
 * Base error class for all orchestrator errors
 */
export class PlancraftError extends Error {
  constructor(
    message: string,
    public readonly code: PlancraftErrorCode,
    public readonly status: number,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PlancraftError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A plan, execution, task, rule or chain does not exist (404)
 */
export class NotFoundError extends PlancraftError {
  constructor(resource: string, id: string) {
    super(`${resource} not found: ${id}`, 'NOT_FOUND', 404, { resource, id });
    this.name = 'NotFoundError';
  }
}

/**
 * Bad action name, missing required field or malformed id (400)
 */
export class InvalidArgumentError extends PlancraftError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_ARGUMENT', 400, details);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Transition not legal from the current state (409)
 */
export class PreconditionFailedError extends PlancraftError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PRECONDITION_FAILED', 409, details);
    this.name = 'PreconditionFailedError';
  }
}

export function isPlancraftError(error: unknown): error is PlancraftError {
  return error instanceof PlancraftError;
}
