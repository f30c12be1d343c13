/**
 * Gradebook Errors — Typed error kinds raised by the domain model
 *
 * Every model failure is a GradebookError carrying a `kind` discriminant, so
 * the HTTP layer and the DataStore can map it to a status code or a result
 * without matching on message text.
 */

export type ErrorKind = 'InvalidArgument' | 'NotFound' | 'NotEnrolled';

export abstract class GradebookError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidArgumentError extends GradebookError {
  readonly kind = 'InvalidArgument' as const;
}

export class NotFoundError extends GradebookError {
  readonly kind = 'NotFound' as const;
}

export class NotEnrolledError extends GradebookError {
  readonly kind = 'NotEnrolled' as const;
}

export function isGradebookError(error: unknown): error is GradebookError {
  return error instanceof GradebookError;
}

export interface OperationResult {
  success: boolean;
  message: string;
}

// Runs a model operation and reports domain failures as a result instead of throwing.
// Anything that is not a GradebookError is a bug and still propagates.
export function toResult(operation: () => void, successMessage: string): OperationResult {
  try {
    operation();
    return { success: true, message: successMessage };
  } catch (error) {
    if (isGradebookError(error)) {
      return { success: false, message: error.message };
    }
    throw error;
  }
}
