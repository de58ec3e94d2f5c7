/**
 * Error kinds raised by the observation service.
 *
 * Each carries the HTTP status the error handler in `app.ts` responds with.
 */

export interface FieldIssue {
  field: string;
  message: string;
}

export class ObsServiceError extends Error {
  readonly status: number;

  constructor(message: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
  }
}

export class ValidationError extends ObsServiceError {
  readonly issues: FieldIssue[];

  constructor(message: string, issues: FieldIssue[] = []) {
    super(message, 400);
    this.issues = issues;
  }
}

export class NotFoundError extends ObsServiceError {
  constructor(
    readonly entity: string,
    readonly id: number | string
  ) {
    super(`${entity} ${id} not found`, 404);
  }
}

export class PersistenceError extends ObsServiceError {
  constructor(message: string, cause: unknown) {
    super(message, 500, { cause });
  }
}

export class AuthorizationError extends ObsServiceError {
  constructor(readonly privilege: string) {
    super(`Privilege required: ${privilege}`, 403);
  }
}

/**
 * Wraps anything a store throws that is not already a service error.
 */
export const toPersistenceError = (operation: string, error: unknown): ObsServiceError => {
  if (error instanceof ObsServiceError) {
    return error;
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new PersistenceError(`${operation} failed: ${detail}`, error);
};
