/**
 * Failure taxonomy shared by every repository implementation.
 *
 * Backends translate their native exceptions into these classes so that
 * services and the HTTP layer never branch on the active storage technology.
 * Not-found is not an error: lookups return `null` and deletes return `false`.
 */

/** Where a repository failure happened. Values only, never field contents. */
export interface RepositoryErrorContext {
  /** Repository operation, e.g. "create" or "getByEmail" */
  operation: string;
  /** Entity type name, e.g. "User" */
  entity: string;
  entityId?: string;
}

export abstract class RepositoryError extends Error {
  readonly operation: string;
  readonly entity: string;
  readonly entityId?: string;

  protected constructor(message: string, context: RepositoryErrorContext, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.operation = context.operation;
    this.entity = context.entity;
    this.entityId = context.entityId;
  }
}

/** Connection, constraint-mechanism or serialization failure. */
export class PersistenceError extends RepositoryError {
  constructor(message: string, context: RepositoryErrorContext, options?: { cause?: unknown }) {
    super(message, context, options);
  }
}

export type ConflictConstraint = 'unique' | 'reference';

/**
 * Uniqueness or referential-integrity violation.
 * Extends PersistenceError: a conflict is still a failed write.
 */
export class ConflictError extends PersistenceError {
  readonly constraint: ConflictConstraint;

  constructor(
    message: string,
    context: RepositoryErrorContext & { constraint: ConflictConstraint },
    options?: { cause?: unknown },
  ) {
    super(message, context, options);
    this.constraint = context.constraint;
  }
}

/** The storage driver did not answer within the configured query timeout. */
export class PersistenceTimeoutError extends PersistenceError {
  readonly timeoutMs: number;

  constructor(context: RepositoryErrorContext & { timeoutMs: number }) {
    super(`${context.entity}.${context.operation} timed out after ${context.timeoutMs}ms`, context);
    this.timeoutMs = context.timeoutMs;
  }
}

/** The active backend does not provide this repository or query. */
export class RepositoryNotImplementedError extends RepositoryError {
  constructor(context: RepositoryErrorContext) {
    super(`${context.entity}.${context.operation} is not implemented by the active backend`, context);
  }
}

/** Invalid persistence configuration, raised at startup. */
export class PersistenceConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PersistenceConfigError';
  }
}
