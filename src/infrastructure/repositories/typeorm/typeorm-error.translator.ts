import { QueryFailedError } from 'typeorm';

import {
  ConflictError,
  PersistenceError,
  RepositoryError,
  type RepositoryErrorContext,
} from '../../../domain/errors/repository.errors';

function driverCode(driverError: unknown): string | undefined {
  if (typeof driverError === 'object' && driverError !== null && 'code' in driverError) {
    const { code } = driverError;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Translate a TypeORM / better-sqlite3 failure into the repository taxonomy.
 *
 *   SQLITE_CONSTRAINT_UNIQUE, _PRIMARYKEY → ConflictError (unique)
 *   SQLITE_CONSTRAINT_FOREIGNKEY          → ConflictError (reference)
 *   anything else                         → PersistenceError
 */
export function translateTypeOrmError(error: unknown, context: RepositoryErrorContext): RepositoryError {
  if (error instanceof RepositoryError) return error;

  if (error instanceof QueryFailedError) {
    const code = driverCode(error.driverError) ?? '';
    const message = error.message;

    if (code === 'SQLITE_CONSTRAINT_UNIQUE' || code === 'SQLITE_CONSTRAINT_PRIMARYKEY' || /UNIQUE constraint failed/.test(message)) {
      return new ConflictError(
        `${context.entity} violates a unique constraint`,
        { ...context, constraint: 'unique' },
        { cause: error },
      );
    }
    if (code === 'SQLITE_CONSTRAINT_FOREIGNKEY' || /FOREIGN KEY constraint failed/.test(message)) {
      return new ConflictError(
        `${context.entity} violates a foreign key constraint`,
        { ...context, constraint: 'reference' },
        { cause: error },
      );
    }
    if (code === 'SQLITE_CONSTRAINT_CHECK' || code === 'SQLITE_CONSTRAINT_NOTNULL') {
      return new PersistenceError(`${context.entity} violates a column constraint`, context, { cause: error });
    }
  }

  return new PersistenceError(`${context.entity}.${context.operation} failed`, context, { cause: error });
}
