import { MongoServerError } from 'mongodb';

import {
  ConflictError,
  PersistenceError,
  RepositoryError,
  type RepositoryErrorContext,
} from '../../../domain/errors/repository.errors';
import { MalformedDocumentError } from './mongo-document.mapper';

const DUPLICATE_KEY = 11000;

/**
 * Translate a MongoDB driver failure into the repository taxonomy.
 *
 *   E11000 duplicate key   → ConflictError (unique)
 *   malformed document     → PersistenceError
 *   anything else          → PersistenceError
 */
export function translateMongoError(error: unknown, context: RepositoryErrorContext): RepositoryError {
  if (error instanceof RepositoryError) return error;

  if (error instanceof MongoServerError && error.code === DUPLICATE_KEY) {
    return new ConflictError(
      `${context.entity} violates a unique constraint`,
      { ...context, constraint: 'unique' },
      { cause: error },
    );
  }
  if (error instanceof MalformedDocumentError) {
    return new PersistenceError(`Stored ${context.entity} document is malformed`, context, { cause: error });
  }

  return new PersistenceError(`${context.entity}.${context.operation} failed`, context, { cause: error });
}
