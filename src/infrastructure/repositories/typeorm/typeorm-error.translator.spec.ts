import { QueryFailedError } from 'typeorm';

import {
  ConflictError,
  PersistenceError,
  RepositoryNotImplementedError,
  type RepositoryErrorContext,
} from '../../../domain/errors/repository.errors';
import { translateTypeOrmError } from './typeorm-error.translator';

const context: RepositoryErrorContext = { operation: 'create', entity: 'User', entityId: 'user-1' };

function queryFailure(code: string, message: string): QueryFailedError {
  return new QueryFailedError('INSERT INTO "User" ...', [], Object.assign(new Error(message), { code }));
}

describe('translateTypeOrmError', () => {
  it('should map unique and primary key violations to a unique conflict', () => {
    for (const code of ['SQLITE_CONSTRAINT_UNIQUE', 'SQLITE_CONSTRAINT_PRIMARYKEY']) {
      const translated = translateTypeOrmError(queryFailure(code, 'constraint failed'), context);

      expect(translated).toBeInstanceOf(ConflictError);
      expect(translated).toMatchObject({
        message: 'User violates a unique constraint',
        constraint: 'unique',
        operation: 'create',
        entity: 'User',
        entityId: 'user-1',
      });
    }
  });

  it('should map a foreign key violation to a reference conflict', () => {
    const translated = translateTypeOrmError(
      queryFailure('SQLITE_CONSTRAINT_FOREIGNKEY', 'FOREIGN KEY constraint failed'),
      context,
    );

    expect(translated).toMatchObject({ constraint: 'reference', message: 'User violates a foreign key constraint' });
  });

  it('should fall back to the driver message when the code is missing', () => {
    const failure = new QueryFailedError('INSERT', [], new Error('UNIQUE constraint failed: User.email'));

    expect(translateTypeOrmError(failure, context)).toMatchObject({ constraint: 'unique' });
  });

  it('should map a check violation to a plain PersistenceError', () => {
    const translated = translateTypeOrmError(queryFailure('SQLITE_CONSTRAINT_CHECK', 'CHECK failed'), context);

    expect(translated).toBeInstanceOf(PersistenceError);
    expect(translated).not.toBeInstanceOf(ConflictError);
    expect(translated.message).toBe('User violates a column constraint');
  });

  it('should wrap anything else and keep the cause', () => {
    const cause = new Error('SQLITE_BUSY');
    const translated = translateTypeOrmError(cause, context);

    expect(translated).toBeInstanceOf(PersistenceError);
    expect(translated.message).toBe('User.create failed');
    expect(translated.cause).toBe(cause);
  });

  it('should pass repository errors through', () => {
    const original = new RepositoryNotImplementedError(context);
    expect(translateTypeOrmError(original, context)).toBe(original);
  });
});
