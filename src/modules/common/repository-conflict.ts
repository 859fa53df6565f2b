import { ConflictException } from '@nestjs/common';

import { ConflictError } from '../../domain/errors/repository.errors';

/**
 * Await a repository write and report a ConflictError as a 409.
 *
 * Services pre-check the uniqueness they know about; this covers the race
 * where another request wins between the check and the write, and the
 * reference violations only the storage can see.
 */
export async function rethrowConflict<T>(
  work: Promise<T>,
  message: string | ((error: ConflictError) => string),
): Promise<T> {
  try {
    return await work;
  } catch (error) {
    if (error instanceof ConflictError) {
      throw new ConflictException(typeof message === 'string' ? message : message(error));
    }
    throw error;
  }
}
