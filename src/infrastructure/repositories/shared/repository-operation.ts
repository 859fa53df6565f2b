import {
  ConflictError,
  PersistenceTimeoutError,
  type RepositoryError,
  type RepositoryErrorContext,
} from '../../../domain/errors/repository.errors';
import { AppLogger } from '../../../modules/logging/app-logger.service';
import { LogCategory } from '../../../modules/logging/log-levels';
import { DEFAULT_QUERY_TIMEOUT_MS } from './persistence.config';
import { withTimeout } from './with-timeout';

/** Settings every repository receives from its factory. */
export interface RepositoryOptions {
  queryTimeoutMs: number;
}

export const DEFAULT_REPOSITORY_OPTIONS: RepositoryOptions = { queryTimeoutMs: DEFAULT_QUERY_TIMEOUT_MS };

export interface OperationEnvironment {
  logger: AppLogger;
  timeoutMs: number;
  translate: (error: unknown, context: RepositoryErrorContext) => RepositoryError;
}

/**
 * Run one repository call under the query timeout and translate whatever it
 * throws into the repository taxonomy. Failures are logged with operation,
 * entity and id only; field values never reach the log.
 */
export async function runRepositoryOperation<R>(
  env: OperationEnvironment,
  context: RepositoryErrorContext,
  work: () => Promise<R>,
): Promise<R> {
  env.logger.trace(LogCategory.DATABASE, `${context.entity}.${context.operation}`, { entityId: context.entityId });
  try {
    return await withTimeout(
      work(),
      env.timeoutMs,
      () => new PersistenceTimeoutError({ ...context, timeoutMs: env.timeoutMs }),
    );
  } catch (error) {
    const translated = env.translate(error, context);
    const details = { entity: context.entity, operation: context.operation, entityId: context.entityId };
    if (translated instanceof ConflictError) {
      env.logger.warn(LogCategory.DATABASE, `${context.entity}.${context.operation} rejected: ${translated.message}`, {
        ...details,
        constraint: translated.constraint,
      });
    } else {
      env.logger.error(LogCategory.DATABASE, `${context.entity}.${context.operation} failed`, translated, details);
    }
    throw translated;
  }
}
