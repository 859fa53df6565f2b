/**
 * IRepositoryFactory — hands out one repository instance per token for the
 * lifetime of the process.
 *
 * Implementations:
 *   - TypeOrmRepositoryFactory (relational backend)
 *   - MongoRepositoryFactory   (document backend)
 */
import type { RepositoryMap, RepositoryToken } from './repository.tokens';

export type PersistenceBackend = 'sqlite' | 'mongodb';

export interface IRepositoryFactory {
  readonly backend: PersistenceBackend;

  /** Cached instance for `token`, constructed on first request. Overrides win. */
  getRepository<K extends RepositoryToken>(token: K): RepositoryMap[K];

  /** Serve `implementation` for `token` until `clearOverrides()`. */
  registerOverride<K extends RepositoryToken>(token: K, implementation: RepositoryMap[K]): void;

  clearOverrides(): void;

  /** Release the shared storage handle. Safe to call more than once. */
  dispose(): Promise<void>;
}

/** Injection token for the active IRepositoryFactory. */
export const REPOSITORY_FACTORY = 'REPOSITORY_FACTORY';
