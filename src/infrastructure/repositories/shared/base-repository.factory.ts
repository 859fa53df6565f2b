import { PersistenceError, RepositoryNotImplementedError } from '../../../domain/errors/repository.errors';
import type {
  IRepositoryFactory,
  PersistenceBackend,
} from '../../../domain/repositories/repository-factory.interface';
import type { RepositoryMap, RepositoryToken } from '../../../domain/repositories/repository.tokens';
import { AppLogger } from '../../../modules/logging/app-logger.service';
import { LogCategory } from '../../../modules/logging/log-levels';

/** How a backend constructs the repository served under each token. */
export type RepositoryBuilders = { [K in RepositoryToken]?: () => RepositoryMap[K] };

/**
 * Caching and override logic shared by both backend factories.
 *
 * Construction is synchronous, so two callers can never build the same
 * repository twice. The asynchronous part (opening the storage handle) lives
 * in each backend's connection class behind a memoized promise.
 */
export abstract class BaseRepositoryFactory implements IRepositoryFactory {
  abstract readonly backend: PersistenceBackend;

  protected abstract readonly builders: RepositoryBuilders;

  private instances: Partial<RepositoryMap> = {};
  private overrides: Partial<RepositoryMap> = {};
  private disposal: Promise<void> | undefined;

  protected constructor(protected readonly logger: AppLogger) {}

  /** Close the backend's shared storage handle. Called at most once. */
  protected abstract releaseResources(): Promise<void>;

  getRepository<K extends RepositoryToken>(token: K): RepositoryMap[K] {
    const override = this.overrides[token];
    if (override !== undefined) return override;

    if (this.disposal) {
      throw new PersistenceError('Repository factory has been disposed', {
        operation: 'getRepository',
        entity: token,
      });
    }

    const cached = this.instances[token];
    if (cached !== undefined) return cached;

    const build = this.builders[token];
    if (!build) {
      throw new RepositoryNotImplementedError({ operation: 'getRepository', entity: token });
    }
    const repository = build();
    this.instances[token] = repository;
    this.logger.debug(LogCategory.DATABASE, 'Repository constructed', {
      backend: this.backend,
      repository: token,
    });
    return repository;
  }

  registerOverride<K extends RepositoryToken>(token: K, implementation: RepositoryMap[K]): void {
    this.overrides[token] = implementation;
    this.logger.debug(LogCategory.DATABASE, 'Repository override registered', { repository: token });
  }

  clearOverrides(): void {
    this.overrides = {};
  }

  dispose(): Promise<void> {
    if (!this.disposal) {
      this.disposal = this.shutdown();
    }
    return this.disposal;
  }

  private async shutdown(): Promise<void> {
    this.instances = {};
    this.overrides = {};
    await this.releaseResources();
    this.logger.info(LogCategory.DATABASE, 'Persistence resources released', { backend: this.backend });
  }
}
