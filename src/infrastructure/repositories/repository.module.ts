/**
 * RepositoryModule — dynamic module that provides every repository port.
 *
 * Selects the persistence backend once at startup from PERSISTENCE_BACKEND:
 *   - "sqlite"  (default) → TypeOrmRepositoryFactory over better-sqlite3
 *   - "mongodb"           → MongoRepositoryFactory
 *
 * Each repository token resolves through the factory, so a service that asks
 * for USER_REPOSITORY receives the one cached instance for the process.
 *
 * Usage:
 *   imports: [LoggingModule, RepositoryModule.register()]
 */
import { Inject, Module, type DynamicModule, type OnApplicationShutdown, type Provider } from '@nestjs/common';

import {
  REPOSITORY_FACTORY,
  type IRepositoryFactory,
} from '../../domain/repositories/repository-factory.interface';
import { REPOSITORY_TOKENS, type RepositoryMap } from '../../domain/repositories/repository.tokens';
import { AppLogger } from '../../modules/logging/app-logger.service';
import { LogCategory } from '../../modules/logging/log-levels';
import { MongoRepositoryFactory } from './mongodb/mongo-repository.factory';
import { PERSISTENCE_CONFIG, loadPersistenceConfig, type PersistenceConfig } from './shared/persistence.config';
import { TypeOrmRepositoryFactory } from './typeorm/typeorm-repository.factory';

export type RepositoryFactoryBuilder = (config: PersistenceConfig, logger: AppLogger) => IRepositoryFactory;

export interface RepositoryModuleOptions {
  /** Environment to read persistence settings from. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
  /** Replaces the backend selection, e.g. to hand in a factory over a test database. */
  factory?: RepositoryFactoryBuilder;
  /** Implementations served instead of the backend's for the given tokens. */
  overrides?: Partial<RepositoryMap>;
}

export function createRepositoryFactory(config: PersistenceConfig, logger: AppLogger): IRepositoryFactory {
  switch (config.backend) {
    case 'sqlite':
      return new TypeOrmRepositoryFactory(config, logger);
    case 'mongodb':
      return new MongoRepositoryFactory(config, logger);
  }
}

@Module({})
export class RepositoryModule implements OnApplicationShutdown {
  constructor(@Inject(REPOSITORY_FACTORY) private readonly factory: IRepositoryFactory) {}

  /** @throws PersistenceConfigError when the environment names an invalid backend or omits a required setting. */
  static register(options: RepositoryModuleOptions = {}): DynamicModule {
    const config = loadPersistenceConfig(options.env);
    const build = options.factory ?? createRepositoryFactory;
    const overrides = options.overrides ?? {};

    const factoryProvider: Provider = {
      provide: REPOSITORY_FACTORY,
      inject: [AppLogger],
      useFactory: (logger: AppLogger): IRepositoryFactory => {
        const factory = build(config, logger);
        for (const token of REPOSITORY_TOKENS) {
          const implementation = overrides[token];
          if (implementation !== undefined) {
            factory.registerOverride(token, implementation);
          }
        }
        logger.info(LogCategory.CONFIG, 'Persistence backend selected', {
          backend: factory.backend,
          queryTimeoutMs: config.queryTimeoutMs,
        });
        return factory;
      },
    };

    const repositoryProviders: Provider[] = REPOSITORY_TOKENS.map(token => ({
      provide: token,
      inject: [REPOSITORY_FACTORY],
      useFactory: (factory: IRepositoryFactory) => factory.getRepository(token),
    }));

    return {
      module: RepositoryModule,
      global: true,
      providers: [{ provide: PERSISTENCE_CONFIG, useValue: config }, factoryProvider, ...repositoryProviders],
      exports: [PERSISTENCE_CONFIG, REPOSITORY_FACTORY, ...REPOSITORY_TOKENS],
    };
  }

  async onApplicationShutdown(): Promise<void> {
    await this.factory.dispose();
  }
}
