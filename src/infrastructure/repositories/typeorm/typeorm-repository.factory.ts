import type { DataSource } from 'typeorm';

import {
  LANGUAGE_REPOSITORY,
  TEXT_REPOSITORY,
  TEXT_TAG_REPOSITORY,
  USER_LANGUAGE_REPOSITORY,
  USER_REPOSITORY,
  USER_VOCABULARY_ITEM_REPOSITORY,
  USER_VOCABULARY_REPOSITORY,
} from '../../../domain/repositories/repository.tokens';
import { AppLogger } from '../../../modules/logging/app-logger.service';
import { BaseRepositoryFactory, type RepositoryBuilders } from '../shared/base-repository.factory';
import type { SqlitePersistenceConfig } from '../shared/persistence.config';
import type { RepositoryOptions } from '../shared/repository-operation';
import { TypeOrmConnection, createSqliteDataSource } from './typeorm-connection';
import { TypeOrmLanguageRepository } from './typeorm-language.repository';
import { TypeOrmTextTagRepository } from './typeorm-text-tag.repository';
import { TypeOrmTextRepository } from './typeorm-text.repository';
import { TypeOrmUserLanguageRepository } from './typeorm-user-language.repository';
import { TypeOrmUserRepository } from './typeorm-user.repository';
import {
  TypeOrmUserVocabularyItemRepository,
  TypeOrmUserVocabularyRepository,
} from './typeorm-vocabulary.repository';

/**
 * Relational backend: every repository shares one TypeORM DataSource over
 * better-sqlite3. The DataSource opens on the first query.
 */
export class TypeOrmRepositoryFactory extends BaseRepositoryFactory {
  readonly backend = 'sqlite' as const;

  readonly connection: TypeOrmConnection;

  protected readonly builders: RepositoryBuilders;

  constructor(config: SqlitePersistenceConfig, logger: AppLogger, dataSource?: DataSource) {
    super(logger);
    this.connection = new TypeOrmConnection(dataSource ?? createSqliteDataSource(config), logger);
    const options: RepositoryOptions = { queryTimeoutMs: config.queryTimeoutMs };
    const connection = this.connection;

    this.builders = {
      [LANGUAGE_REPOSITORY]: () => new TypeOrmLanguageRepository(connection, logger, options),
      [USER_REPOSITORY]: () => new TypeOrmUserRepository(connection, logger, options),
      [TEXT_REPOSITORY]: () => new TypeOrmTextRepository(connection, logger, options),
      [TEXT_TAG_REPOSITORY]: () => new TypeOrmTextTagRepository(connection, logger, options),
      [USER_LANGUAGE_REPOSITORY]: () => new TypeOrmUserLanguageRepository(connection, logger, options),
      [USER_VOCABULARY_REPOSITORY]: () => new TypeOrmUserVocabularyRepository(connection, logger, options),
      [USER_VOCABULARY_ITEM_REPOSITORY]: () => new TypeOrmUserVocabularyItemRepository(connection, logger, options),
    };
  }

  protected releaseResources(): Promise<void> {
    return this.connection.close();
  }
}
