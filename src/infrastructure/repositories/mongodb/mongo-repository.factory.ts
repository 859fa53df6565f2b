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
import type { MongoPersistenceConfig } from '../shared/persistence.config';
import type { RepositoryOptions } from '../shared/repository-operation';
import { MongoConnection, type MongoDatabaseProvider } from './mongo-connection';
import { MongoLanguageRepository } from './mongo-language.repository';
import { MongoTextTagRepository } from './mongo-text-tag.repository';
import { MongoTextRepository } from './mongo-text.repository';
import { MongoUserLanguageRepository } from './mongo-user-language.repository';
import { MongoUserRepository } from './mongo-user.repository';
import { MongoUserVocabularyItemRepository, MongoUserVocabularyRepository } from './mongo-vocabulary.repository';

/**
 * Document backend: every repository shares one MongoClient. The client
 * connects, and the unique indexes are created, on the first query.
 */
export class MongoRepositoryFactory extends BaseRepositoryFactory {
  readonly backend = 'mongodb' as const;

  readonly database: MongoDatabaseProvider;

  protected readonly builders: RepositoryBuilders;

  constructor(config: MongoPersistenceConfig, logger: AppLogger, database?: MongoDatabaseProvider) {
    super(logger);
    this.database = database ?? new MongoConnection(config, logger);
    const options: RepositoryOptions = { queryTimeoutMs: config.queryTimeoutMs };
    const db = this.database;

    this.builders = {
      [LANGUAGE_REPOSITORY]: () => new MongoLanguageRepository(db, logger, options),
      [USER_REPOSITORY]: () => new MongoUserRepository(db, logger, options),
      [TEXT_REPOSITORY]: () => new MongoTextRepository(db, logger, options),
      [TEXT_TAG_REPOSITORY]: () => new MongoTextTagRepository(db, logger, options),
      [USER_LANGUAGE_REPOSITORY]: () => new MongoUserLanguageRepository(db, logger, options),
      [USER_VOCABULARY_REPOSITORY]: () => new MongoUserVocabularyRepository(db, logger, options),
      [USER_VOCABULARY_ITEM_REPOSITORY]: () => new MongoUserVocabularyItemRepository(db, logger, options),
    };
  }

  protected releaseResources(): Promise<void> {
    return this.database.close();
  }
}
