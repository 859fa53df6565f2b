import type { Collection } from 'mongodb';

import type { ProficiencyLevel } from '../../../domain/models/enums';
import type { UserLanguage, UserLanguageDraft } from '../../../domain/models/user-language.model';
import type { IUserLanguageRepository } from '../../../domain/repositories/user-language.repository.interface';
import { AppLogger } from '../../../modules/logging/app-logger.service';
import { buildUserLanguage } from '../shared/entity-builders';
import {
  DEFAULT_REPOSITORY_OPTIONS,
  runRepositoryOperation,
  type RepositoryOptions,
} from '../shared/repository-operation';
import { MONGO_COLLECTIONS } from './mongo-collections';
import type { MongoDatabaseProvider } from './mongo-connection';
import { userLanguageDocumentId, userLanguageFromDocument, userLanguageToDocument } from './mongo-document.mapper';
import { translateMongoError } from './mongo-error.translator';

/** Documents are keyed "<userId>:<languageId>", so a repeated pair collides on `_id`. */
export class MongoUserLanguageRepository implements IUserLanguageRepository {
  private static readonly ENTITY = 'UserLanguage';

  constructor(
    private readonly database: MongoDatabaseProvider,
    private readonly logger: AppLogger,
    private readonly options: RepositoryOptions = DEFAULT_REPOSITORY_OPTIONS,
  ) {}

  async create(draft: UserLanguageDraft): Promise<UserLanguage> {
    const entry = buildUserLanguage(draft);
    return this.execute('create', entry.userId, async () => {
      const collection = await this.collection();
      await collection.insertOne(userLanguageToDocument(entry));
      return entry;
    });
  }

  async get(userId: string, languageId: string): Promise<UserLanguage | null> {
    return this.execute('get', userId, async () => {
      const collection = await this.collection();
      const doc = await collection.findOne({ _id: userLanguageDocumentId(userId, languageId) });
      return doc ? userLanguageFromDocument(doc) : null;
    });
  }

  async getByUser(userId: string): Promise<UserLanguage[]> {
    return this.execute('getByUser', userId, async () => {
      const collection = await this.collection();
      const docs = await collection.find({ userId }).sort({ startedAt: 1, languageId: 1 }).toArray();
      return docs.map(userLanguageFromDocument);
    });
  }

  async updateProficiency(
    userId: string,
    languageId: string,
    level: ProficiencyLevel,
  ): Promise<UserLanguage | null> {
    return this.execute('updateProficiency', userId, async () => {
      const collection = await this.collection();
      const doc = await collection.findOneAndUpdate(
        { _id: userLanguageDocumentId(userId, languageId) },
        { $set: { proficiencyLevel: level, updatedAt: new Date() } },
        { returnDocument: 'after' },
      );
      return doc ? userLanguageFromDocument(doc) : null;
    });
  }

  async delete(userId: string, languageId: string): Promise<boolean> {
    return this.execute('delete', userId, async () => {
      const collection = await this.collection();
      const result = await collection.deleteOne({ _id: userLanguageDocumentId(userId, languageId) });
      return result.deletedCount > 0;
    });
  }

  private async collection(): Promise<Collection> {
    const db = await this.database.getDatabase();
    return db.collection(MONGO_COLLECTIONS.userLanguages);
  }

  private execute<R>(operation: string, entityId: string, work: () => Promise<R>): Promise<R> {
    return runRepositoryOperation(
      { logger: this.logger, timeoutMs: this.options.queryTimeoutMs, translate: translateMongoError },
      { operation, entity: MongoUserLanguageRepository.ENTITY, entityId },
      work,
    );
  }
}
