import type { Document } from 'mongodb';

import type { VocabularyStatus } from '../../../domain/models/enums';
import type {
  UserVocabulary,
  UserVocabularyDraft,
  UserVocabularyItem,
  UserVocabularyItemDraft,
  UserVocabularyItemReplacement,
  UserVocabularyReplacement,
} from '../../../domain/models/vocabulary.model';
import type { PageOptions } from '../../../domain/repositories/pagination';
import type {
  IUserVocabularyItemRepository,
  IUserVocabularyRepository,
} from '../../../domain/repositories/vocabulary.repository.interface';
import {
  buildUserVocabulary,
  buildUserVocabularyItem,
  replaceUserVocabulary,
  replaceUserVocabularyItem,
} from '../shared/entity-builders';
import { MongoBaseRepository } from './mongo-base.repository';
import { MONGO_COLLECTIONS } from './mongo-collections';
import {
  userVocabularyFromDocument,
  userVocabularyItemFromDocument,
  userVocabularyItemToDocument,
  userVocabularyToDocument,
} from './mongo-document.mapper';

export class MongoUserVocabularyRepository
  extends MongoBaseRepository<UserVocabulary, UserVocabularyDraft, UserVocabularyReplacement>
  implements IUserVocabularyRepository
{
  protected readonly entityName = 'UserVocabulary';
  protected readonly collectionName = MONGO_COLLECTIONS.userVocabularies;

  protected toDocument(vocabulary: UserVocabulary): Document {
    return userVocabularyToDocument(vocabulary);
  }

  protected fromDocument(doc: Document): UserVocabulary {
    return userVocabularyFromDocument(doc);
  }

  protected build(draft: UserVocabularyDraft): UserVocabulary {
    return buildUserVocabulary(draft);
  }

  protected replace(existing: UserVocabulary, replacement: UserVocabularyReplacement): UserVocabulary {
    return replaceUserVocabulary(existing, replacement);
  }

  async getByUser(userId: string, page?: PageOptions): Promise<UserVocabulary[]> {
    return this.list('getByUser', { userId }, page);
  }

  async getByUserAndLanguage(userId: string, languageId: string): Promise<UserVocabulary | null> {
    return this.findOne('getByUserAndLanguage', { userId, languageId });
  }

  protected async afterDelete(id: string): Promise<void> {
    const items = await this.collection(MONGO_COLLECTIONS.userVocabularyItems);
    await items.deleteMany({ userVocabularyId: id });
  }
}

export class MongoUserVocabularyItemRepository
  extends MongoBaseRepository<UserVocabularyItem, UserVocabularyItemDraft, UserVocabularyItemReplacement>
  implements IUserVocabularyItemRepository
{
  protected readonly entityName = 'UserVocabularyItem';
  protected readonly collectionName = MONGO_COLLECTIONS.userVocabularyItems;

  protected toDocument(item: UserVocabularyItem): Document {
    return userVocabularyItemToDocument(item);
  }

  protected fromDocument(doc: Document): UserVocabularyItem {
    return userVocabularyItemFromDocument(doc);
  }

  protected build(draft: UserVocabularyItemDraft): UserVocabularyItem {
    return buildUserVocabularyItem(draft);
  }

  protected replace(existing: UserVocabularyItem, replacement: UserVocabularyItemReplacement): UserVocabularyItem {
    return replaceUserVocabularyItem(existing, replacement);
  }

  async getByVocabulary(vocabularyId: string, page?: PageOptions): Promise<UserVocabularyItem[]> {
    return this.list('getByVocabulary', { userVocabularyId: vocabularyId }, page);
  }

  async getByTerm(vocabularyId: string, term: string): Promise<UserVocabularyItem | null> {
    return this.findOne('getByTerm', { userVocabularyId: vocabularyId, term });
  }

  async getByStatus(
    vocabularyId: string,
    status: VocabularyStatus,
    page?: PageOptions,
  ): Promise<UserVocabularyItem[]> {
    return this.list('getByStatus', { userVocabularyId: vocabularyId, status }, page);
  }

  async recordReview(id: string): Promise<UserVocabularyItem | null> {
    return this.execute('recordReview', id, async () => {
      const items = await this.collection();
      const doc = await items.findOneAndUpdate(
        { _id: id },
        { $inc: { timesReviewed: 1 }, $set: { updatedAt: new Date() } },
        { returnDocument: 'after' },
      );
      return doc ? this.fromDocument(doc) : null;
    });
  }
}
