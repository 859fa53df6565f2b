import type { Document } from 'mongodb';

import type { User, UserDraft, UserReplacement } from '../../../domain/models/user.model';
import type { IUserRepository } from '../../../domain/repositories/user.repository.interface';
import { buildUser, replaceUser } from '../shared/entity-builders';
import { MongoBaseRepository } from './mongo-base.repository';
import { MONGO_COLLECTIONS } from './mongo-collections';
import { DocumentReader, userFromDocument, userToDocument } from './mongo-document.mapper';

/**
 * Language references are stored as given; nothing checks that they exist.
 *
 * Deleting a user removes its study languages, vocabularies and their items,
 * and detaches its texts. Those steps run one after another, not atomically.
 */
export class MongoUserRepository extends MongoBaseRepository<User, UserDraft, UserReplacement> implements IUserRepository {
  protected readonly entityName = 'User';
  protected readonly collectionName = MONGO_COLLECTIONS.users;

  protected toDocument(user: User): Document {
    return userToDocument(user);
  }

  protected fromDocument(doc: Document): User {
    return userFromDocument(doc);
  }

  protected build(draft: UserDraft): User {
    return buildUser(draft);
  }

  protected replace(existing: User, replacement: UserReplacement): User {
    return replaceUser(existing, replacement);
  }

  async getByEmail(email: string): Promise<User | null> {
    return this.findOne('getByEmail', { email });
  }

  async getByUsername(username: string): Promise<User | null> {
    return this.findOne('getByUsername', { username });
  }

  async emailExists(email: string): Promise<boolean> {
    return this.count('emailExists', { email });
  }

  async usernameExists(username: string): Promise<boolean> {
    return this.count('usernameExists', { username });
  }

  async updateLastActive(id: string): Promise<boolean> {
    return this.execute('updateLastActive', id, async () => {
      const users = await this.collection();
      const result = await users.updateOne({ _id: id }, { $set: { lastActiveAt: new Date() } });
      return result.matchedCount > 0;
    });
  }

  protected async afterDelete(id: string): Promise<void> {
    const vocabularies = await this.collection(MONGO_COLLECTIONS.userVocabularies);
    const owned = await vocabularies.find({ userId: id }, { projection: { _id: 1 } }).toArray();
    const vocabularyIds = owned.map(doc => new DocumentReader(doc, 'UserVocabulary').id());

    if (vocabularyIds.length > 0) {
      const items = await this.collection(MONGO_COLLECTIONS.userVocabularyItems);
      await items.deleteMany({ userVocabularyId: { $in: vocabularyIds } });
    }
    await vocabularies.deleteMany({ userId: id });

    const userLanguages = await this.collection(MONGO_COLLECTIONS.userLanguages);
    await userLanguages.deleteMany({ userId: id });

    const texts = await this.collection(MONGO_COLLECTIONS.texts);
    await texts.updateMany({ userId: id }, { $set: { userId: null } });
  }
}
