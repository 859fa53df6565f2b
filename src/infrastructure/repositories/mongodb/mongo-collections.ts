import type { Db } from 'mongodb';

export const MONGO_COLLECTIONS = {
  languages: 'languages',
  users: 'users',
  texts: 'texts',
  textTags: 'textTags',
  userLanguages: 'userLanguages',
  userVocabularies: 'userVocabularies',
  userVocabularyItems: 'userVocabularyItems',
} as const;

/**
 * Unique indexes carry the same uniqueness rules the relational schema
 * declares. The remaining indexes back the filtered list queries.
 */
export async function ensureMongoIndexes(db: Db): Promise<void> {
  await Promise.all([
    db.collection(MONGO_COLLECTIONS.languages).createIndex({ code: 1 }, { unique: true, name: 'uq_languages_code' }),
    db.collection(MONGO_COLLECTIONS.users).createIndex({ email: 1 }, { unique: true, name: 'uq_users_email' }),
    db.collection(MONGO_COLLECTIONS.users).createIndex({ username: 1 }, { unique: true, name: 'uq_users_username' }),
    db.collection(MONGO_COLLECTIONS.textTags).createIndex({ name: 1 }, { unique: true, name: 'uq_text_tags_name' }),
    db
      .collection(MONGO_COLLECTIONS.userLanguages)
      .createIndex({ userId: 1, languageId: 1 }, { unique: true, name: 'uq_user_languages_pair' }),
    db
      .collection(MONGO_COLLECTIONS.userVocabularies)
      .createIndex({ userId: 1, languageId: 1 }, { unique: true, name: 'uq_user_vocabularies_pair' }),
    db
      .collection(MONGO_COLLECTIONS.userVocabularyItems)
      .createIndex({ userVocabularyId: 1, term: 1 }, { unique: true, name: 'uq_vocabulary_items_term' }),
    db.collection(MONGO_COLLECTIONS.texts).createIndex({ languageId: 1, createdAt: 1 }, { name: 'ix_texts_language' }),
    db.collection(MONGO_COLLECTIONS.texts).createIndex({ userId: 1, createdAt: 1 }, { name: 'ix_texts_user' }),
    db.collection(MONGO_COLLECTIONS.texts).createIndex({ tagIds: 1 }, { name: 'ix_texts_tags' }),
  ]);
}
