/**
 * Domain entity ↔ TypeORM row conversion.
 *
 * Rows are built as entity class instances so TypeORM resolves their table
 * from the constructor. Relation properties are never populated: repositories
 * read and write foreign keys through the id columns only.
 */
import type { Language } from '../../../domain/models/language.model';
import type { Text } from '../../../domain/models/text.model';
import type { TextTag } from '../../../domain/models/text-tag.model';
import type { UserLanguage } from '../../../domain/models/user-language.model';
import type { User } from '../../../domain/models/user.model';
import type { UserVocabulary, UserVocabularyItem } from '../../../domain/models/vocabulary.model';
import {
  LanguageEntity,
  TextEntity,
  TextTagEntity,
  UserEntity,
  UserLanguageEntity,
  UserVocabularyEntity,
  UserVocabularyItemEntity,
} from './entities';

export function languageToRow(language: Language): LanguageEntity {
  return Object.assign(new LanguageEntity(), {
    id: language.id,
    name: language.name,
    code: language.code,
    nativeName: language.nativeName,
    createdAt: language.createdAt,
  });
}

export function languageFromRow(row: LanguageEntity): Language {
  return {
    id: row.id,
    name: row.name,
    code: row.code,
    nativeName: row.nativeName,
    createdAt: row.createdAt,
  };
}

export function userToRow(user: User): UserEntity {
  return Object.assign(new UserEntity(), {
    id: user.id,
    email: user.email,
    username: user.username,
    passwordHash: user.passwordHash,
    firstName: user.firstName,
    lastName: user.lastName,
    nativeLanguageId: user.nativeLanguageId,
    currentLanguageId: user.currentLanguageId,
    createdAt: user.createdAt,
    updatedAt: user.updatedAt,
    lastActiveAt: user.lastActiveAt,
  });
}

export function userFromRow(row: UserEntity): User {
  return {
    id: row.id,
    email: row.email,
    username: row.username,
    passwordHash: row.passwordHash,
    firstName: row.firstName,
    lastName: row.lastName,
    nativeLanguageId: row.nativeLanguageId,
    currentLanguageId: row.currentLanguageId,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    lastActiveAt: row.lastActiveAt ?? null,
  };
}

export function textToRow(text: Text): TextEntity {
  return Object.assign(new TextEntity(), {
    id: text.id,
    title: text.title,
    content: text.content,
    languageId: text.languageId,
    userId: text.userId,
    proficiencyLevel: text.proficiencyLevel,
    wordCount: text.wordCount,
    isPublic: text.isPublic,
    source: text.source,
    createdAt: text.createdAt,
    updatedAt: text.updatedAt,
  });
}

export function textFromRow(row: TextEntity): Text {
  return {
    id: row.id,
    title: row.title,
    content: row.content,
    languageId: row.languageId,
    userId: row.userId ?? null,
    proficiencyLevel: row.proficiencyLevel,
    wordCount: row.wordCount,
    isPublic: row.isPublic,
    source: row.source ?? null,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export function textTagToRow(tag: TextTag): TextTagEntity {
  return Object.assign(new TextTagEntity(), {
    id: tag.id,
    name: tag.name,
    description: tag.description,
  });
}

export function textTagFromRow(row: TextTagEntity): TextTag {
  return { id: row.id, name: row.name, description: row.description ?? null };
}

export function userLanguageToRow(entry: UserLanguage): UserLanguageEntity {
  return Object.assign(new UserLanguageEntity(), {
    userId: entry.userId,
    languageId: entry.languageId,
    proficiencyLevel: entry.proficiencyLevel,
    startedAt: entry.startedAt,
    createdAt: entry.createdAt,
    updatedAt: entry.updatedAt,
  });
}

export function userLanguageFromRow(row: UserLanguageEntity): UserLanguage {
  return {
    userId: row.userId,
    languageId: row.languageId,
    proficiencyLevel: row.proficiencyLevel,
    startedAt: row.startedAt,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export function userVocabularyToRow(vocabulary: UserVocabulary): UserVocabularyEntity {
  return Object.assign(new UserVocabularyEntity(), {
    id: vocabulary.id,
    userId: vocabulary.userId,
    languageId: vocabulary.languageId,
    name: vocabulary.name,
    createdAt: vocabulary.createdAt,
    updatedAt: vocabulary.updatedAt,
  });
}

export function userVocabularyFromRow(row: UserVocabularyEntity): UserVocabulary {
  return {
    id: row.id,
    userId: row.userId,
    languageId: row.languageId,
    name: row.name,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export function userVocabularyItemToRow(item: UserVocabularyItem): UserVocabularyItemEntity {
  return Object.assign(new UserVocabularyItemEntity(), {
    id: item.id,
    userVocabularyId: item.userVocabularyId,
    term: item.term,
    lemma: item.lemma,
    stem: item.stem,
    partOfSpeech: item.partOfSpeech,
    frequency: item.frequency,
    status: item.status,
    timesReviewed: item.timesReviewed,
    confidenceLevel: item.confidenceLevel,
    notes: item.notes,
    createdAt: item.createdAt,
    updatedAt: item.updatedAt,
  });
}

export function userVocabularyItemFromRow(row: UserVocabularyItemEntity): UserVocabularyItem {
  return {
    id: row.id,
    userVocabularyId: row.userVocabularyId,
    term: row.term,
    lemma: row.lemma ?? null,
    stem: row.stem ?? null,
    partOfSpeech: row.partOfSpeech ?? null,
    frequency: row.frequency ?? null,
    status: row.status,
    timesReviewed: row.timesReviewed,
    confidenceLevel: row.confidenceLevel,
    notes: row.notes ?? null,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}
