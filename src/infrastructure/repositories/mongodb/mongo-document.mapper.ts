/**
 * Domain entity ↔ MongoDB document conversion.
 *
 * The entity's `id` is stored as the document's `_id`; every mapper renames
 * it in both directions. Documents come back from a schemaless store, so the
 * readers check each field's type and raise MalformedDocumentError instead of
 * letting a bad value leak into the domain.
 */
import type { Document } from 'mongodb';

import {
  PARTS_OF_SPEECH,
  PROFICIENCY_LEVELS,
  VOCABULARY_STATUSES,
} from '../../../domain/models/enums';
import type { Language } from '../../../domain/models/language.model';
import type { Text } from '../../../domain/models/text.model';
import type { TextTag } from '../../../domain/models/text-tag.model';
import type { UserLanguage } from '../../../domain/models/user-language.model';
import type { User } from '../../../domain/models/user.model';
import type { UserVocabulary, UserVocabularyItem } from '../../../domain/models/vocabulary.model';

export class MalformedDocumentError extends Error {
  constructor(readonly collectionEntity: string, readonly field: string, expected: string) {
    super(`${collectionEntity} document has an invalid "${field}" (expected ${expected})`);
    this.name = 'MalformedDocumentError';
  }
}

/** Typed field access over an untyped document. */
export class DocumentReader {
  constructor(
    private readonly doc: Document,
    private readonly entity: string,
  ) {}

  id(): string {
    return this.string('_id');
  }

  string(field: string): string {
    const value: unknown = this.doc[field];
    if (typeof value !== 'string') throw new MalformedDocumentError(this.entity, field, 'string');
    return value;
  }

  nullableString(field: string): string | null {
    const value: unknown = this.doc[field];
    return value === null || value === undefined ? null : this.string(field);
  }

  number(field: string): number {
    const value: unknown = this.doc[field];
    if (typeof value !== 'number') throw new MalformedDocumentError(this.entity, field, 'number');
    return value;
  }

  nullableNumber(field: string): number | null {
    const value: unknown = this.doc[field];
    return value === null || value === undefined ? null : this.number(field);
  }

  boolean(field: string): boolean {
    const value: unknown = this.doc[field];
    if (typeof value !== 'boolean') throw new MalformedDocumentError(this.entity, field, 'boolean');
    return value;
  }

  date(field: string): Date {
    const value: unknown = this.doc[field];
    if (!(value instanceof Date)) throw new MalformedDocumentError(this.entity, field, 'date');
    return value;
  }

  nullableDate(field: string): Date | null {
    const value: unknown = this.doc[field];
    return value === null || value === undefined ? null : this.date(field);
  }

  oneOf<V extends string>(field: string, allowed: readonly V[]): V {
    const value: unknown = this.doc[field];
    const match = allowed.find(candidate => candidate === value);
    if (match === undefined) throw new MalformedDocumentError(this.entity, field, allowed.join('|'));
    return match;
  }

  nullableOneOf<V extends string>(field: string, allowed: readonly V[]): V | null {
    const value: unknown = this.doc[field];
    return value === null || value === undefined ? null : this.oneOf(field, allowed);
  }

  /** Missing arrays read as empty. */
  stringArray(field: string): string[] {
    const value: unknown = this.doc[field];
    if (value === undefined || value === null) return [];
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
      throw new MalformedDocumentError(this.entity, field, 'string[]');
    }
    return [...value];
  }
}

// ─── Language ───────────────────────────────────────────────────────

export function languageToDocument(language: Language): Document {
  return {
    _id: language.id,
    name: language.name,
    code: language.code,
    nativeName: language.nativeName,
    createdAt: language.createdAt,
  };
}

export function languageFromDocument(doc: Document): Language {
  const read = new DocumentReader(doc, 'Language');
  return {
    id: read.id(),
    name: read.string('name'),
    code: read.string('code'),
    nativeName: read.string('nativeName'),
    createdAt: read.date('createdAt'),
  };
}

// ─── User ───────────────────────────────────────────────────────────

export function userToDocument(user: User): Document {
  return {
    _id: user.id,
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
  };
}

export function userFromDocument(doc: Document): User {
  const read = new DocumentReader(doc, 'User');
  return {
    id: read.id(),
    email: read.string('email'),
    username: read.string('username'),
    passwordHash: read.string('passwordHash'),
    firstName: read.string('firstName'),
    lastName: read.string('lastName'),
    nativeLanguageId: read.string('nativeLanguageId'),
    currentLanguageId: read.string('currentLanguageId'),
    createdAt: read.date('createdAt'),
    updatedAt: read.date('updatedAt'),
    lastActiveAt: read.nullableDate('lastActiveAt'),
  };
}

// ─── Text ───────────────────────────────────────────────────────────

/** Tag ids are embedded on the text document under `tagIds` and are not part of the entity. */
export function textToDocument(text: Text): Document {
  return {
    _id: text.id,
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
  };
}

export function textFromDocument(doc: Document): Text {
  const read = new DocumentReader(doc, 'Text');
  return {
    id: read.id(),
    title: read.string('title'),
    content: read.string('content'),
    languageId: read.string('languageId'),
    userId: read.nullableString('userId'),
    proficiencyLevel: read.oneOf('proficiencyLevel', PROFICIENCY_LEVELS),
    wordCount: read.number('wordCount'),
    isPublic: read.boolean('isPublic'),
    source: read.nullableString('source'),
    createdAt: read.date('createdAt'),
    updatedAt: read.date('updatedAt'),
  };
}

export function textTagIdsFromDocument(doc: Document): string[] {
  return new DocumentReader(doc, 'Text').stringArray('tagIds');
}

// ─── TextTag ────────────────────────────────────────────────────────

export function textTagToDocument(tag: TextTag): Document {
  return { _id: tag.id, name: tag.name, description: tag.description };
}

export function textTagFromDocument(doc: Document): TextTag {
  const read = new DocumentReader(doc, 'TextTag');
  return { id: read.id(), name: read.string('name'), description: read.nullableString('description') };
}

// ─── UserLanguage ───────────────────────────────────────────────────

/** Composite key, so a duplicate pair also collides on `_id`. */
export function userLanguageDocumentId(userId: string, languageId: string): string {
  return `${userId}:${languageId}`;
}

export function userLanguageToDocument(entry: UserLanguage): Document {
  return {
    _id: userLanguageDocumentId(entry.userId, entry.languageId),
    userId: entry.userId,
    languageId: entry.languageId,
    proficiencyLevel: entry.proficiencyLevel,
    startedAt: entry.startedAt,
    createdAt: entry.createdAt,
    updatedAt: entry.updatedAt,
  };
}

export function userLanguageFromDocument(doc: Document): UserLanguage {
  const read = new DocumentReader(doc, 'UserLanguage');
  return {
    userId: read.string('userId'),
    languageId: read.string('languageId'),
    proficiencyLevel: read.oneOf('proficiencyLevel', PROFICIENCY_LEVELS),
    startedAt: read.date('startedAt'),
    createdAt: read.date('createdAt'),
    updatedAt: read.date('updatedAt'),
  };
}

// ─── Vocabulary ─────────────────────────────────────────────────────

export function userVocabularyToDocument(vocabulary: UserVocabulary): Document {
  return {
    _id: vocabulary.id,
    userId: vocabulary.userId,
    languageId: vocabulary.languageId,
    name: vocabulary.name,
    createdAt: vocabulary.createdAt,
    updatedAt: vocabulary.updatedAt,
  };
}

export function userVocabularyFromDocument(doc: Document): UserVocabulary {
  const read = new DocumentReader(doc, 'UserVocabulary');
  return {
    id: read.id(),
    userId: read.string('userId'),
    languageId: read.string('languageId'),
    name: read.string('name'),
    createdAt: read.date('createdAt'),
    updatedAt: read.date('updatedAt'),
  };
}

export function userVocabularyItemToDocument(item: UserVocabularyItem): Document {
  return {
    _id: item.id,
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
  };
}

export function userVocabularyItemFromDocument(doc: Document): UserVocabularyItem {
  const read = new DocumentReader(doc, 'UserVocabularyItem');
  return {
    id: read.id(),
    userVocabularyId: read.string('userVocabularyId'),
    term: read.string('term'),
    lemma: read.nullableString('lemma'),
    stem: read.nullableString('stem'),
    partOfSpeech: read.nullableOneOf('partOfSpeech', PARTS_OF_SPEECH),
    frequency: read.nullableNumber('frequency'),
    status: read.oneOf('status', VOCABULARY_STATUSES),
    timesReviewed: read.number('timesReviewed'),
    confidenceLevel: read.oneOf('confidenceLevel', PROFICIENCY_LEVELS),
    notes: read.nullableString('notes'),
    createdAt: read.date('createdAt'),
    updatedAt: read.date('updatedAt'),
  };
}
