/**
 * Backend-independent construction and replacement of domain entities.
 *
 * Both backends call these so that generated identities, default values and
 * timestamp rules stay identical whichever storage is active. Replacements
 * copy only the mutable fields, never `id` or `createdAt`.
 */
import { randomUUID } from 'node:crypto';

import type { Language, LanguageDraft, LanguageReplacement } from '../../../domain/models/language.model';
import type { Text, TextDraft, TextReplacement } from '../../../domain/models/text.model';
import type { TextTag, TextTagDraft, TextTagReplacement } from '../../../domain/models/text-tag.model';
import type { UserLanguage, UserLanguageDraft } from '../../../domain/models/user-language.model';
import type { User, UserDraft, UserReplacement } from '../../../domain/models/user.model';
import type {
  UserVocabulary,
  UserVocabularyDraft,
  UserVocabularyItem,
  UserVocabularyItemDraft,
  UserVocabularyItemReplacement,
  UserVocabularyReplacement,
} from '../../../domain/models/vocabulary.model';

/** Opaque identity for new records. */
export function newId(): string {
  return randomUUID();
}

// ─── Language ───────────────────────────────────────────────────────

export function buildLanguage(draft: LanguageDraft, now = new Date()): Language {
  return {
    id: draft.id ?? newId(),
    name: draft.name,
    code: draft.code,
    nativeName: draft.nativeName,
    createdAt: draft.createdAt ?? now,
  };
}

export function replaceLanguage(existing: Language, replacement: LanguageReplacement): Language {
  return {
    ...existing,
    name: replacement.name,
    code: replacement.code,
    nativeName: replacement.nativeName,
  };
}

// ─── User ───────────────────────────────────────────────────────────

export function buildUser(draft: UserDraft, now = new Date()): User {
  const createdAt = draft.createdAt ?? now;
  return {
    id: draft.id ?? newId(),
    email: draft.email,
    username: draft.username,
    passwordHash: draft.passwordHash,
    firstName: draft.firstName,
    lastName: draft.lastName,
    nativeLanguageId: draft.nativeLanguageId,
    currentLanguageId: draft.currentLanguageId,
    createdAt,
    updatedAt: draft.updatedAt ?? createdAt,
    lastActiveAt: draft.lastActiveAt ?? null,
  };
}

export function replaceUser(existing: User, replacement: UserReplacement, now = new Date()): User {
  return {
    ...existing,
    email: replacement.email,
    username: replacement.username,
    passwordHash: replacement.passwordHash,
    firstName: replacement.firstName,
    lastName: replacement.lastName,
    nativeLanguageId: replacement.nativeLanguageId,
    currentLanguageId: replacement.currentLanguageId,
    lastActiveAt: replacement.lastActiveAt,
    updatedAt: now,
  };
}

// ─── Text ───────────────────────────────────────────────────────────

export function buildText(draft: TextDraft, now = new Date()): Text {
  const createdAt = draft.createdAt ?? now;
  return {
    id: draft.id ?? newId(),
    title: draft.title,
    content: draft.content,
    languageId: draft.languageId,
    userId: draft.userId ?? null,
    proficiencyLevel: draft.proficiencyLevel,
    wordCount: draft.wordCount,
    isPublic: draft.isPublic ?? true,
    source: draft.source ?? null,
    createdAt,
    updatedAt: draft.updatedAt ?? createdAt,
  };
}

export function replaceText(existing: Text, replacement: TextReplacement, now = new Date()): Text {
  return {
    ...existing,
    title: replacement.title,
    content: replacement.content,
    languageId: replacement.languageId,
    userId: replacement.userId,
    proficiencyLevel: replacement.proficiencyLevel,
    wordCount: replacement.wordCount,
    isPublic: replacement.isPublic,
    source: replacement.source,
    updatedAt: now,
  };
}

// ─── TextTag ────────────────────────────────────────────────────────

export function buildTextTag(draft: TextTagDraft): TextTag {
  return {
    id: draft.id ?? newId(),
    name: draft.name,
    description: draft.description ?? null,
  };
}

export function replaceTextTag(existing: TextTag, replacement: TextTagReplacement): TextTag {
  return { ...existing, name: replacement.name, description: replacement.description };
}

// ─── UserLanguage ───────────────────────────────────────────────────

export function buildUserLanguage(draft: UserLanguageDraft, now = new Date()): UserLanguage {
  const createdAt = draft.createdAt ?? now;
  return {
    userId: draft.userId,
    languageId: draft.languageId,
    proficiencyLevel: draft.proficiencyLevel,
    startedAt: draft.startedAt ?? createdAt,
    createdAt,
    updatedAt: draft.updatedAt ?? createdAt,
  };
}

// ─── Vocabulary ─────────────────────────────────────────────────────

export function buildUserVocabulary(draft: UserVocabularyDraft, now = new Date()): UserVocabulary {
  const createdAt = draft.createdAt ?? now;
  return {
    id: draft.id ?? newId(),
    userId: draft.userId,
    languageId: draft.languageId,
    name: draft.name,
    createdAt,
    updatedAt: draft.updatedAt ?? createdAt,
  };
}

export function replaceUserVocabulary(
  existing: UserVocabulary,
  replacement: UserVocabularyReplacement,
  now = new Date(),
): UserVocabulary {
  return { ...existing, name: replacement.name, updatedAt: now };
}

export function buildUserVocabularyItem(draft: UserVocabularyItemDraft, now = new Date()): UserVocabularyItem {
  const createdAt = draft.createdAt ?? now;
  return {
    id: draft.id ?? newId(),
    userVocabularyId: draft.userVocabularyId,
    term: draft.term,
    lemma: draft.lemma ?? null,
    stem: draft.stem ?? null,
    partOfSpeech: draft.partOfSpeech ?? null,
    frequency: draft.frequency ?? null,
    status: draft.status ?? 'NEW',
    timesReviewed: draft.timesReviewed ?? 0,
    confidenceLevel: draft.confidenceLevel ?? 'A1',
    notes: draft.notes ?? null,
    createdAt,
    updatedAt: draft.updatedAt ?? createdAt,
  };
}

export function replaceUserVocabularyItem(
  existing: UserVocabularyItem,
  replacement: UserVocabularyItemReplacement,
  now = new Date(),
): UserVocabularyItem {
  return {
    ...existing,
    term: replacement.term,
    lemma: replacement.lemma,
    stem: replacement.stem,
    partOfSpeech: replacement.partOfSpeech,
    frequency: replacement.frequency,
    status: replacement.status,
    timesReviewed: replacement.timesReviewed,
    confidenceLevel: replacement.confidenceLevel,
    notes: replacement.notes,
    updatedAt: now,
  };
}
