import type { PartOfSpeech, ProficiencyLevel, VocabularyStatus } from './enums';

/**
 * Named collection of tracked words. A user has at most one per language.
 */
export interface UserVocabulary {
  id: string;
  userId: string;
  languageId: string;
  name: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface UserVocabularyDraft {
  id?: string;
  userId: string;
  languageId: string;
  name: string;
  createdAt?: Date;
  updatedAt?: Date;
}

export type UserVocabularyReplacement = Pick<UserVocabulary, 'name'>;

/**
 * A single word tracked inside a vocabulary. `term` is unique within its vocabulary.
 */
export interface UserVocabularyItem {
  id: string;
  userVocabularyId: string;
  term: string;
  lemma: string | null;
  stem: string | null;
  partOfSpeech: PartOfSpeech | null;
  /** Corpus frequency score */
  frequency: number | null;
  status: VocabularyStatus;
  timesReviewed: number;
  confidenceLevel: ProficiencyLevel;
  notes: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface UserVocabularyItemDraft {
  id?: string;
  userVocabularyId: string;
  term: string;
  lemma?: string | null;
  stem?: string | null;
  partOfSpeech?: PartOfSpeech | null;
  frequency?: number | null;
  /** Defaults to NEW */
  status?: VocabularyStatus;
  /** Defaults to 0 */
  timesReviewed?: number;
  /** Defaults to A1 */
  confidenceLevel?: ProficiencyLevel;
  notes?: string | null;
  createdAt?: Date;
  updatedAt?: Date;
}

export type UserVocabularyItemReplacement = Pick<
  UserVocabularyItem,
  | 'term'
  | 'lemma'
  | 'stem'
  | 'partOfSpeech'
  | 'frequency'
  | 'status'
  | 'timesReviewed'
  | 'confidenceLevel'
  | 'notes'
>;
