import type { IRepository } from './base.repository.interface';
import type { PageOptions } from './pagination';
import type { VocabularyStatus } from '../models/enums';
import type {
  UserVocabulary,
  UserVocabularyDraft,
  UserVocabularyItem,
  UserVocabularyItemDraft,
  UserVocabularyItemReplacement,
  UserVocabularyReplacement,
} from '../models/vocabulary.model';

/** Per-user, per-language word collections. (userId, languageId) is unique. */
export interface IUserVocabularyRepository
  extends IRepository<UserVocabulary, UserVocabularyDraft, UserVocabularyReplacement> {
  getByUser(userId: string, page?: PageOptions): Promise<UserVocabulary[]>;

  getByUserAndLanguage(userId: string, languageId: string): Promise<UserVocabulary | null>;
}

/** Words inside a vocabulary. (userVocabularyId, term) is unique. */
export interface IUserVocabularyItemRepository
  extends IRepository<UserVocabularyItem, UserVocabularyItemDraft, UserVocabularyItemReplacement> {
  getByVocabulary(vocabularyId: string, page?: PageOptions): Promise<UserVocabularyItem[]>;

  getByTerm(vocabularyId: string, term: string): Promise<UserVocabularyItem | null>;

  getByStatus(vocabularyId: string, status: VocabularyStatus, page?: PageOptions): Promise<UserVocabularyItem[]>;

  /** Increment `timesReviewed` atomically. `null` when the item is absent. */
  recordReview(id: string): Promise<UserVocabularyItem | null>;
}
