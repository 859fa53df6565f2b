/**
 * NestJS injection tokens for repository interfaces.
 *
 * Usage:
 *   @Inject(USER_REPOSITORY) private readonly users: IUserRepository
 */
import type { ILanguageRepository } from './language.repository.interface';
import type { ITextRepository } from './text.repository.interface';
import type { ITextTagRepository } from './text-tag.repository.interface';
import type { IUserLanguageRepository } from './user-language.repository.interface';
import type { IUserRepository } from './user.repository.interface';
import type {
  IUserVocabularyItemRepository,
  IUserVocabularyRepository,
} from './vocabulary.repository.interface';

export const LANGUAGE_REPOSITORY = 'LANGUAGE_REPOSITORY';
export const USER_REPOSITORY = 'USER_REPOSITORY';
export const TEXT_REPOSITORY = 'TEXT_REPOSITORY';
export const TEXT_TAG_REPOSITORY = 'TEXT_TAG_REPOSITORY';
export const USER_LANGUAGE_REPOSITORY = 'USER_LANGUAGE_REPOSITORY';
export const USER_VOCABULARY_REPOSITORY = 'USER_VOCABULARY_REPOSITORY';
export const USER_VOCABULARY_ITEM_REPOSITORY = 'USER_VOCABULARY_ITEM_REPOSITORY';

/** Token → interface served under it. */
export interface RepositoryMap {
  [LANGUAGE_REPOSITORY]: ILanguageRepository;
  [USER_REPOSITORY]: IUserRepository;
  [TEXT_REPOSITORY]: ITextRepository;
  [TEXT_TAG_REPOSITORY]: ITextTagRepository;
  [USER_LANGUAGE_REPOSITORY]: IUserLanguageRepository;
  [USER_VOCABULARY_REPOSITORY]: IUserVocabularyRepository;
  [USER_VOCABULARY_ITEM_REPOSITORY]: IUserVocabularyItemRepository;
}

export type RepositoryToken = keyof RepositoryMap;

export const REPOSITORY_TOKENS: readonly RepositoryToken[] = [
  LANGUAGE_REPOSITORY,
  USER_REPOSITORY,
  TEXT_REPOSITORY,
  TEXT_TAG_REPOSITORY,
  USER_LANGUAGE_REPOSITORY,
  USER_VOCABULARY_REPOSITORY,
  USER_VOCABULARY_ITEM_REPOSITORY,
];
