/**
 * IUserLanguageRepository — the languages a user studies.
 *
 * Entries are keyed by (userId, languageId) rather than an opaque id, so this
 * port does not extend IRepository.
 */
import type { ProficiencyLevel } from '../models/enums';
import type { UserLanguage, UserLanguageDraft } from '../models/user-language.model';

export interface IUserLanguageRepository {
  /** @throws ConflictError when the pair already exists or a reference is missing. */
  create(draft: UserLanguageDraft): Promise<UserLanguage>;

  get(userId: string, languageId: string): Promise<UserLanguage | null>;

  /** Entries for one user, ordered by `startedAt` then `languageId`. */
  getByUser(userId: string): Promise<UserLanguage[]>;

  updateProficiency(userId: string, languageId: string, level: ProficiencyLevel): Promise<UserLanguage | null>;

  delete(userId: string, languageId: string): Promise<boolean>;
}
