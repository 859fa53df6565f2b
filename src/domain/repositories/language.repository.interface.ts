import type { IRepository } from './base.repository.interface';
import type { Language, LanguageDraft, LanguageReplacement } from '../models/language.model';

export interface ILanguageRepository extends IRepository<Language, LanguageDraft, LanguageReplacement> {
  getByCode(code: string): Promise<Language | null>;

  /** Exact, case-sensitive match. */
  getByName(name: string): Promise<Language | null>;

  /** Pre-flight uniqueness check used by services before create/update. */
  codeExists(code: string): Promise<boolean>;
}
