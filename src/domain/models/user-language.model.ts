import type { ProficiencyLevel } from './enums';

/**
 * A language a user is learning. Identified by the (userId, languageId) pair.
 */
export interface UserLanguage {
  userId: string;
  languageId: string;
  proficiencyLevel: ProficiencyLevel;
  startedAt: Date;
  createdAt: Date;
  updatedAt: Date;
}

export interface UserLanguageDraft {
  userId: string;
  languageId: string;
  proficiencyLevel: ProficiencyLevel;
  startedAt?: Date;
  createdAt?: Date;
  updatedAt?: Date;
}
