import type { ProficiencyLevel } from './enums';

/**
 * Reading text. `userId` is null for system-authored content.
 */
export interface Text {
  id: string;
  title: string;
  content: string;
  languageId: string;
  userId: string | null;
  proficiencyLevel: ProficiencyLevel;
  wordCount: number;
  isPublic: boolean;
  source: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface TextDraft {
  id?: string;
  title: string;
  content: string;
  languageId: string;
  userId?: string | null;
  proficiencyLevel: ProficiencyLevel;
  wordCount: number;
  /** Defaults to true */
  isPublic?: boolean;
  source?: string | null;
  createdAt?: Date;
  updatedAt?: Date;
}

export type TextReplacement = Pick<
  Text,
  'title' | 'content' | 'languageId' | 'userId' | 'proficiencyLevel' | 'wordCount' | 'isPublic' | 'source'
>;
