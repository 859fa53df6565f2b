/**
 * ITextRepository — persistence port for reading texts and their tag associations.
 */
import type { IRepository } from './base.repository.interface';
import type { PageOptions } from './pagination';
import type { ProficiencyLevel } from '../models/enums';
import type { Text, TextDraft, TextReplacement } from '../models/text.model';

export interface ITextRepository extends IRepository<Text, TextDraft, TextReplacement> {
  getByLanguage(languageId: string, page?: PageOptions): Promise<Text[]>;

  getByUser(userId: string, page?: PageOptions): Promise<Text[]>;

  getByProficiencyLevel(level: ProficiencyLevel, page?: PageOptions): Promise<Text[]>;

  /** Texts with `isPublic = true`. */
  getPublicTexts(page?: PageOptions): Promise<Text[]>;

  /**
   * Case-insensitive substring match on the title.
   * Private texts are included.
   */
  searchByTitle(query: string, page?: PageOptions): Promise<Text[]>;

  /**
   * Texts carrying ANY of the given tags, each text at most once.
   * An empty `tagIds` list matches nothing.
   */
  getByTags(tagIds: string[], page?: PageOptions): Promise<Text[]>;

  /**
   * Attach a tag to a text.
   * @returns `false` when the text does not exist or already carries the tag.
   * @throws ConflictError when the tag does not exist.
   */
  addTag(textId: string, tagId: string): Promise<boolean>;

  /** @returns `false` when the association did not exist. */
  removeTag(textId: string, tagId: string): Promise<boolean>;

  /** Tag ids attached to a text, sorted. Empty for an unknown text. */
  getTagIds(textId: string): Promise<string[]>;
}
