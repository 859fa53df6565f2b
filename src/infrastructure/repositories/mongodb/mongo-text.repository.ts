import type { Document } from 'mongodb';

import { ConflictError } from '../../../domain/errors/repository.errors';
import type { ProficiencyLevel } from '../../../domain/models/enums';
import type { Text, TextDraft, TextReplacement } from '../../../domain/models/text.model';
import type { PageOptions } from '../../../domain/repositories/pagination';
import type { ITextRepository } from '../../../domain/repositories/text.repository.interface';
import { buildText, replaceText } from '../shared/entity-builders';
import { MongoBaseRepository, escapeRegExp } from './mongo-base.repository';
import { MONGO_COLLECTIONS } from './mongo-collections';
import { textFromDocument, textTagIdsFromDocument, textToDocument } from './mongo-document.mapper';

/**
 * Tag associations are embedded on each text as a `tagIds` array. Updates
 * `$set` only the mapped text fields, so the array survives them.
 */
export class MongoTextRepository extends MongoBaseRepository<Text, TextDraft, TextReplacement> implements ITextRepository {
  protected readonly entityName = 'Text';
  protected readonly collectionName = MONGO_COLLECTIONS.texts;

  protected toDocument(text: Text): Document {
    return textToDocument(text);
  }

  protected fromDocument(doc: Document): Text {
    return textFromDocument(doc);
  }

  protected build(draft: TextDraft): Text {
    return buildText(draft);
  }

  protected replace(existing: Text, replacement: TextReplacement): Text {
    return replaceText(existing, replacement);
  }

  async getByLanguage(languageId: string, page?: PageOptions): Promise<Text[]> {
    return this.list('getByLanguage', { languageId }, page);
  }

  async getByUser(userId: string, page?: PageOptions): Promise<Text[]> {
    return this.list('getByUser', { userId }, page);
  }

  async getByProficiencyLevel(level: ProficiencyLevel, page?: PageOptions): Promise<Text[]> {
    return this.list('getByProficiencyLevel', { proficiencyLevel: level }, page);
  }

  async getPublicTexts(page?: PageOptions): Promise<Text[]> {
    return this.list('getPublicTexts', { isPublic: true }, page);
  }

  async searchByTitle(query: string, page?: PageOptions): Promise<Text[]> {
    return this.list('searchByTitle', { title: { $regex: escapeRegExp(query), $options: 'i' } }, page);
  }

  async getByTags(tagIds: string[], page?: PageOptions): Promise<Text[]> {
    if (tagIds.length === 0) return [];
    return this.list('getByTags', { tagIds: { $in: [...new Set(tagIds)] } }, page);
  }

  async addTag(textId: string, tagId: string): Promise<boolean> {
    return this.execute('addTag', textId, async () => {
      const texts = await this.collection();
      const text = await texts.findOne({ _id: textId }, { projection: { _id: 1 } });
      if (!text) return false;

      const tags = await this.collection(MONGO_COLLECTIONS.textTags);
      if ((await tags.countDocuments({ _id: tagId }, { limit: 1 })) === 0) {
        throw new ConflictError(`TextTag ${tagId} does not exist`, {
          operation: 'addTag',
          entity: this.entityName,
          entityId: textId,
          constraint: 'reference',
        });
      }

      const result = await texts.updateOne({ _id: textId }, { $addToSet: { tagIds: tagId } });
      return result.modifiedCount > 0;
    });
  }

  async removeTag(textId: string, tagId: string): Promise<boolean> {
    return this.execute('removeTag', textId, async () => {
      const texts = await this.collection();
      const result = await texts.updateOne({ _id: textId }, { $pull: { tagIds: tagId } });
      return result.modifiedCount > 0;
    });
  }

  async getTagIds(textId: string): Promise<string[]> {
    return this.execute('getTagIds', textId, async () => {
      const texts = await this.collection();
      const doc = await texts.findOne({ _id: textId }, { projection: { tagIds: 1 } });
      return doc ? textTagIdsFromDocument(doc).sort() : [];
    });
  }
}
