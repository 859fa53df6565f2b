import type { Document, Sort } from 'mongodb';

import type { TextTag, TextTagDraft, TextTagReplacement } from '../../../domain/models/text-tag.model';
import type { ITextTagRepository } from '../../../domain/repositories/text-tag.repository.interface';
import { buildTextTag, replaceTextTag } from '../shared/entity-builders';
import { MongoBaseRepository } from './mongo-base.repository';
import { MONGO_COLLECTIONS } from './mongo-collections';
import { textTagFromDocument, textTagToDocument } from './mongo-document.mapper';

export class MongoTextTagRepository
  extends MongoBaseRepository<TextTag, TextTagDraft, TextTagReplacement>
  implements ITextTagRepository
{
  protected readonly entityName = 'TextTag';
  protected readonly collectionName = MONGO_COLLECTIONS.textTags;
  protected readonly sort: Sort = { name: 1, _id: 1 };

  protected toDocument(tag: TextTag): Document {
    return textTagToDocument(tag);
  }

  protected fromDocument(doc: Document): TextTag {
    return textTagFromDocument(doc);
  }

  protected build(draft: TextTagDraft): TextTag {
    return buildTextTag(draft);
  }

  protected replace(existing: TextTag, replacement: TextTagReplacement): TextTag {
    return replaceTextTag(existing, replacement);
  }

  async getByName(name: string): Promise<TextTag | null> {
    return this.findOne('getByName', { name });
  }

  async nameExists(name: string): Promise<boolean> {
    return this.count('nameExists', { name });
  }

  /** Tag ids live on the text documents. */
  protected async afterDelete(id: string): Promise<void> {
    const texts = await this.collection(MONGO_COLLECTIONS.texts);
    await texts.updateMany({ tagIds: id }, { $pull: { tagIds: id } });
  }
}
