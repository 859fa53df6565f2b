import type { Document } from 'mongodb';

import type { Language, LanguageDraft, LanguageReplacement } from '../../../domain/models/language.model';
import type { ILanguageRepository } from '../../../domain/repositories/language.repository.interface';
import { buildLanguage, replaceLanguage } from '../shared/entity-builders';
import { MongoBaseRepository } from './mongo-base.repository';
import { MONGO_COLLECTIONS } from './mongo-collections';
import { languageFromDocument, languageToDocument } from './mongo-document.mapper';

/**
 * Users and texts that reference a deleted language are left in place; the
 * document store does not restrict the delete the way the relational schema does.
 */
export class MongoLanguageRepository
  extends MongoBaseRepository<Language, LanguageDraft, LanguageReplacement>
  implements ILanguageRepository
{
  protected readonly entityName = 'Language';
  protected readonly collectionName = MONGO_COLLECTIONS.languages;

  protected toDocument(language: Language): Document {
    return languageToDocument(language);
  }

  protected fromDocument(doc: Document): Language {
    return languageFromDocument(doc);
  }

  protected build(draft: LanguageDraft): Language {
    return buildLanguage(draft);
  }

  protected replace(existing: Language, replacement: LanguageReplacement): Language {
    return replaceLanguage(existing, replacement);
  }

  async getByCode(code: string): Promise<Language | null> {
    return this.findOne('getByCode', { code });
  }

  async getByName(name: string): Promise<Language | null> {
    return this.findOne('getByName', { name });
  }

  async codeExists(code: string): Promise<boolean> {
    return this.count('codeExists', { code });
  }

  protected async afterDelete(id: string): Promise<void> {
    const userLanguages = await this.collection(MONGO_COLLECTIONS.userLanguages);
    await userLanguages.deleteMany({ languageId: id });
  }
}
