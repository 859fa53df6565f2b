import type { Language, LanguageDraft, LanguageReplacement } from '../../../domain/models/language.model';
import type { ILanguageRepository } from '../../../domain/repositories/language.repository.interface';
import { buildLanguage, replaceLanguage } from '../shared/entity-builders';
import { LanguageEntity } from './entities';
import { TypeOrmBaseRepository } from './typeorm-base.repository';
import { languageFromRow, languageToRow } from './typeorm-row.mapper';

export class TypeOrmLanguageRepository
  extends TypeOrmBaseRepository<Language, LanguageEntity, LanguageDraft, LanguageReplacement>
  implements ILanguageRepository
{
  protected readonly entityName = 'Language';
  protected readonly target = LanguageEntity;

  protected toRow(language: Language): LanguageEntity {
    return languageToRow(language);
  }

  protected fromRow(row: LanguageEntity): Language {
    return languageFromRow(row);
  }

  protected build(draft: LanguageDraft): Language {
    return buildLanguage(draft);
  }

  protected replace(existing: Language, replacement: LanguageReplacement): Language {
    return replaceLanguage(existing, replacement);
  }

  async getByCode(code: string): Promise<Language | null> {
    return this.findOne('getByCode', 'row.code = :code', { code });
  }

  async getByName(name: string): Promise<Language | null> {
    return this.findOne('getByName', 'row.name = :name', { name });
  }

  async codeExists(code: string): Promise<boolean> {
    return this.count('codeExists', 'row.code = :code', { code });
  }
}
