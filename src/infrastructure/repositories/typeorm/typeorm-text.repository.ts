import type { ProficiencyLevel } from '../../../domain/models/enums';
import type { Text, TextDraft, TextReplacement } from '../../../domain/models/text.model';
import { resolvePage, type PageOptions } from '../../../domain/repositories/pagination';
import type { ITextRepository } from '../../../domain/repositories/text.repository.interface';
import { buildText, replaceText } from '../shared/entity-builders';
import { TextEntity, TextTagAssociationEntity, TextTagEntity } from './entities';
import { TypeOrmBaseRepository } from './typeorm-base.repository';
import { UNICODE_LOWER_FUNCTION } from './typeorm-connection';
import { textFromRow, textToRow } from './typeorm-row.mapper';

/** Escape LIKE wildcards so the query is matched literally. */
function likePattern(query: string): string {
  return `%${query.toLowerCase().replace(/[\\%_]/g, ch => `\\${ch}`)}%`;
}

export class TypeOrmTextRepository
  extends TypeOrmBaseRepository<Text, TextEntity, TextDraft, TextReplacement>
  implements ITextRepository
{
  protected readonly entityName = 'Text';
  protected readonly target = TextEntity;

  protected toRow(text: Text): TextEntity {
    return textToRow(text);
  }

  protected fromRow(row: TextEntity): Text {
    return textFromRow(row);
  }

  protected build(draft: TextDraft): Text {
    return buildText(draft);
  }

  protected replace(existing: Text, replacement: TextReplacement): Text {
    return replaceText(existing, replacement);
  }

  async getByLanguage(languageId: string, page?: PageOptions): Promise<Text[]> {
    return this.list('getByLanguage', page, qb => qb.where('row.languageId = :languageId', { languageId }));
  }

  async getByUser(userId: string, page?: PageOptions): Promise<Text[]> {
    return this.list('getByUser', page, qb => qb.where('row.userId = :userId', { userId }));
  }

  async getByProficiencyLevel(level: ProficiencyLevel, page?: PageOptions): Promise<Text[]> {
    return this.list('getByProficiencyLevel', page, qb => qb.where('row.proficiencyLevel = :level', { level }));
  }

  async getPublicTexts(page?: PageOptions): Promise<Text[]> {
    // better-sqlite3 binds no booleans; the column stores 1/0.
    return this.list('getPublicTexts', page, qb => qb.where('row.isPublic = :isPublic', { isPublic: 1 }));
  }

  async searchByTitle(query: string, page?: PageOptions): Promise<Text[]> {
    return this.list('searchByTitle', page, qb =>
      qb.where(`${UNICODE_LOWER_FUNCTION}(row.title) LIKE :pattern ESCAPE '\\'`, { pattern: likePattern(query) }),
    );
  }

  async getByTags(tagIds: string[], page?: PageOptions): Promise<Text[]> {
    const { skip, limit } = resolvePage(page);
    if (tagIds.length === 0 || limit === 0) return [];

    return this.execute('getByTags', undefined, async () => {
      const dataSource = await this.connection.getDataSource();
      const qb = this.select(dataSource.manager)
        .innerJoin(TextTagAssociationEntity, 'assoc', 'assoc.textId = row.id')
        .where('assoc.tagId IN (:...tagIds)', { tagIds: [...new Set(tagIds)] })
        .distinct(true);
      this.applyOrder(qb);
      const rows = await qb.offset(skip).limit(limit).getMany();
      return rows.map(row => this.fromRow(row));
    });
  }

  async addTag(textId: string, tagId: string): Promise<boolean> {
    return this.execute('addTag', textId, () =>
      this.connection.transaction(async manager => {
        const textCount = await manager.countBy(TextEntity, { id: textId });
        if (textCount === 0) return false;
        const attached = await manager.countBy(TextTagAssociationEntity, { textId, tagId });
        if (attached > 0) return false;
        // A missing tag fails the foreign key and surfaces as a ConflictError.
        await manager.insert(TextTagAssociationEntity, { textId, tagId });
        return true;
      }),
    );
  }

  async removeTag(textId: string, tagId: string): Promise<boolean> {
    return this.execute('removeTag', textId, async () => {
      const result = await this.connection.write(manager => manager.delete(TextTagAssociationEntity, { textId, tagId }));
      return (result.affected ?? 0) > 0;
    });
  }

  async getTagIds(textId: string): Promise<string[]> {
    return this.execute('getTagIds', textId, async () => {
      const dataSource = await this.connection.getDataSource();
      const rows = await dataSource.manager
        .createQueryBuilder(TextTagAssociationEntity, 'assoc')
        .innerJoin(TextTagEntity, 'tag', 'tag.id = assoc.tagId')
        .where('assoc.textId = :textId', { textId })
        .orderBy('assoc.tagId', 'ASC')
        .getMany();
      return rows.map(row => row.tagId);
    });
  }
}
