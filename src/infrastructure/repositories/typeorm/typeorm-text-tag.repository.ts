import type { TextTag, TextTagDraft, TextTagReplacement } from '../../../domain/models/text-tag.model';
import type { ITextTagRepository } from '../../../domain/repositories/text-tag.repository.interface';
import { buildTextTag, replaceTextTag } from '../shared/entity-builders';
import { TextTagEntity } from './entities';
import { TypeOrmBaseRepository } from './typeorm-base.repository';
import { textTagFromRow, textTagToRow } from './typeorm-row.mapper';

/** Deleting a tag removes its text associations through ON DELETE CASCADE. */
export class TypeOrmTextTagRepository
  extends TypeOrmBaseRepository<TextTag, TextTagEntity, TextTagDraft, TextTagReplacement>
  implements ITextTagRepository
{
  protected readonly entityName = 'TextTag';
  protected readonly target = TextTagEntity;
  protected readonly orderColumns = ['name', 'id'];

  protected toRow(tag: TextTag): TextTagEntity {
    return textTagToRow(tag);
  }

  protected fromRow(row: TextTagEntity): TextTag {
    return textTagFromRow(row);
  }

  protected build(draft: TextTagDraft): TextTag {
    return buildTextTag(draft);
  }

  protected replace(existing: TextTag, replacement: TextTagReplacement): TextTag {
    return replaceTextTag(existing, replacement);
  }

  async getByName(name: string): Promise<TextTag | null> {
    return this.findOne('getByName', 'row.name = :name', { name });
  }

  async nameExists(name: string): Promise<boolean> {
    return this.count('nameExists', 'row.name = :name', { name });
  }
}
