import type { IRepository } from './base.repository.interface';
import type { TextTag, TextTagDraft, TextTagReplacement } from '../models/text-tag.model';

export interface ITextTagRepository extends IRepository<TextTag, TextTagDraft, TextTagReplacement> {
  getByName(name: string): Promise<TextTag | null>;

  nameExists(name: string): Promise<boolean>;
}
