import { Inject, Injectable, NotFoundException } from '@nestjs/common';

import type { ConflictError } from '../../domain/errors/repository.errors';
import type { Text } from '../../domain/models/text.model';
import type { PageOptions } from '../../domain/repositories/pagination';
import { TEXT_REPOSITORY, TEXT_TAG_REPOSITORY } from '../../domain/repositories/repository.tokens';
import type { ITextTagRepository } from '../../domain/repositories/text-tag.repository.interface';
import type { ITextRepository } from '../../domain/repositories/text.repository.interface';
import { rethrowConflict } from '../common/repository-conflict';
import { AppLogger } from '../logging/app-logger.service';
import { LogCategory } from '../logging/log-levels';
import type { TextDto, UpdateTextDto } from './dto/text.dto';
import type { TextQueryDto } from './dto/text-query.dto';
import type { TextWithTags } from './text.response';

function describeTextConflict(error: ConflictError): string {
  return error.constraint === 'reference' ? 'Language or author does not exist' : 'Text conflicts with an existing text';
}

@Injectable()
export class TextsService {
  constructor(
    @Inject(TEXT_REPOSITORY) private readonly texts: ITextRepository,
    @Inject(TEXT_TAG_REPOSITORY) private readonly tags: ITextTagRepository,
    private readonly logger: AppLogger,
  ) {}

  async create(dto: TextDto): Promise<Text> {
    const text = await rethrowConflict(
      this.texts.create({
        title: dto.title,
        content: dto.content,
        languageId: dto.languageId,
        userId: dto.userId ?? null,
        proficiencyLevel: dto.proficiencyLevel,
        wordCount: dto.wordCount,
        isPublic: dto.isPublic ?? true,
        source: dto.source ?? null,
      }),
      describeTextConflict,
    );
    this.logger.info(LogCategory.TEXT, 'Text created', { textId: text.id, languageId: text.languageId });
    return text;
  }

  /** The first filter present in the query decides the lookup. */
  async list(query: TextQueryDto): Promise<Text[]> {
    const page: PageOptions = { skip: query.skip, limit: query.limit };
    if (query.tagIds !== undefined) return this.texts.getByTags(query.tagIds, page);
    if (query.languageId !== undefined) return this.texts.getByLanguage(query.languageId, page);
    if (query.userId !== undefined) return this.texts.getByUser(query.userId, page);
    if (query.proficiencyLevel !== undefined) return this.texts.getByProficiencyLevel(query.proficiencyLevel, page);
    if (query.publicOnly === true) return this.texts.getPublicTexts(page);
    return this.texts.getAll(page);
  }

  async search(q: string, page: PageOptions): Promise<Text[]> {
    return this.texts.searchByTitle(q, page);
  }

  async get(id: string): Promise<TextWithTags> {
    const text = await this.texts.getById(id);
    if (!text) {
      throw new NotFoundException(`Text with ID "${id}" not found`);
    }
    const tagIds = await this.texts.getTagIds(id);
    return { ...text, tagIds };
  }

  /** Fields missing from the body keep their stored values. */
  async update(id: string, dto: UpdateTextDto): Promise<Text> {
    const existing = await this.texts.getById(id);
    if (!existing) {
      throw new NotFoundException(`Text with ID "${id}" not found`);
    }
    const updated = await rethrowConflict(
      this.texts.update(id, {
        title: dto.title ?? existing.title,
        content: dto.content ?? existing.content,
        languageId: dto.languageId ?? existing.languageId,
        userId: dto.userId === undefined ? existing.userId : dto.userId,
        proficiencyLevel: dto.proficiencyLevel ?? existing.proficiencyLevel,
        wordCount: dto.wordCount ?? existing.wordCount,
        isPublic: dto.isPublic ?? existing.isPublic,
        source: dto.source === undefined ? existing.source : dto.source,
      }),
      describeTextConflict,
    );
    if (!updated) {
      throw new NotFoundException(`Text with ID "${id}" not found`);
    }
    this.logger.info(LogCategory.TEXT, 'Text updated', { textId: id });
    return updated;
  }

  async delete(id: string): Promise<void> {
    const deleted = await this.texts.delete(id);
    if (!deleted) {
      throw new NotFoundException(`Text with ID "${id}" not found`);
    }
    this.logger.info(LogCategory.TEXT, 'Text deleted', { textId: id });
  }

  /** Attaching a tag that is already attached succeeds without change. */
  async addTag(textId: string, tagId: string): Promise<void> {
    if (!(await this.texts.exists(textId))) {
      throw new NotFoundException(`Text with ID "${textId}" not found`);
    }
    if (!(await this.tags.exists(tagId))) {
      throw new NotFoundException(`Tag with ID "${tagId}" not found`);
    }
    const added = await rethrowConflict(this.texts.addTag(textId, tagId), `Tag with ID "${tagId}" does not exist`);
    if (added) {
      this.logger.info(LogCategory.TEXT, 'Text tagged', { textId, tagId });
    }
  }

  async removeTag(textId: string, tagId: string): Promise<void> {
    const removed = await this.texts.removeTag(textId, tagId);
    if (!removed) {
      throw new NotFoundException(`Text "${textId}" does not carry tag "${tagId}"`);
    }
    this.logger.info(LogCategory.TEXT, 'Text untagged', { textId, tagId });
  }
}
