import { ConflictException, Inject, Injectable, NotFoundException } from '@nestjs/common';

import type { TextTag } from '../../domain/models/text-tag.model';
import type { PageOptions } from '../../domain/repositories/pagination';
import { TEXT_TAG_REPOSITORY } from '../../domain/repositories/repository.tokens';
import type { ITextTagRepository } from '../../domain/repositories/text-tag.repository.interface';
import { rethrowConflict } from '../common/repository-conflict';
import { AppLogger } from '../logging/app-logger.service';
import { LogCategory } from '../logging/log-levels';
import type { TagDto } from './dto/tag.dto';

@Injectable()
export class TagsService {
  constructor(
    @Inject(TEXT_TAG_REPOSITORY) private readonly tags: ITextTagRepository,
    private readonly logger: AppLogger,
  ) {}

  async create(dto: TagDto): Promise<TextTag> {
    await this.assertNameAvailable(dto.name);
    const tag = await rethrowConflict(
      this.tags.create({ name: dto.name, description: dto.description ?? null }),
      `Tag "${dto.name}" already exists`,
    );
    this.logger.info(LogCategory.TAG, 'Tag created', { tagId: tag.id, name: tag.name });
    return tag;
  }

  /** Ordered by name. */
  async list(page: PageOptions): Promise<TextTag[]> {
    return this.tags.getAll(page);
  }

  async get(id: string): Promise<TextTag> {
    const tag = await this.tags.getById(id);
    if (!tag) {
      throw new NotFoundException(`Tag with ID "${id}" not found`);
    }
    return tag;
  }

  async update(id: string, dto: TagDto): Promise<TextTag> {
    const existing = await this.get(id);
    if (existing.name !== dto.name) {
      await this.assertNameAvailable(dto.name);
    }
    const updated = await rethrowConflict(
      this.tags.update(id, { name: dto.name, description: dto.description ?? null }),
      `Tag "${dto.name}" already exists`,
    );
    if (!updated) {
      throw new NotFoundException(`Tag with ID "${id}" not found`);
    }
    return updated;
  }

  /** Detaches the tag from every text. */
  async delete(id: string): Promise<void> {
    const deleted = await this.tags.delete(id);
    if (!deleted) {
      throw new NotFoundException(`Tag with ID "${id}" not found`);
    }
    this.logger.info(LogCategory.TAG, 'Tag deleted', { tagId: id });
  }

  private async assertNameAvailable(name: string): Promise<void> {
    if (await this.tags.nameExists(name)) {
      throw new ConflictException(`Tag "${name}" already exists`);
    }
  }
}
