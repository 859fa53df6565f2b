import { ConflictException, Inject, Injectable, NotFoundException } from '@nestjs/common';

import type { UserVocabularyItem } from '../../domain/models/vocabulary.model';
import {
  USER_VOCABULARY_ITEM_REPOSITORY,
  USER_VOCABULARY_REPOSITORY,
} from '../../domain/repositories/repository.tokens';
import type {
  IUserVocabularyItemRepository,
  IUserVocabularyRepository,
} from '../../domain/repositories/vocabulary.repository.interface';
import { rethrowConflict } from '../common/repository-conflict';
import { AppLogger } from '../logging/app-logger.service';
import { LogCategory } from '../logging/log-levels';
import type {
  CreateVocabularyItemDto,
  UpdateVocabularyItemDto,
  VocabularyItemQueryDto,
} from './dto/vocabulary-item.dto';

@Injectable()
export class VocabularyItemsService {
  constructor(
    @Inject(USER_VOCABULARY_ITEM_REPOSITORY) private readonly items: IUserVocabularyItemRepository,
    @Inject(USER_VOCABULARY_REPOSITORY) private readonly vocabularies: IUserVocabularyRepository,
    private readonly logger: AppLogger,
  ) {}

  async add(vocabularyId: string, dto: CreateVocabularyItemDto): Promise<UserVocabularyItem> {
    if (!(await this.vocabularies.exists(vocabularyId))) {
      throw new NotFoundException(`Vocabulary with ID "${vocabularyId}" not found`);
    }
    await this.assertTermAvailable(vocabularyId, dto.term);

    const item = await rethrowConflict(
      this.items.create({
        userVocabularyId: vocabularyId,
        term: dto.term,
        lemma: dto.lemma ?? null,
        stem: dto.stem ?? null,
        partOfSpeech: dto.partOfSpeech ?? null,
        frequency: dto.frequency ?? null,
        status: dto.status,
        confidenceLevel: dto.confidenceLevel,
        notes: dto.notes ?? null,
      }),
      `Term "${dto.term}" is already in vocabulary "${vocabularyId}"`,
    );
    this.logger.info(LogCategory.VOCABULARY, 'Vocabulary item added', { itemId: item.id, vocabularyId });
    return item;
  }

  async list(vocabularyId: string, query: VocabularyItemQueryDto): Promise<UserVocabularyItem[]> {
    const page = { skip: query.skip, limit: query.limit };
    return query.status !== undefined
      ? this.items.getByStatus(vocabularyId, query.status, page)
      : this.items.getByVocabulary(vocabularyId, page);
  }

  async get(id: string): Promise<UserVocabularyItem> {
    const item = await this.items.getById(id);
    if (!item) {
      throw new NotFoundException(`Vocabulary item with ID "${id}" not found`);
    }
    return item;
  }

  async update(id: string, dto: UpdateVocabularyItemDto): Promise<UserVocabularyItem> {
    const existing = await this.get(id);
    if (existing.term !== dto.term) {
      await this.assertTermAvailable(existing.userVocabularyId, dto.term);
    }
    const updated = await rethrowConflict(
      this.items.update(id, {
        term: dto.term,
        lemma: dto.lemma ?? null,
        stem: dto.stem ?? null,
        partOfSpeech: dto.partOfSpeech ?? null,
        frequency: dto.frequency ?? null,
        status: dto.status,
        timesReviewed: dto.timesReviewed,
        confidenceLevel: dto.confidenceLevel,
        notes: dto.notes ?? null,
      }),
      `Term "${dto.term}" is already in vocabulary "${existing.userVocabularyId}"`,
    );
    if (!updated) {
      throw new NotFoundException(`Vocabulary item with ID "${id}" not found`);
    }
    return updated;
  }

  async delete(id: string): Promise<void> {
    const deleted = await this.items.delete(id);
    if (!deleted) {
      throw new NotFoundException(`Vocabulary item with ID "${id}" not found`);
    }
  }

  async recordReview(id: string): Promise<UserVocabularyItem> {
    const reviewed = await this.items.recordReview(id);
    if (!reviewed) {
      throw new NotFoundException(`Vocabulary item with ID "${id}" not found`);
    }
    this.logger.debug(LogCategory.VOCABULARY, 'Review recorded', {
      itemId: id,
      timesReviewed: reviewed.timesReviewed,
    });
    return reviewed;
  }

  private async assertTermAvailable(vocabularyId: string, term: string): Promise<void> {
    if (await this.items.getByTerm(vocabularyId, term)) {
      throw new ConflictException(`Term "${term}" is already in vocabulary "${vocabularyId}"`);
    }
  }
}
