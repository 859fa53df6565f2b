import { ConflictException, Inject, Injectable, NotFoundException } from '@nestjs/common';

import type { UserVocabulary } from '../../domain/models/vocabulary.model';
import type { PageOptions } from '../../domain/repositories/pagination';
import { USER_REPOSITORY, USER_VOCABULARY_REPOSITORY } from '../../domain/repositories/repository.tokens';
import type { IUserRepository } from '../../domain/repositories/user.repository.interface';
import type { IUserVocabularyRepository } from '../../domain/repositories/vocabulary.repository.interface';
import { rethrowConflict } from '../common/repository-conflict';
import { AppLogger } from '../logging/app-logger.service';
import { LogCategory } from '../logging/log-levels';
import type { CreateVocabularyDto, UpdateVocabularyDto } from './dto/vocabulary.dto';

@Injectable()
export class VocabulariesService {
  constructor(
    @Inject(USER_VOCABULARY_REPOSITORY) private readonly vocabularies: IUserVocabularyRepository,
    @Inject(USER_REPOSITORY) private readonly users: IUserRepository,
    private readonly logger: AppLogger,
  ) {}

  /** A user keeps one vocabulary per language. */
  async create(userId: string, dto: CreateVocabularyDto): Promise<UserVocabulary> {
    if (!(await this.users.exists(userId))) {
      throw new NotFoundException(`User with ID "${userId}" not found`);
    }
    if (await this.vocabularies.getByUserAndLanguage(userId, dto.languageId)) {
      throw new ConflictException(`User "${userId}" already has a vocabulary for language "${dto.languageId}"`);
    }

    const vocabulary = await rethrowConflict(
      this.vocabularies.create({ userId, languageId: dto.languageId, name: dto.name }),
      error =>
        error.constraint === 'reference'
          ? `Language with ID "${dto.languageId}" does not exist`
          : `User "${userId}" already has a vocabulary for language "${dto.languageId}"`,
    );
    this.logger.info(LogCategory.VOCABULARY, 'Vocabulary created', { vocabularyId: vocabulary.id, userId });
    return vocabulary;
  }

  async listForUser(userId: string, page: PageOptions): Promise<UserVocabulary[]> {
    return this.vocabularies.getByUser(userId, page);
  }

  async get(id: string): Promise<UserVocabulary> {
    const vocabulary = await this.vocabularies.getById(id);
    if (!vocabulary) {
      throw new NotFoundException(`Vocabulary with ID "${id}" not found`);
    }
    return vocabulary;
  }

  async update(id: string, dto: UpdateVocabularyDto): Promise<UserVocabulary> {
    const updated = await this.vocabularies.update(id, { name: dto.name });
    if (!updated) {
      throw new NotFoundException(`Vocabulary with ID "${id}" not found`);
    }
    return updated;
  }

  /** Removes the vocabulary's items with it. */
  async delete(id: string): Promise<void> {
    const deleted = await this.vocabularies.delete(id);
    if (!deleted) {
      throw new NotFoundException(`Vocabulary with ID "${id}" not found`);
    }
    this.logger.info(LogCategory.VOCABULARY, 'Vocabulary deleted', { vocabularyId: id });
  }
}
