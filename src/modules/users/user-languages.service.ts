import { Inject, Injectable, NotFoundException } from '@nestjs/common';

import type { UserLanguage } from '../../domain/models/user-language.model';
import type { ILanguageRepository } from '../../domain/repositories/language.repository.interface';
import {
  LANGUAGE_REPOSITORY,
  USER_LANGUAGE_REPOSITORY,
  USER_REPOSITORY,
} from '../../domain/repositories/repository.tokens';
import type { IUserLanguageRepository } from '../../domain/repositories/user-language.repository.interface';
import type { IUserRepository } from '../../domain/repositories/user.repository.interface';
import { rethrowConflict } from '../common/repository-conflict';
import { AppLogger } from '../logging/app-logger.service';
import { LogCategory } from '../logging/log-levels';
import type { UserLanguageDto } from './dto/user-language.dto';

/** The languages a user studies, with their proficiency in each. */
@Injectable()
export class UserLanguagesService {
  constructor(
    @Inject(USER_LANGUAGE_REPOSITORY) private readonly userLanguages: IUserLanguageRepository,
    @Inject(USER_REPOSITORY) private readonly users: IUserRepository,
    @Inject(LANGUAGE_REPOSITORY) private readonly languages: ILanguageRepository,
    private readonly logger: AppLogger,
  ) {}

  async list(userId: string): Promise<UserLanguage[]> {
    return this.userLanguages.getByUser(userId);
  }

  /** Set the proficiency for a language, adding the language to the user's list if needed. */
  async upsert(userId: string, languageId: string, dto: UserLanguageDto): Promise<UserLanguage> {
    const updated = await this.userLanguages.updateProficiency(userId, languageId, dto.proficiencyLevel);
    if (updated) {
      this.logger.info(LogCategory.USER, 'Study language updated', { userId, languageId });
      return updated;
    }

    if (!(await this.users.exists(userId))) {
      throw new NotFoundException(`User with ID "${userId}" not found`);
    }
    if (!(await this.languages.exists(languageId))) {
      throw new NotFoundException(`Language with ID "${languageId}" not found`);
    }

    const created = await rethrowConflict(
      this.userLanguages.create({
        userId,
        languageId,
        proficiencyLevel: dto.proficiencyLevel,
        startedAt: dto.startedAt,
      }),
      `User "${userId}" already studies language "${languageId}"`,
    );
    this.logger.info(LogCategory.USER, 'Study language added', { userId, languageId });
    return created;
  }

  async delete(userId: string, languageId: string): Promise<void> {
    const deleted = await this.userLanguages.delete(userId, languageId);
    if (!deleted) {
      throw new NotFoundException(`User "${userId}" does not study language "${languageId}"`);
    }
    this.logger.info(LogCategory.USER, 'Study language removed', { userId, languageId });
  }
}
