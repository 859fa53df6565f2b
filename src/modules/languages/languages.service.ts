import { ConflictException, Inject, Injectable, NotFoundException } from '@nestjs/common';

import type { Language } from '../../domain/models/language.model';
import type { ILanguageRepository } from '../../domain/repositories/language.repository.interface';
import type { PageOptions } from '../../domain/repositories/pagination';
import { LANGUAGE_REPOSITORY } from '../../domain/repositories/repository.tokens';
import { rethrowConflict } from '../common/repository-conflict';
import { AppLogger } from '../logging/app-logger.service';
import { LogCategory } from '../logging/log-levels';
import type { LanguageDto, UpdateLanguageDto } from './dto/language.dto';

@Injectable()
export class LanguagesService {
  constructor(
    @Inject(LANGUAGE_REPOSITORY) private readonly languages: ILanguageRepository,
    private readonly logger: AppLogger,
  ) {}

  async create(dto: LanguageDto): Promise<Language> {
    await this.assertCodeAvailable(dto.code);
    const language = await rethrowConflict(
      this.languages.create({ name: dto.name, code: dto.code, nativeName: dto.nativeName }),
      `Language with code "${dto.code}" already exists`,
    );
    this.logger.info(LogCategory.LANGUAGE, 'Language created', { languageId: language.id, code: language.code });
    return language;
  }

  async list(page: PageOptions): Promise<Language[]> {
    return this.languages.getAll(page);
  }

  async get(id: string): Promise<Language> {
    const language = await this.languages.getById(id);
    if (!language) {
      throw new NotFoundException(`Language with ID "${id}" not found`);
    }
    return language;
  }

  async getByCode(code: string): Promise<Language> {
    const language = await this.languages.getByCode(code);
    if (!language) {
      throw new NotFoundException(`Language with code "${code}" not found`);
    }
    return language;
  }

  async update(id: string, dto: UpdateLanguageDto): Promise<Language> {
    const existing = await this.get(id);
    const code = dto.code ?? existing.code;
    if (code !== existing.code) {
      await this.assertCodeAvailable(code);
    }
    const updated = await rethrowConflict(
      this.languages.update(id, {
        name: dto.name ?? existing.name,
        code,
        nativeName: dto.nativeName ?? existing.nativeName,
      }),
      `Language with code "${code}" already exists`,
    );
    if (!updated) {
      throw new NotFoundException(`Language with ID "${id}" not found`);
    }
    this.logger.info(LogCategory.LANGUAGE, 'Language updated', { languageId: id });
    return updated;
  }

  /** Languages still referenced by users, texts or vocabularies cannot be removed by the relational backend. */
  async delete(id: string): Promise<void> {
    const deleted = await rethrowConflict(
      this.languages.delete(id),
      `Language with ID "${id}" is still referenced by users, texts or vocabularies`,
    );
    if (!deleted) {
      throw new NotFoundException(`Language with ID "${id}" not found`);
    }
    this.logger.info(LogCategory.LANGUAGE, 'Language deleted', { languageId: id });
  }

  private async assertCodeAvailable(code: string): Promise<void> {
    if (await this.languages.codeExists(code)) {
      throw new ConflictException(`Language with code "${code}" already exists`);
    }
  }
}
