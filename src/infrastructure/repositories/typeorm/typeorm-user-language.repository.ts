import type { ProficiencyLevel } from '../../../domain/models/enums';
import type { UserLanguage, UserLanguageDraft } from '../../../domain/models/user-language.model';
import type { IUserLanguageRepository } from '../../../domain/repositories/user-language.repository.interface';
import { AppLogger } from '../../../modules/logging/app-logger.service';
import { buildUserLanguage } from '../shared/entity-builders';
import {
  DEFAULT_REPOSITORY_OPTIONS,
  runRepositoryOperation,
  type RepositoryOptions,
} from '../shared/repository-operation';
import { UserLanguageEntity } from './entities';
import type { TypeOrmConnection } from './typeorm-connection';
import { translateTypeOrmError } from './typeorm-error.translator';
import { userLanguageFromRow, userLanguageToRow } from './typeorm-row.mapper';

export class TypeOrmUserLanguageRepository implements IUserLanguageRepository {
  private static readonly ENTITY = 'UserLanguage';

  constructor(
    private readonly connection: TypeOrmConnection,
    private readonly logger: AppLogger,
    private readonly options: RepositoryOptions = DEFAULT_REPOSITORY_OPTIONS,
  ) {}

  async create(draft: UserLanguageDraft): Promise<UserLanguage> {
    const entry = buildUserLanguage(draft);
    return this.execute('create', entry.userId, async () => {
      await this.connection.write(manager => manager.insert(UserLanguageEntity, userLanguageToRow(entry)));
      return entry;
    });
  }

  async get(userId: string, languageId: string): Promise<UserLanguage | null> {
    return this.execute('get', userId, async () => {
      const dataSource = await this.connection.getDataSource();
      const row = await dataSource.manager.findOneBy(UserLanguageEntity, { userId, languageId });
      return row ? userLanguageFromRow(row) : null;
    });
  }

  async getByUser(userId: string): Promise<UserLanguage[]> {
    return this.execute('getByUser', userId, async () => {
      const dataSource = await this.connection.getDataSource();
      const rows = await dataSource.manager.find(UserLanguageEntity, {
        where: { userId },
        order: { startedAt: 'ASC', languageId: 'ASC' },
      });
      return rows.map(userLanguageFromRow);
    });
  }

  async updateProficiency(
    userId: string,
    languageId: string,
    level: ProficiencyLevel,
  ): Promise<UserLanguage | null> {
    return this.execute('updateProficiency', userId, () =>
      this.connection.transaction(async manager => {
        const row = await manager.findOneBy(UserLanguageEntity, { userId, languageId });
        if (!row) return null;
        const updated: UserLanguage = { ...userLanguageFromRow(row), proficiencyLevel: level, updatedAt: new Date() };
        await manager.update(
          UserLanguageEntity,
          { userId, languageId },
          { proficiencyLevel: updated.proficiencyLevel, updatedAt: updated.updatedAt },
        );
        return updated;
      }),
    );
  }

  async delete(userId: string, languageId: string): Promise<boolean> {
    return this.execute('delete', userId, async () => {
      const result = await this.connection.write(manager =>
        manager.delete(UserLanguageEntity, { userId, languageId }),
      );
      return (result.affected ?? 0) > 0;
    });
  }

  private execute<R>(operation: string, entityId: string, work: () => Promise<R>): Promise<R> {
    return runRepositoryOperation(
      { logger: this.logger, timeoutMs: this.options.queryTimeoutMs, translate: translateTypeOrmError },
      { operation, entity: TypeOrmUserLanguageRepository.ENTITY, entityId },
      work,
    );
  }
}
