import type { VocabularyStatus } from '../../../domain/models/enums';
import type {
  UserVocabulary,
  UserVocabularyDraft,
  UserVocabularyItem,
  UserVocabularyItemDraft,
  UserVocabularyItemReplacement,
  UserVocabularyReplacement,
} from '../../../domain/models/vocabulary.model';
import type { PageOptions } from '../../../domain/repositories/pagination';
import type {
  IUserVocabularyItemRepository,
  IUserVocabularyRepository,
} from '../../../domain/repositories/vocabulary.repository.interface';
import {
  buildUserVocabulary,
  buildUserVocabularyItem,
  replaceUserVocabulary,
  replaceUserVocabularyItem,
} from '../shared/entity-builders';
import { UserVocabularyEntity, UserVocabularyItemEntity } from './entities';
import { TypeOrmBaseRepository } from './typeorm-base.repository';
import {
  userVocabularyFromRow,
  userVocabularyItemFromRow,
  userVocabularyItemToRow,
  userVocabularyToRow,
} from './typeorm-row.mapper';

/** Deleting a vocabulary removes its items through ON DELETE CASCADE. */
export class TypeOrmUserVocabularyRepository
  extends TypeOrmBaseRepository<UserVocabulary, UserVocabularyEntity, UserVocabularyDraft, UserVocabularyReplacement>
  implements IUserVocabularyRepository
{
  protected readonly entityName = 'UserVocabulary';
  protected readonly target = UserVocabularyEntity;

  protected toRow(vocabulary: UserVocabulary): UserVocabularyEntity {
    return userVocabularyToRow(vocabulary);
  }

  protected fromRow(row: UserVocabularyEntity): UserVocabulary {
    return userVocabularyFromRow(row);
  }

  protected build(draft: UserVocabularyDraft): UserVocabulary {
    return buildUserVocabulary(draft);
  }

  protected replace(existing: UserVocabulary, replacement: UserVocabularyReplacement): UserVocabulary {
    return replaceUserVocabulary(existing, replacement);
  }

  async getByUser(userId: string, page?: PageOptions): Promise<UserVocabulary[]> {
    return this.list('getByUser', page, qb => qb.where('row.userId = :userId', { userId }));
  }

  async getByUserAndLanguage(userId: string, languageId: string): Promise<UserVocabulary | null> {
    return this.findOne('getByUserAndLanguage', 'row.userId = :userId AND row.languageId = :languageId', {
      userId,
      languageId,
    });
  }
}

export class TypeOrmUserVocabularyItemRepository
  extends TypeOrmBaseRepository<
    UserVocabularyItem,
    UserVocabularyItemEntity,
    UserVocabularyItemDraft,
    UserVocabularyItemReplacement
  >
  implements IUserVocabularyItemRepository
{
  protected readonly entityName = 'UserVocabularyItem';
  protected readonly target = UserVocabularyItemEntity;

  protected toRow(item: UserVocabularyItem): UserVocabularyItemEntity {
    return userVocabularyItemToRow(item);
  }

  protected fromRow(row: UserVocabularyItemEntity): UserVocabularyItem {
    return userVocabularyItemFromRow(row);
  }

  protected build(draft: UserVocabularyItemDraft): UserVocabularyItem {
    return buildUserVocabularyItem(draft);
  }

  protected replace(existing: UserVocabularyItem, replacement: UserVocabularyItemReplacement): UserVocabularyItem {
    return replaceUserVocabularyItem(existing, replacement);
  }

  async getByVocabulary(vocabularyId: string, page?: PageOptions): Promise<UserVocabularyItem[]> {
    return this.list('getByVocabulary', page, qb =>
      qb.where('row.userVocabularyId = :vocabularyId', { vocabularyId }),
    );
  }

  async getByTerm(vocabularyId: string, term: string): Promise<UserVocabularyItem | null> {
    return this.findOne('getByTerm', 'row.userVocabularyId = :vocabularyId AND row.term = :term', {
      vocabularyId,
      term,
    });
  }

  async getByStatus(
    vocabularyId: string,
    status: VocabularyStatus,
    page?: PageOptions,
  ): Promise<UserVocabularyItem[]> {
    return this.list('getByStatus', page, qb =>
      qb.where('row.userVocabularyId = :vocabularyId AND row.status = :status', { vocabularyId, status }),
    );
  }

  async recordReview(id: string): Promise<UserVocabularyItem | null> {
    return this.execute('recordReview', id, () =>
      this.connection.transaction(async manager => {
        const row = await this.select(manager).where('row.id = :id', { id }).getOne();
        if (!row) return null;
        const current = this.fromRow(row);
        const reviewed: UserVocabularyItem = {
          ...current,
          timesReviewed: current.timesReviewed + 1,
          updatedAt: new Date(),
        };
        await manager.update(UserVocabularyItemEntity, id, {
          timesReviewed: reviewed.timesReviewed,
          updatedAt: reviewed.updatedAt,
        });
        return reviewed;
      }),
    );
  }
}
