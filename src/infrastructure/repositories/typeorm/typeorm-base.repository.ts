import type { EntityManager, EntityTarget, ObjectLiteral, SelectQueryBuilder } from 'typeorm';
import type { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';

import type { IRepository } from '../../../domain/repositories/base.repository.interface';
import { resolvePage, type PageOptions } from '../../../domain/repositories/pagination';
import { AppLogger } from '../../../modules/logging/app-logger.service';
import {
  DEFAULT_REPOSITORY_OPTIONS,
  runRepositoryOperation,
  type RepositoryOptions,
} from '../shared/repository-operation';
import type { TypeOrmConnection } from './typeorm-connection';
import { translateTypeOrmError } from './typeorm-error.translator';

/** Builder hook that narrows a list query. Conditions reference `row.<property>`. */
export type QueryScope<TRow extends ObjectLiteral> = (qb: SelectQueryBuilder<TRow>) => void;

/**
 * Generic CRUD over one TypeORM entity class.
 *
 * Queries go through the query builder with the alias `row`; lists are ordered
 * by `orderColumns` so that offset pagination is stable. Constraint
 * violations are left to the schema and translated on the way out.
 */
export abstract class TypeOrmBaseRepository<
  T extends { id: string },
  TRow extends ObjectLiteral,
  TDraft extends { id?: string },
  TReplacement,
> implements IRepository<T, TDraft, TReplacement>
{
  protected static readonly ALIAS = 'row';

  /** Entity type name used in errors and logs */
  protected abstract readonly entityName: string;
  protected abstract readonly target: EntityTarget<TRow>;
  protected readonly orderColumns: readonly string[] = ['createdAt', 'id'];

  constructor(
    protected readonly connection: TypeOrmConnection,
    protected readonly logger: AppLogger,
    protected readonly options: RepositoryOptions = DEFAULT_REPOSITORY_OPTIONS,
  ) {}

  protected abstract toRow(entity: T): QueryDeepPartialEntity<TRow>;
  protected abstract fromRow(row: TRow): T;
  protected abstract build(draft: TDraft): T;
  protected abstract replace(existing: T, replacement: TReplacement): T;

  // ─── IRepository ──────────────────────────────────────────────────

  async create(draft: TDraft): Promise<T> {
    const entity = this.build(draft);
    return this.execute('create', entity.id, async () => {
      await this.connection.write(manager => manager.insert(this.target, this.toRow(entity)));
      return entity;
    });
  }

  async getById(id: string): Promise<T | null> {
    return this.findOne('getById', 'row.id = :id', { id }, id);
  }

  async getAll(page?: PageOptions): Promise<T[]> {
    return this.list('getAll', page);
  }

  async update(id: string, replacement: TReplacement): Promise<T | null> {
    return this.execute('update', id, () =>
      this.connection.transaction(async manager => {
        const row = await this.select(manager).where('row.id = :id', { id }).getOne();
        if (!row) return null;
        const updated = this.replace(this.fromRow(row), replacement);
        await manager.update(this.target, id, this.toRow(updated));
        return updated;
      }),
    );
  }

  async delete(id: string): Promise<boolean> {
    return this.execute('delete', id, async () => {
      const result = await this.connection.write(manager =>
        manager.createQueryBuilder().delete().from(this.target).where('id = :id', { id }).execute(),
      );
      return (result.affected ?? 0) > 0;
    });
  }

  async exists(id: string): Promise<boolean> {
    return this.count('exists', 'row.id = :id', { id }, id);
  }

  // ─── Helpers for entity-specific queries ──────────────────────────

  /** Run a call under the query timeout and translate its failure. */
  protected execute<R>(operation: string, entityId: string | undefined, work: () => Promise<R>): Promise<R> {
    return runRepositoryOperation(
      { logger: this.logger, timeoutMs: this.options.queryTimeoutMs, translate: translateTypeOrmError },
      { operation, entity: this.entityName, entityId },
      work,
    );
  }

  protected select(manager: EntityManager): SelectQueryBuilder<TRow> {
    return manager.createQueryBuilder(this.target, TypeOrmBaseRepository.ALIAS);
  }

  protected async findOne(
    operation: string,
    condition: string,
    parameters: ObjectLiteral,
    entityId?: string,
  ): Promise<T | null> {
    return this.execute(operation, entityId, async () => {
      const dataSource = await this.connection.getDataSource();
      const row = await this.select(dataSource.manager).where(condition, parameters).getOne();
      return row ? this.fromRow(row) : null;
    });
  }

  protected async count(
    operation: string,
    condition: string,
    parameters: ObjectLiteral,
    entityId?: string,
  ): Promise<boolean> {
    return this.execute(operation, entityId, async () => {
      const dataSource = await this.connection.getDataSource();
      const total = await this.select(dataSource.manager).where(condition, parameters).getCount();
      return total > 0;
    });
  }

  /** Ordered, paginated list. A limit of 0 returns [] without querying. */
  protected async list(operation: string, page: PageOptions | undefined, scope?: QueryScope<TRow>): Promise<T[]> {
    const { skip, limit } = resolvePage(page);
    if (limit === 0) return [];

    return this.execute(operation, undefined, async () => {
      const dataSource = await this.connection.getDataSource();
      const qb = this.select(dataSource.manager);
      scope?.(qb);
      this.applyOrder(qb);
      const rows = await qb.offset(skip).limit(limit).getMany();
      return rows.map(row => this.fromRow(row));
    });
  }

  protected applyOrder(qb: SelectQueryBuilder<TRow>): void {
    this.orderColumns.forEach((column, index) => {
      const path = `${TypeOrmBaseRepository.ALIAS}.${column}`;
      if (index === 0) {
        qb.orderBy(path, 'ASC');
      } else {
        qb.addOrderBy(path, 'ASC');
      }
    });
  }
}
