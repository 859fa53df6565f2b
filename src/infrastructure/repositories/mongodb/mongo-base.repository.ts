import type { Collection, Document, Filter, Sort } from 'mongodb';

import type { IRepository } from '../../../domain/repositories/base.repository.interface';
import { resolvePage, type PageOptions } from '../../../domain/repositories/pagination';
import { AppLogger } from '../../../modules/logging/app-logger.service';
import {
  DEFAULT_REPOSITORY_OPTIONS,
  runRepositoryOperation,
  type RepositoryOptions,
} from '../shared/repository-operation';
import type { MongoDatabaseProvider } from './mongo-connection';
import { translateMongoError } from './mongo-error.translator';

/**
 * Generic CRUD over one MongoDB collection.
 *
 * The entity id is the document `_id`. Lists sort on `sort` with `_id` as the
 * tie-breaker so offset pagination stays stable. Subclasses that need to
 * remove dependent documents override `afterDelete`; the store has no
 * cascades of its own.
 */
export abstract class MongoBaseRepository<T extends { id: string }, TDraft extends { id?: string }, TReplacement>
  implements IRepository<T, TDraft, TReplacement>
{
  protected abstract readonly entityName: string;
  protected abstract readonly collectionName: string;
  protected readonly sort: Sort = { createdAt: 1, _id: 1 };

  constructor(
    protected readonly database: MongoDatabaseProvider,
    protected readonly logger: AppLogger,
    protected readonly options: RepositoryOptions = DEFAULT_REPOSITORY_OPTIONS,
  ) {}

  protected abstract toDocument(entity: T): Document;
  protected abstract fromDocument(doc: Document): T;
  protected abstract build(draft: TDraft): T;
  protected abstract replace(existing: T, replacement: TReplacement): T;

  // ─── IRepository ──────────────────────────────────────────────────

  async create(draft: TDraft): Promise<T> {
    const entity = this.build(draft);
    return this.execute('create', entity.id, async () => {
      const collection = await this.collection();
      await collection.insertOne(this.toDocument(entity));
      return entity;
    });
  }

  async getById(id: string): Promise<T | null> {
    return this.findOne('getById', { _id: id }, id);
  }

  async getAll(page?: PageOptions): Promise<T[]> {
    return this.list('getAll', {}, page);
  }

  async update(id: string, replacement: TReplacement): Promise<T | null> {
    return this.execute('update', id, async () => {
      const collection = await this.collection();
      const current = await collection.findOne({ _id: id });
      if (!current) return null;
      const next = this.replace(this.fromDocument(current), replacement);
      const updated = await collection.findOneAndUpdate(
        { _id: id },
        { $set: withoutId(this.toDocument(next)) },
        { returnDocument: 'after' },
      );
      return updated ? this.fromDocument(updated) : null;
    });
  }

  async delete(id: string): Promise<boolean> {
    return this.execute('delete', id, async () => {
      const collection = await this.collection();
      const result = await collection.deleteOne({ _id: id });
      if (result.deletedCount === 0) return false;
      await this.afterDelete(id);
      return true;
    });
  }

  async exists(id: string): Promise<boolean> {
    return this.count('exists', { _id: id }, id);
  }

  // ─── Helpers for entity-specific queries ──────────────────────────

  /** Remove or detach documents that depend on a deleted one. */
  protected async afterDelete(_entityId: string): Promise<void> {
    return;
  }

  protected execute<R>(operation: string, entityId: string | undefined, work: () => Promise<R>): Promise<R> {
    return runRepositoryOperation(
      { logger: this.logger, timeoutMs: this.options.queryTimeoutMs, translate: translateMongoError },
      { operation, entity: this.entityName, entityId },
      work,
    );
  }

  protected async collection(name: string = this.collectionName): Promise<Collection> {
    const db = await this.database.getDatabase();
    return db.collection(name);
  }

  protected async findOne(operation: string, filter: Filter<Document>, entityId?: string): Promise<T | null> {
    return this.execute(operation, entityId, async () => {
      const collection = await this.collection();
      const doc = await collection.findOne(filter);
      return doc ? this.fromDocument(doc) : null;
    });
  }

  protected async count(operation: string, filter: Filter<Document>, entityId?: string): Promise<boolean> {
    return this.execute(operation, entityId, async () => {
      const collection = await this.collection();
      const total = await collection.countDocuments(filter, { limit: 1 });
      return total > 0;
    });
  }

  /** Ordered, paginated list. A limit of 0 returns [] without querying. */
  protected async list(operation: string, filter: Filter<Document>, page: PageOptions | undefined): Promise<T[]> {
    const { skip, limit } = resolvePage(page);
    if (limit === 0) return [];

    return this.execute(operation, undefined, async () => {
      const collection = await this.collection();
      const docs = await collection.find(filter).sort(this.sort).skip(skip).limit(limit).toArray();
      return docs.map(doc => this.fromDocument(doc));
    });
  }
}

/** `$set` payload: every mapped field except the immutable `_id`. */
export function withoutId(doc: Document): Document {
  return Object.fromEntries(Object.entries(doc).filter(([key]) => key !== '_id'));
}

/** Escape regular-expression metacharacters so a query is matched literally. */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
