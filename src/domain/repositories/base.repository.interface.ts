/**
 * IRepository — generic persistence port shared by every entity-specific contract.
 *
 * Implementations:
 *   - TypeOrmBaseRepository (SQLite via TypeORM)
 *   - MongoBaseRepository   (MongoDB)
 *
 * Failures surface as the classes in `domain/errors/repository.errors`.
 * A missing record is never an error.
 */
import type { PageOptions } from './pagination';

export interface IRepository<T extends { id: string }, TDraft, TReplacement> {
  /** Persist a new record. Generates `id` and timestamps the draft leaves unset. */
  create(draft: TDraft): Promise<T>;

  getById(id: string): Promise<T | null>;

  /** Stable order across pages; `limit: 0` returns an empty list. */
  getAll(page?: PageOptions): Promise<T[]>;

  /** Replace the mutable fields. Returns `null` when `id` does not exist. */
  update(id: string, replacement: TReplacement): Promise<T | null>;

  /** `true` when a record was removed, `false` when there was none. */
  delete(id: string): Promise<boolean>;

  exists(id: string): Promise<boolean>;
}
