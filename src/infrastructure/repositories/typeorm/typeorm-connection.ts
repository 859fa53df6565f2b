import { DataSource, type EntityManager } from 'typeorm';

import { AppLogger } from '../../../modules/logging/app-logger.service';
import { LogCategory } from '../../../modules/logging/log-levels';
import type { SqlitePersistenceConfig } from '../shared/persistence.config';
import { SerialQueue } from '../shared/serial-queue';
import { TYPEORM_ENTITIES } from './entities';

/** The part of a better-sqlite3 `Database` used to register SQL functions. */
interface SqliteFunctionRegistry {
  function(name: string, options: { deterministic: boolean }, fn: (value: unknown) => string | null): unknown;
}

export const UNICODE_LOWER_FUNCTION = 'unicode_lower';

/**
 * SQLite's built-in LOWER() folds ASCII letters only, so title search
 * lowercases both sides with this instead.
 */
export function registerSqliteFunctions(db: SqliteFunctionRegistry): void {
  db.function(UNICODE_LOWER_FUNCTION, { deterministic: true }, value =>
    typeof value === 'string' ? value.toLowerCase() : null,
  );
}

/** DataSource for the relational schema over better-sqlite3. */
export function createSqliteDataSource(config: Pick<SqlitePersistenceConfig, 'databasePath' | 'logging'>): DataSource {
  const inMemory = config.databasePath === ':memory:';
  return new DataSource({
    type: 'better-sqlite3',
    database: config.databasePath,
    entities: TYPEORM_ENTITIES,
    // No migration framework: the schema is derived from the entity classes.
    synchronize: true,
    // WAL lets readers proceed during a write; it does not allow a second writer.
    enableWAL: !inMemory,
    timeout: 15000,
    prepareDatabase: registerSqliteFunctions,
    logging: config.logging ? ['query', 'error'] : ['error'],
  });
}

/**
 * Shared relational storage handle.
 *
 * The DataSource is initialized on first use behind a memoized promise, so
 * concurrent first callers wait on the same initialization. Writes are
 * serialized because SQLite allows a single writer and TypeORM runs every
 * statement over one connection.
 */
export class TypeOrmConnection {
  private initialization: Promise<DataSource> | undefined;
  private readonly writes = new SerialQueue();

  constructor(
    private readonly dataSource: DataSource,
    private readonly logger: AppLogger,
  ) {}

  getDataSource(): Promise<DataSource> {
    if (!this.initialization) {
      this.initialization = this.initialize();
    }
    return this.initialization;
  }

  /** Run a single-statement write after every earlier write has settled. */
  write<T>(work: (manager: EntityManager) => Promise<T>): Promise<T> {
    return this.writes.run(async () => {
      const dataSource = await this.getDataSource();
      return work(dataSource.manager);
    });
  }

  /** Run `work` in one serialized transaction; a rejection rolls it back. */
  transaction<T>(work: (manager: EntityManager) => Promise<T>): Promise<T> {
    return this.writes.run(async () => {
      const dataSource = await this.getDataSource();
      return dataSource.transaction(work);
    });
  }

  async close(): Promise<void> {
    if (!this.initialization) return;
    try {
      await this.initialization;
    } catch (error) {
      this.logger.warn(LogCategory.DATABASE, 'Closing a relational connection that never opened', {
        reason: error instanceof Error ? error.message : String(error),
      });
      return;
    }
    if (this.dataSource.isInitialized) {
      await this.writes.run(() => this.dataSource.destroy());
      this.logger.info(LogCategory.DATABASE, 'Relational connection closed');
    }
  }

  private async initialize(): Promise<DataSource> {
    try {
      if (!this.dataSource.isInitialized) {
        await this.dataSource.initialize();
      }
      this.logger.info(LogCategory.DATABASE, 'Relational connection opened', {
        driver: this.dataSource.options.type,
      });
      return this.dataSource;
    } catch (error) {
      // Let the next caller retry instead of caching the failure.
      this.initialization = undefined;
      this.logger.fatal(LogCategory.DATABASE, 'Relational connection failed', error);
      throw error;
    }
  }
}
