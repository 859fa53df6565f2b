import { MongoClient, type Db } from 'mongodb';

import { AppLogger } from '../../../modules/logging/app-logger.service';
import { LogCategory } from '../../../modules/logging/log-levels';
import type { MongoPersistenceConfig } from '../shared/persistence.config';
import { ensureMongoIndexes } from './mongo-collections';

/** What document repositories need from the shared storage handle. */
export interface MongoDatabaseProvider {
  getDatabase(): Promise<Db>;
  close(): Promise<void>;
}

/**
 * Shared document storage handle.
 *
 * The client connects on first use behind a memoized promise and creates the
 * unique indexes before any repository call proceeds. A failed connect is
 * not cached.
 */
export class MongoConnection implements MongoDatabaseProvider {
  private readonly client: MongoClient;
  private connecting: Promise<Db> | undefined;

  constructor(
    private readonly config: MongoPersistenceConfig,
    private readonly logger: AppLogger,
  ) {
    this.client = new MongoClient(config.uri, {
      serverSelectionTimeoutMS: config.queryTimeoutMs,
      connectTimeoutMS: config.queryTimeoutMs,
    });
  }

  getDatabase(): Promise<Db> {
    if (!this.connecting) {
      this.connecting = this.connect();
    }
    return this.connecting;
  }

  async close(): Promise<void> {
    if (!this.connecting) return;
    try {
      await this.connecting;
    } catch (error) {
      this.logger.warn(LogCategory.DATABASE, 'Closing a document connection that never opened', {
        reason: error instanceof Error ? error.message : String(error),
      });
      return;
    }
    await this.client.close();
    this.logger.info(LogCategory.DATABASE, 'Document connection closed');
  }

  private async connect(): Promise<Db> {
    try {
      await this.client.connect();
      const db = this.client.db(this.config.databaseName);
      await ensureMongoIndexes(db);
      this.logger.info(LogCategory.DATABASE, 'Document connection opened', {
        database: this.config.databaseName,
      });
      return db;
    } catch (error) {
      this.connecting = undefined;
      this.logger.fatal(LogCategory.DATABASE, 'Document connection failed', error, {
        database: this.config.databaseName,
      });
      throw error;
    }
  }
}
