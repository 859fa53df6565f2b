/**
 * Persistence configuration read from the environment at startup.
 *
 *   PERSISTENCE_BACKEND  "sqlite" (default) | "mongodb", case-insensitive
 *   SQLITE_DB_PATH       required for sqlite; a file path or ":memory:"
 *   MONGO_URI            required for mongodb
 *   MONGO_DB_NAME        defaults to the database named in MONGO_URI
 *   DB_QUERY_TIMEOUT_MS  default 5000
 *   DB_LOGGING           "true" logs TypeORM queries
 *
 * Invalid values raise PersistenceConfigError immediately.
 */
import { PersistenceConfigError } from '../../../domain/errors/repository.errors';
import type { PersistenceBackend } from '../../../domain/repositories/repository-factory.interface';

export const PERSISTENCE_CONFIG = 'PERSISTENCE_CONFIG';

export const DEFAULT_QUERY_TIMEOUT_MS = 5000;

export interface SqlitePersistenceConfig {
  backend: 'sqlite';
  databasePath: string;
  queryTimeoutMs: number;
  logging: boolean;
}

export interface MongoPersistenceConfig {
  backend: 'mongodb';
  uri: string;
  databaseName: string;
  queryTimeoutMs: number;
}

export type PersistenceConfig = SqlitePersistenceConfig | MongoPersistenceConfig;

const BACKEND_ALIASES: Readonly<Record<string, PersistenceBackend>> = {
  sqlite: 'sqlite',
  relational: 'sqlite',
  mongodb: 'mongodb',
  mongo: 'mongodb',
  document: 'mongodb',
};

export function loadPersistenceConfig(env: NodeJS.ProcessEnv = process.env): PersistenceConfig {
  const requested = (env.PERSISTENCE_BACKEND ?? 'sqlite').trim().toLowerCase();
  const backend = BACKEND_ALIASES[requested];
  if (!backend) {
    throw new PersistenceConfigError(
      `Unsupported PERSISTENCE_BACKEND "${requested}" (expected "sqlite" or "mongodb")`,
    );
  }

  const queryTimeoutMs = parseTimeout(env.DB_QUERY_TIMEOUT_MS);

  if (backend === 'sqlite') {
    const databasePath = env.SQLITE_DB_PATH?.trim();
    if (!databasePath) {
      throw new PersistenceConfigError('SQLITE_DB_PATH is required when PERSISTENCE_BACKEND is "sqlite"');
    }
    return { backend, databasePath, queryTimeoutMs, logging: env.DB_LOGGING === 'true' };
  }

  const uri = env.MONGO_URI?.trim();
  if (!uri) {
    throw new PersistenceConfigError('MONGO_URI is required when PERSISTENCE_BACKEND is "mongodb"');
  }
  const databaseName = env.MONGO_DB_NAME?.trim() || databaseNameFromUri(uri);
  if (!databaseName) {
    throw new PersistenceConfigError('MONGO_DB_NAME is required when MONGO_URI names no database');
  }
  return { backend, uri, databaseName, queryTimeoutMs };
}

function parseTimeout(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return DEFAULT_QUERY_TIMEOUT_MS;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new PersistenceConfigError(`DB_QUERY_TIMEOUT_MS must be a positive integer, got "${raw}"`);
  }
  return value;
}

/** "mongodb://host:27017/app?retryWrites=true" → "app" */
export function databaseNameFromUri(uri: string): string | undefined {
  const match = /^mongodb(?:\+srv)?:\/\/[^/]+\/([^/?]+)/.exec(uri);
  return match?.[1] ? decodeURIComponent(match[1]) : undefined;
}
