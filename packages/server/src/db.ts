// Repository context singleton
//
// Supports two modes:
// - In-memory (no DATABASE_URL): fast, no setup, nothing survives a restart
// - Postgres: set DATABASE_URL; create tables with `npm run db:push`

import {
  postgres,
  memory,
  type TransactionalRepositoryContext,
} from '@bhr/repositories';
import type { ServerConfig } from './config.js';

type Database = ReturnType<typeof postgres.createDatabase>['db'];
type Client = ReturnType<typeof postgres.createDatabase>['client'];

// Singletons
let dbInstance: Database | null = null;
let clientInstance: Client | null = null;
let memoryRepos: memory.InMemoryRepositoryContext | null = null;

export type StorageKind = 'memory' | 'postgres';

export function storageKind(config: Pick<ServerConfig, 'databaseUrl'>): StorageKind {
  return config.databaseUrl ? 'postgres' : 'memory';
}

/**
 * Get the database connection singleton.
 *
 * @throws Error if no database URL is configured
 */
export function getDb(config: Pick<ServerConfig, 'databaseUrl' | 'databaseMaxConnections'>): Database {
  if (!dbInstance) {
    if (!config.databaseUrl) {
      throw new Error('getDb() called without DATABASE_URL; use getRepositoryContext() instead');
    }

    const { db, client } = postgres.createDatabase({
      connectionString: config.databaseUrl,
      maxConnections: config.databaseMaxConnections,
    });

    dbInstance = db;
    clientInstance = client;
  }

  return dbInstance;
}

/**
 * Get a TransactionalRepositoryContext for the configured storage.
 */
export function getRepositoryContext(
  config: Pick<ServerConfig, 'databaseUrl' | 'databaseMaxConnections'>
): TransactionalRepositoryContext {
  if (storageKind(config) === 'memory') {
    if (!memoryRepos) {
      memoryRepos = memory.createInMemoryRepositoryContext();
    }
    return memoryRepos;
  }

  return postgres.createTransactionalPgRepositoryContext(getDb(config));
}

/**
 * Close the database connection and drop the in-memory store.
 */
export async function closeDb(): Promise<void> {
  if (clientInstance) {
    await clientInstance.end();
    dbInstance = null;
    clientInstance = null;
  }
  memoryRepos = null;
}

export type { Database, TransactionalRepositoryContext };
