import type { Database, DbExecutor } from '../db.js';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
} from '../../interfaces/index.js';
import { PgBlockRepository } from './block-repository.js';
import { PgConfirmationRepository } from './confirmation-repository.js';
import { PgWhitelistRepository } from './whitelist-repository.js';

function createRepositories(db: DbExecutor): RepositoryContext {
  return {
    blocks: new PgBlockRepository(db),
    confirmations: new PgConfirmationRepository(db),
    whitelist: new PgWhitelistRepository(db),
  };
}

/**
 * Create a TransactionalRepositoryContext backed by Postgres.
 *
 * This extends the basic RepositoryContext with transaction support,
 * allowing multiple operations to be executed atomically.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase({ connectionString: process.env.DATABASE_URL });
 * const repos = createTransactionalPgRepositoryContext(db);
 *
 * await repos.transaction(async (txRepos) => {
 *   const block = await txRepos.blocks.findLive(cidr, now);
 *   if (block) await txRepos.confirmations.confirm(block.id, 'bgp1', now);
 * });
 * ```
 */
export function createTransactionalPgRepositoryContext(
  db: Database
): TransactionalRepositoryContext {
  return new TransactionalPgRepositoryContext(db);
}

/**
 * TransactionalRepositoryContext implementation for Postgres.
 */
class TransactionalPgRepositoryContext implements TransactionalRepositoryContext {
  readonly blocks: PgBlockRepository;
  readonly confirmations: PgConfirmationRepository;
  readonly whitelist: PgWhitelistRepository;

  constructor(private db: Database) {
    this.blocks = new PgBlockRepository(db);
    this.confirmations = new PgConfirmationRepository(db);
    this.whitelist = new PgWhitelistRepository(db);
  }

  /**
   * Execute a function within a database transaction.
   *
   * - If the function returns successfully, all changes are committed
   * - If the function throws, all changes are rolled back
   */
  async transaction<T>(fn: TransactionFn<T>): Promise<T> {
    // Repositories built on tx run every statement inside the transaction
    return this.db.transaction(async (tx) => fn(createRepositories(tx)));
  }
}
