import type { BlockRepository } from './block-repository.js';
import type { ConfirmationRepository } from './confirmation-repository.js';
import type { WhitelistRepository } from './whitelist-repository.js';

/**
 * RepositoryContext bundles all repository interfaces together.
 *
 * This is the primary dependency injection point for the runtime.
 * Pass a RepositoryContext to any code that needs data access,
 * and you can swap implementations (Postgres, in-memory)
 * without changing the consuming code.
 *
 * Example usage:
 * ```typescript
 * const repos = createTransactionalPgRepositoryContext(db);
 * const registry = new BlockRegistry({ repos });
 * ```
 */
export interface RepositoryContext {
  readonly blocks: BlockRepository;
  readonly confirmations: ConfirmationRepository;
  readonly whitelist: WhitelistRepository;
}

/**
 * Transaction wrapper type for atomic operations across repositories.
 */
export type TransactionFn<T> = (
  repos: RepositoryContext
) => Promise<T>;

/**
 * Extended context with transaction support.
 */
export interface TransactionalRepositoryContext extends RepositoryContext {
  /**
   * Execute a function within a database transaction.
   * All repository operations within the function will be atomic.
   *
   * @throws Rolls back the transaction if the function throws
   */
  transaction<T>(fn: TransactionFn<T>): Promise<T>;
}

/**
 * Check if a repository context supports transactions.
 */
export function isTransactional(
  repos: RepositoryContext | TransactionalRepositoryContext
): repos is TransactionalRepositoryContext {
  return 'transaction' in repos && typeof repos.transaction === 'function';
}
