// Repository interfaces
// These define the contracts for data access, enabling substrate independence.

export type {
  BlockRepository,
  CreateBlockInput,
  CreateBlockResult,
  BlockView,
  BlockFilter,
} from './block-repository.js';

export type { ConfirmationRepository } from './confirmation-repository.js';

export type {
  WhitelistRepository,
  CreateWhitelistEntryInput,
} from './whitelist-repository.js';

export type {
  RepositoryContext,
  TransactionFn,
  TransactionalRepositoryContext,
} from './repository-context.js';

export { isTransactional } from './repository-context.js';
