// Postgres repository implementations
export { PgBlockRepository } from './block-repository.js';
export { PgConfirmationRepository } from './confirmation-repository.js';
export { PgWhitelistRepository } from './whitelist-repository.js';
export { createTransactionalPgRepositoryContext } from './context.js';
