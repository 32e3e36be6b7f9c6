// Runtime error types

import type { Id, RequestValidationError, WhitelistEntry } from '@bhr/protocol';

/**
 * Base class for all registry errors.
 * `code` is stable and safe to surface to API clients.
 */
export class BhrError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'BhrError';
    this.code = code;
  }
}

/**
 * A request field is missing or malformed.
 */
export class BlockValidationError extends BhrError {
  readonly errors: RequestValidationError[];

  constructor(message: string, errors: RequestValidationError[]) {
    super('VALIDATION_ERROR', message);
    this.name = 'BlockValidationError';
    this.errors = errors;
  }
}

/**
 * Block creation refused because a whitelist entry covers the network.
 * The caller may retry with skipWhitelist to override.
 */
export class WhitelistConflictError extends BhrError {
  readonly cidr: string;
  readonly entry: WhitelistEntry;

  constructor(cidr: string, entry: WhitelistEntry) {
    super(
      'WHITELIST_CONFLICT',
      `${cidr} is covered by whitelist entry ${entry.cidr} (${entry.why})`
    );
    this.name = 'WhitelistConflictError';
    this.cidr = cidr;
    this.entry = entry;
  }
}

/**
 * An agent reported on a network that has no live block.
 * The agent should drop the work item rather than retry.
 */
export class NoSuchActiveBlockError extends BhrError {
  readonly cidr: string;

  constructor(cidr: string) {
    super('NO_SUCH_ACTIVE_BLOCK', `No active block for ${cidr}`);
    this.name = 'NoSuchActiveBlockError';
    this.cidr = cidr;
  }
}

/**
 * Error when a block id does not exist
 */
export class BlockNotFoundError extends BhrError {
  readonly blockId: Id;

  constructor(blockId: Id) {
    super('BLOCK_NOT_FOUND', `Block not found: ${blockId}`);
    this.name = 'BlockNotFoundError';
    this.blockId = blockId;
  }
}

/**
 * Error when an operation meant for inactive blocks targets a live one
 */
export class BlockStillActiveError extends BhrError {
  readonly blockId: Id;

  constructor(blockId: Id) {
    super('BLOCK_STILL_ACTIVE', `Block ${blockId} is still active; use setUnblocked instead`);
    this.name = 'BlockStillActiveError';
    this.blockId = blockId;
  }
}

/**
 * Error when a whitelist entry id does not exist
 */
export class WhitelistEntryNotFoundError extends BhrError {
  readonly entryId: Id;

  constructor(entryId: Id) {
    super('WHITELIST_ENTRY_NOT_FOUND', `Whitelist entry not found: ${entryId}`);
    this.name = 'WhitelistEntryNotFoundError';
    this.entryId = entryId;
  }
}
