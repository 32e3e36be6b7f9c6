// @bhr/runtime
// Block lifecycle, whitelist enforcement, derived views and expiry

// Error types
export {
  BhrError,
  BlockValidationError,
  WhitelistConflictError,
  NoSuchActiveBlockError,
  BlockNotFoundError,
  BlockStillActiveError,
  WhitelistEntryNotFoundError,
} from './errors.js';

// Block Registry (the only writer of blocks and confirmations)
export {
  BlockRegistry,
  createBlockRegistry,
  isBlockLive,
  type BlockRegistryOptions,
  type AddBlockResult,
  type WithdrawOptions,
} from './registry/index.js';

// View Engine
export {
  BlockViews,
  createBlockViews,
  type BlockViewsOptions,
  type ViewPage,
} from './views/index.js';

// Whitelist
export {
  WhitelistMatcher,
  createWhitelistMatcher,
  WhitelistAdmin,
  createWhitelistAdmin,
  type WhitelistAdminOptions,
} from './whitelist/index.js';

// Expiry
export {
  sweepExpired,
  ExpirySweeper,
  createExpirySweeper,
  type SweepOptions,
  type ExpirySweeperOptions,
} from './expiry/index.js';

// Logging
export { consoleLogger, silentLogger, errorMessage, type Logger } from './logging.js';

// Time
export { systemClock, createManualClock, type Clock } from './clock.js';
