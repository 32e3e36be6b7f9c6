export {
  BlockRegistry,
  createBlockRegistry,
  isBlockLive,
  type BlockRegistryOptions,
  type AddBlockResult,
  type WithdrawOptions,
} from './registry.js';
