export {
  sweepExpired,
  ExpirySweeper,
  createExpirySweeper,
  type SweepOptions,
  type ExpirySweeperOptions,
} from './sweeper.js';
