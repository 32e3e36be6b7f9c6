export {
  validateBlockRequest,
  validateWhitelistRequest,
  MAX_BLOCK_DURATION_SECONDS,
  type BlockRequest,
  type WhitelistRequest,
  type RequestValidationResult,
  type RequestValidationError,
  type RequestValidationErrorCode,
} from './block-request.js';
