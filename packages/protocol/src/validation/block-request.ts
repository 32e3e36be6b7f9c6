// Request validation for block and whitelist writes
//
// Network syntax is checked by parseNetwork, which raises its own error.
// These validators cover the remaining fields so that a malformed request
// is rejected before any repository call.

/**
 * Result of validating a request
 */
export type RequestValidationResult = {
  valid: boolean;
  errors: RequestValidationError[];
};

/**
 * A validation error with the offending field path
 */
export type RequestValidationError = {
  path: string;
  message: string;
  code: RequestValidationErrorCode;
};

export type RequestValidationErrorCode = 'MISSING_FIELD' | 'INVALID_TYPE' | 'INVALID_VALUE';

/**
 * Fields an operator supplies when asking for a block
 */
export type BlockRequest = {
  cidr: string;
  requestedBy: string;
  source: string;
  reason: string;
  /** Seconds until the block expires; omit for an indefinite block */
  duration?: number;
  /** Create the block even when a whitelist entry covers the network */
  skipWhitelist?: boolean;
};

/**
 * Fields an administrator supplies when protecting a network
 */
export type WhitelistRequest = {
  cidr: string;
  who: string;
  why: string;
};

/** Longest accepted TTL: ten years */
export const MAX_BLOCK_DURATION_SECONDS = 10 * 365 * 24 * 60 * 60;

function field(obj: object, key: string): unknown {
  return key in obj ? Reflect.get(obj, key) : undefined;
}

function requireText(
  obj: object,
  key: string,
  errors: RequestValidationError[]
): void {
  const value = field(obj, key);
  if (value === undefined || value === null) {
    errors.push({ path: key, message: `${key} is required`, code: 'MISSING_FIELD' });
  } else if (typeof value !== 'string') {
    errors.push({ path: key, message: `${key} must be a string`, code: 'INVALID_TYPE' });
  } else if (value.trim() === '') {
    errors.push({ path: key, message: `${key} must not be empty`, code: 'MISSING_FIELD' });
  }
}

function validationResult(errors: RequestValidationError[]): RequestValidationResult {
  return { valid: errors.length === 0, errors };
}

/**
 * Validate a block request.
 */
export function validateBlockRequest(request: unknown): RequestValidationResult {
  if (!request || typeof request !== 'object') {
    return validationResult([
      { path: '', message: 'Block request must be an object', code: 'INVALID_TYPE' },
    ]);
  }

  const errors: RequestValidationError[] = [];
  requireText(request, 'cidr', errors);
  requireText(request, 'requestedBy', errors);
  requireText(request, 'source', errors);
  requireText(request, 'reason', errors);

  const duration = field(request, 'duration');
  if (duration !== undefined) {
    if (typeof duration !== 'number' || !Number.isInteger(duration)) {
      errors.push({
        path: 'duration',
        message: 'duration must be a whole number of seconds',
        code: 'INVALID_TYPE',
      });
    } else if (duration <= 0 || duration > MAX_BLOCK_DURATION_SECONDS) {
      errors.push({
        path: 'duration',
        message: `duration must be between 1 and ${MAX_BLOCK_DURATION_SECONDS} seconds`,
        code: 'INVALID_VALUE',
      });
    }
  }

  const skipWhitelist = field(request, 'skipWhitelist');
  if (skipWhitelist !== undefined && typeof skipWhitelist !== 'boolean') {
    errors.push({
      path: 'skipWhitelist',
      message: 'skipWhitelist must be a boolean',
      code: 'INVALID_TYPE',
    });
  }

  return validationResult(errors);
}

/**
 * Validate a whitelist request.
 */
export function validateWhitelistRequest(request: unknown): RequestValidationResult {
  if (!request || typeof request !== 'object') {
    return validationResult([
      { path: '', message: 'Whitelist request must be an object', code: 'INVALID_TYPE' },
    ]);
  }

  const errors: RequestValidationError[] = [];
  requireText(request, 'cidr', errors);
  requireText(request, 'who', errors);
  requireText(request, 'why', errors);
  return validationResult(errors);
}
