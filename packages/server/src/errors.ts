// Mapping from domain errors to tRPC errors

import { TRPCError } from '@trpc/server';
import { InvalidNetworkError } from '@bhr/protocol';
import {
  BhrError,
  BlockNotFoundError,
  BlockStillActiveError,
  BlockValidationError,
  NoSuchActiveBlockError,
  WhitelistConflictError,
  WhitelistEntryNotFoundError,
} from '@bhr/runtime';

type TRPCErrorCode = TRPCError['code'];

/**
 * The tRPC code a domain error is reported with, or null for errors the
 * API does not know about (those stay INTERNAL_SERVER_ERROR).
 */
export function trpcCodeFor(error: unknown): TRPCErrorCode | null {
  if (error instanceof InvalidNetworkError || error instanceof BlockValidationError) {
    return 'BAD_REQUEST';
  }
  if (error instanceof WhitelistConflictError) {
    return 'CONFLICT';
  }
  if (
    error instanceof NoSuchActiveBlockError ||
    error instanceof BlockNotFoundError ||
    error instanceof WhitelistEntryNotFoundError
  ) {
    return 'NOT_FOUND';
  }
  if (error instanceof BlockStillActiveError) {
    return 'PRECONDITION_FAILED';
  }
  return null;
}

/**
 * Stable domain code of an error, e.g. WHITELIST_CONFLICT.
 */
export function domainCodeOf(error: unknown): string | null {
  if (error instanceof BhrError || error instanceof InvalidNetworkError) {
    return error.code;
  }
  return null;
}

/**
 * Wrap a domain error in the matching TRPCError, keeping it as the cause.
 */
export function toTRPCError(error: unknown): TRPCError | null {
  const code = trpcCodeFor(error);
  if (!code || !(error instanceof Error)) {
    return null;
  }
  return new TRPCError({ code, message: error.message, cause: error });
}
