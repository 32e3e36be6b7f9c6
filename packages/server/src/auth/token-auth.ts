// Request authentication
//
// In development every request is treated as coming from a fixed dev
// principal. In production a bearer token must match one of the configured
// BHR_API_TOKENS pairs, and the pair's name becomes the principal.

import type { IncomingHttpHeaders } from 'node:http';
import type { AuthContext, AuthResult } from './types.js';

export const DEV_PRINCIPAL = 'dev-operator';

export const DEV_AUTH: AuthContext = {
  principal: DEV_PRINCIPAL,
  method: 'dev',
};

export type AuthOptions = {
  devMode: boolean;
  /** Bearer token -> principal name */
  tokens: Map<string, string>;
};

/**
 * Extract authentication context from request headers.
 */
export function getAuthFromHeaders(headers: IncomingHttpHeaders, options: AuthOptions): AuthResult {
  if (options.devMode) {
    return { success: true, auth: DEV_AUTH };
  }

  const header = headers.authorization;
  if (!header?.startsWith('Bearer ')) {
    return { success: false, error: 'Missing bearer token' };
  }

  const principal = options.tokens.get(header.slice('Bearer '.length).trim());
  if (!principal) {
    return { success: false, error: 'Unknown API token' };
  }

  return { success: true, auth: { principal, method: 'token' } };
}
