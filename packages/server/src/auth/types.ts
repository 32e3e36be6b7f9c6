// Authentication context types for the API layer

/**
 * The authenticated caller.
 *
 * `principal` is recorded as `requestedBy` on blocks the caller adds.
 * Agents authenticate the same way as operators; the agent id they report
 * under is part of each request, not of the credential.
 */
export type AuthContext = {
  principal: string;

  /** How the principal was established */
  method: 'dev' | 'token';
};

/**
 * Result of an authentication check.
 */
export type AuthResult =
  | { success: true; auth: AuthContext }
  | { success: false; error: string };
