// tRPC middleware for authentication

import { middleware, publicProcedure, TRPCError } from './index.js';

/**
 * Middleware that requires authentication.
 *
 * Ensures ctx.auth is not null and passes the authenticated context
 * to downstream procedures.
 */
const isAuthenticated = middleware(async ({ ctx, next }) => {
  if (!ctx.auth) {
    throw new TRPCError({
      code: 'UNAUTHORIZED',
      message: 'Authentication required',
    });
  }

  return next({
    ctx: {
      ...ctx,
      auth: ctx.auth,
    },
  });
});

/**
 * Protected procedure - requires authentication.
 */
export const protectedProcedure = publicProcedure.use(isAuthenticated);

