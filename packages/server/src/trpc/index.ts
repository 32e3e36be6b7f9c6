// tRPC initialization
//
// Sets up tRPC with the superjson transformer so that Maps and Dates survive
// the wire, and a formatter that exposes the domain error code to clients.

import { initTRPC, TRPCError } from '@trpc/server';
import superjson from 'superjson';
import type { Context } from './context.js';
import { domainCodeOf, toTRPCError } from '../errors.js';

const t = initTRPC.context<Context>().create({
  transformer: superjson,
  errorFormatter({ shape, error }) {
    return {
      ...shape,
      data: {
        ...shape.data,
        // Lets clients tell "malformed request" from "refused by whitelist"
        domainCode: domainCodeOf(error.cause),
      },
    };
  },
});

/**
 * Translate domain errors thrown by the runtime into tRPC errors with
 * a matching status.
 */
const domainErrors = t.middleware(async ({ next }) => {
  const result = await next();
  if (!result.ok) {
    const mapped = toTRPCError(result.error.cause);
    if (mapped) throw mapped;
  }
  return result;
});

/**
 * Export router factory.
 */
export const router = t.router;

/**
 * Base procedure. Domain errors are mapped on every procedure.
 */
export const publicProcedure = t.procedure.use(domainErrors);

/**
 * Export middleware factory.
 */
export const middleware = t.middleware;

/**
 * Create server-side callers (used by tests and scripts).
 */
export const createCallerFactory = t.createCallerFactory;

/**
 * Re-export TRPCError for use in routers.
 */
export { TRPCError };
