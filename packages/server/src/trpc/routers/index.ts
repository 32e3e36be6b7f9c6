// Root router - combines all domain routers
//
// This is the main entry point for the tRPC API.

import { router, publicProcedure } from '../index.js';
import { blocksRouter } from './blocks.js';
import { agentsRouter } from './agents.js';
import { whitelistRouter } from './whitelist.js';

/**
 * The root router that combines all domain routers.
 *
 * Usage from client:
 * ```ts
 * // Operator
 * const { block } = await trpc.blocks.add.mutate({
 *   cidr: '192.0.2.10',
 *   source: 'ids',
 *   reason: 'ssh brute force',
 *   duration: 3600,
 * });
 *
 * // Agent
 * const work = await trpc.agents.queue.query({ agentId: 'bgp1' });
 * ```
 */
export const appRouter = router({
  health: publicProcedure.query(({ ctx }) => ({
    status: 'ok' as const,
    storage: ctx.storage,
  })),
  blocks: blocksRouter,
  agents: agentsRouter,
  whitelist: whitelistRouter,
});

/**
 * Export the router type for client-side type inference.
 */
export type AppRouter = typeof appRouter;
