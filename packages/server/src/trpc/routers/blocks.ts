// Blocks router - operator-facing block lifecycle and fleet views

import { z } from 'zod';
import { MAX_BLOCK_DURATION_SECONDS } from '@bhr/protocol';
import { BlockNotFoundError } from '@bhr/runtime';
import { router } from '../index.js';
import { protectedProcedure } from '../middleware.js';

const CidrInput = z.object({ cidr: z.string().min(1) });

const PageInput = z
  .object({
    limit: z.number().int().positive().max(1000).optional(),
    offset: z.number().int().nonnegative().optional(),
  })
  .optional();

export const blocksRouter = router({
  /**
   * Request a block. Repeating the call for the same network returns
   * the same block with created=false.
   */
  add: protectedProcedure
    .input(
      z.object({
        cidr: z.string().min(1),
        source: z.string().min(1),
        reason: z.string().min(1),
        duration: z.number().int().positive().max(MAX_BLOCK_DURATION_SECONDS).optional(),
        skipWhitelist: z.boolean().optional(),
      })
    )
    .mutation(async ({ ctx, input }) => {
      return ctx.registry.addBlock({
        ...input,
        requestedBy: ctx.auth.principal,
      });
    }),

  /**
   * Look up the block for a network, active or not.
   */
  get: protectedProcedure.input(CidrInput).query(async ({ ctx, input }) => {
    return ctx.registry.getBlock(input.cidr);
  }),

  getById: protectedProcedure
    .input(z.object({ id: z.string().min(1) }))
    .query(async ({ ctx, input }) => {
      const block = await ctx.registry.getBlockById(input.id);
      if (!block) {
        throw new BlockNotFoundError(input.id);
      }
      return block;
    }),

  history: protectedProcedure.input(CidrInput).query(async ({ ctx, input }) => {
    return ctx.registry.history(input.cidr);
  }),

  expected: protectedProcedure.input(PageInput).query(async ({ ctx, input }) => {
    return ctx.views.expected(input);
  }),

  pending: protectedProcedure.input(PageInput).query(async ({ ctx, input }) => {
    return ctx.views.pending(input);
  }),

  current: protectedProcedure.input(PageInput).query(async ({ ctx, input }) => {
    return ctx.views.current(input);
  }),

  stats: protectedProcedure.query(async ({ ctx }) => {
    return ctx.views.stats();
  }),

  /**
   * Administratively end a block.
   */
  withdraw: protectedProcedure
    .input(
      z.object({
        id: z.string().min(1),
        reason: z.string().optional(),
      })
    )
    .mutation(async ({ ctx, input }) => {
      return ctx.registry.withdraw(input.id, {
        by: ctx.auth.principal,
        reason: input.reason,
      });
    }),
});
