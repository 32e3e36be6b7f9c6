// Whitelist router - administration of protected networks

import { z } from 'zod';
import { parseNetwork } from '@bhr/protocol';
import { router } from '../index.js';
import { protectedProcedure } from '../middleware.js';

export const whitelistRouter = router({
  list: protectedProcedure.query(async ({ ctx }) => {
    return ctx.whitelistAdmin.listEntries();
  }),

  /**
   * Protect a network. `who` defaults to the caller.
   */
  add: protectedProcedure
    .input(
      z.object({
        cidr: z.string().min(1),
        why: z.string().min(1),
        who: z.string().min(1).optional(),
      })
    )
    .mutation(async ({ ctx, input }) => {
      return ctx.whitelistAdmin.addEntry({
        cidr: input.cidr,
        who: input.who ?? ctx.auth.principal,
        why: input.why,
      });
    }),

  remove: protectedProcedure
    .input(z.object({ id: z.string().min(1) }))
    .mutation(async ({ ctx, input }) => {
      return ctx.whitelistAdmin.removeEntry(input.id);
    }),

  /**
   * Would a block for this network be refused?
   */
  check: protectedProcedure
    .input(z.object({ cidr: z.string().min(1) }))
    .query(async ({ ctx, input }) => {
      const entry = await ctx.whitelistMatcher.findCovering(parseNetwork(input.cidr));
      return { whitelisted: entry !== null, entry };
    }),
});
