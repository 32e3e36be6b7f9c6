// Agents router - the polling surface for enforcement agents
//
// An agent loop looks like:
//   1. agents.queue        -> apply each entry, then agents.setBlocked
//   2. agents.unblockQueue -> remove each entry, then agents.markRemoved

import { z } from 'zod';
import type { Block } from '@bhr/protocol';
import { router } from '../index.js';
import { protectedProcedure } from '../middleware.js';

const AgentIdSchema = z.string().trim().min(1).max(128);

const AgentInput = z.object({ agentId: AgentIdSchema });

const ReportInput = z.object({
  cidr: z.string().min(1),
  agentId: AgentIdSchema,
});

/**
 * A unit of work for an agent, with the call that acknowledges it.
 */
export type QueueEntry = {
  id: string;
  cidr: string;
  source: string;
  reason: string;
  createdAt: string;
  expiresAt: string | null;
  actions: {
    setBlocked: {
      procedure: 'agents.setBlocked';
      input: { cidr: string; agentId: string };
    };
  };
};

/**
 * A block the agent must remove, with the call that acknowledges it.
 */
export type UnblockQueueEntry = {
  id: string;
  cidr: string;
  reason: string;
  deactivatedAt: string | null;
  actions: {
    markRemoved: {
      procedure: 'agents.markRemoved';
      input: { blockId: string; agentId: string };
    };
  };
};

export function toQueueEntry(block: Block, agentId: string): QueueEntry {
  return {
    id: block.id,
    cidr: block.cidr,
    source: block.source,
    reason: block.reason,
    createdAt: block.createdAt,
    expiresAt: block.expiresAt ?? null,
    actions: {
      setBlocked: {
        procedure: 'agents.setBlocked',
        input: { cidr: block.cidr, agentId },
      },
    },
  };
}

export function toUnblockQueueEntry(block: Block, agentId: string): UnblockQueueEntry {
  return {
    id: block.id,
    cidr: block.cidr,
    reason: block.deactivated?.reason ?? block.reason,
    // Elapsed but not yet swept blocks have no deactivation record yet
    deactivatedAt: block.deactivated?.at ?? block.expiresAt ?? null,
    actions: {
      markRemoved: {
        procedure: 'agents.markRemoved',
        input: { blockId: block.id, agentId },
      },
    },
  };
}

export const agentsRouter = router({
  /**
   * Blocks this agent still has to apply.
   */
  queue: protectedProcedure.input(AgentInput).query(async ({ ctx, input }) => {
    const blocks = await ctx.views.queue(input.agentId);
    return blocks.map((block) => toQueueEntry(block, input.agentId));
  }),

  /**
   * Blocks this agent has applied that are no longer active.
   */
  unblockQueue: protectedProcedure.input(AgentInput).query(async ({ ctx, input }) => {
    const blocks = await ctx.views.unblockQueue(input.agentId);
    return blocks.map((block) => toUnblockQueueEntry(block, input.agentId));
  }),

  /**
   * Every agent that has reported at least once.
   */
  list: protectedProcedure.query(async ({ ctx }) => {
    return ctx.views.agents();
  }),

  setBlocked: protectedProcedure.input(ReportInput).mutation(async ({ ctx, input }) => {
    return ctx.registry.setBlocked(input.cidr, input.agentId);
  }),

  setUnblocked: protectedProcedure.input(ReportInput).mutation(async ({ ctx, input }) => {
    const confirmation = await ctx.registry.setUnblocked(input.cidr, input.agentId);
    return { cleared: confirmation !== null };
  }),

  markRemoved: protectedProcedure
    .input(z.object({ blockId: z.string().min(1), agentId: AgentIdSchema }))
    .mutation(async ({ ctx, input }) => {
      const confirmation = await ctx.registry.markRemoved(input.blockId, input.agentId);
      return { cleared: confirmation !== null };
    }),
});
