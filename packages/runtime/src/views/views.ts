// View Engine - read-only projections over blocks and confirmations
//
// Every view is evaluated against the clock at call time, so a block past
// its expiry disappears from the views even before the sweeper runs.

import type { AgentId, Block, BlockStats, Timestamp } from '@bhr/protocol';
import type { BlockView, RepositoryContext } from '@bhr/repositories';
import { systemClock, type Clock } from '../clock.js';

export type BlockViewsOptions = {
  repos: RepositoryContext;
  clock?: Clock;
};

/**
 * Paging for the fleet-wide views. Results are ordered oldest first.
 */
export type ViewPage = {
  limit?: number;
  offset?: number;
};

/**
 * Derived views of the block set.
 *
 * - expected: what every agent should be blocking
 * - pending: expected, but no agent has confirmed yet
 * - current: confirmed by at least one agent
 * - queue: what one agent still has to apply
 * - unblockQueue: what one agent still has to remove
 */
export class BlockViews {
  private readonly repos: RepositoryContext;
  private readonly clock: Clock;

  constructor(options: BlockViewsOptions) {
    this.repos = options.repos;
    this.clock = options.clock ?? systemClock;
  }

  async expected(page: ViewPage = {}): Promise<Block[]> {
    return this.query({ kind: 'expected' }, page);
  }

  async pending(page: ViewPage = {}): Promise<Block[]> {
    return this.query({ kind: 'pending' }, page);
  }

  async current(page: ViewPage = {}): Promise<Block[]> {
    return this.query({ kind: 'current' }, page);
  }

  /**
   * Live blocks the agent has not confirmed. An agent that has never
   * reported anything sees the whole expected set.
   */
  async queue(agentId: AgentId): Promise<Block[]> {
    return this.query({ kind: 'queue', agentId });
  }

  /**
   * Blocks no longer live that the agent still reports as applied.
   */
  async unblockQueue(agentId: AgentId): Promise<Block[]> {
    return this.query({ kind: 'unblock_queue', agentId });
  }

  /**
   * Agents that have reported at least once.
   */
  async agents(): Promise<AgentId[]> {
    return this.repos.confirmations.listAgents();
  }

  /**
   * View sizes, plus the queue length of every known agent.
   * All counts are taken at the same instant.
   */
  async stats(): Promise<BlockStats> {
    const asOf = this.now();
    const [expected, pending, current, agents] = await Promise.all([
      this.query({ kind: 'expected' }, {}, asOf),
      this.query({ kind: 'pending' }, {}, asOf),
      this.query({ kind: 'current' }, {}, asOf),
      this.repos.confirmations.listAgents(),
    ]);

    const lengths: Array<[AgentId, number]> = [];
    for (const agentId of agents) {
      lengths.push([agentId, (await this.query({ kind: 'queue', agentId }, {}, asOf)).length]);
    }
    // fromEntries defines own keys, so an agent called '__proto__' survives
    const queues: Record<AgentId, number> = Object.fromEntries(lengths);

    return {
      expected: expected.length,
      pending: pending.length,
      current: current.length,
      queues,
    };
  }

  private query(view: BlockView, page: ViewPage = {}, asOf: Timestamp = this.now()): Promise<Block[]> {
    return this.repos.blocks.query({
      view,
      asOf,
      limit: page.limit,
      offset: page.offset,
    });
  }

  private now(): Timestamp {
    return this.clock().toISOString();
  }
}

export function createBlockViews(options: BlockViewsOptions): BlockViews {
  return new BlockViews(options);
}
