import type { AgentId, Block, BlockDeactivation, Id, Timestamp } from '@bhr/protocol';

/**
 * Input for creating a new Block.
 * `cidr` must already be canonical (see normalizeCidr).
 */
export type CreateBlockInput = {
  id?: Id;
  cidr: string;
  requestedBy: string;
  source: string;
  reason: string;
  createdAt: Timestamp;
  duration?: number;
};

/**
 * Outcome of an idempotent create
 */
export type CreateBlockResult = {
  block: Block;
  /** false when an active block for the network already existed */
  created: boolean;
};

/**
 * The derived views a block query can select.
 *
 * - expected: every live block
 * - pending: live blocks that no agent has confirmed
 * - current: live blocks confirmed by at least one agent
 * - queue: live blocks the agent has not confirmed (or has since unconfirmed)
 * - unblock_queue: inactive blocks the agent still reports as applied
 */
export type BlockView =
  | { kind: 'expected' }
  | { kind: 'pending' }
  | { kind: 'current' }
  | { kind: 'queue'; agentId: AgentId }
  | { kind: 'unblock_queue'; agentId: AgentId };

/**
 * Filter for querying Blocks through a derived view
 */
export type BlockFilter = {
  view: BlockView;
  /**
   * Evaluation time. A block whose expiresAt is at or before this instant
   * is treated as inactive even if the sweeper has not run yet.
   */
  asOf: Timestamp;
  limit?: number;
  offset?: number;
};

/**
 * Repository interface for Block operations.
 *
 * The store enforces "at most one active block per cidr" itself, so
 * createIfNoActive is safe to call from concurrent requests.
 */
export interface BlockRepository {
  /**
   * Create a block unless an active one exists for the same cidr.
   * A concurrent loser gets the winner's block with created=false.
   */
  createIfNoActive(input: CreateBlockInput): Promise<CreateBlockResult>;

  /**
   * Get a Block by ID
   * @returns Block or null if not found
   */
  get(id: Id): Promise<Block | null>;

  /**
   * Get the active block for a cidr, if it is still live at `asOf`
   */
  findLive(cidr: string, asOf: Timestamp): Promise<Block | null>;

  /**
   * Get every block ever created for a cidr, newest first
   */
  history(cidr: string): Promise<Block[]>;

  /**
   * Query blocks through a derived view, oldest first
   */
  query(filter: BlockFilter): Promise<Block[]>;

  /**
   * Mark an active block inactive.
   * @returns The updated block, or null if it was missing or already inactive
   */
  deactivate(id: Id, deactivation: BlockDeactivation): Promise<Block | null>;

  /**
   * Deactivate every active block whose expiresAt is at or before `asOf`.
   * Pass `cidr` to restrict the sweep to one network.
   * @returns The blocks that were expired by this call
   */
  expireDue(asOf: Timestamp, cidr?: string): Promise<Block[]>;
}
