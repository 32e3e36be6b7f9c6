// Block Registry - the only writer of blocks and agent confirmations
//
// Operations:
// - addBlock: idempotent create, guarded by the whitelist
// - setBlocked / setUnblocked: an agent reports applying or removing a live block
// - withdraw: administrative removal
// - markRemoved: an agent reports removing a block that is no longer active

import {
  normalizeCidr,
  parseNetwork,
  validateBlockRequest,
} from '@bhr/protocol';
import type {
  AgentConfirmation,
  AgentId,
  Block,
  BlockRequest,
  Id,
  Timestamp,
} from '@bhr/protocol';
import {
  isTransactional,
  type RepositoryContext,
  type TransactionalRepositoryContext,
} from '@bhr/repositories';
import {
  BlockNotFoundError,
  BlockStillActiveError,
  BlockValidationError,
  NoSuchActiveBlockError,
  WhitelistConflictError,
} from '../errors.js';
import { systemClock, type Clock } from '../clock.js';
import { silentLogger, type Logger } from '../logging.js';
import { WhitelistMatcher } from '../whitelist/matcher.js';

// --- Types ---

/**
 * Options for creating a BlockRegistry
 */
export type BlockRegistryOptions = {
  /** Repository context; transactional contexts get atomic read-then-write */
  repos: RepositoryContext | TransactionalRepositoryContext;

  logger?: Logger;

  clock?: Clock;
};

/**
 * Result of addBlock
 */
export type AddBlockResult = {
  block: Block;
  /** false when an existing live block was returned instead */
  created: boolean;
};

/**
 * Who withdrew a block, and why
 */
export type WithdrawOptions = {
  by?: string;
  reason?: string;
};

/**
 * True while a block is active and its expiry time (if any) lies after `asOf`.
 */
export function isBlockLive(block: Block, asOf: Timestamp): boolean {
  if (!block.active) return false;
  return !block.expiresAt || Date.parse(block.expiresAt) > Date.parse(asOf);
}

function requireAgentId(agentId: AgentId): void {
  if (agentId.trim() === '') {
    throw new BlockValidationError('agentId must not be empty', [
      { path: 'agentId', message: 'agentId must not be empty', code: 'MISSING_FIELD' },
    ]);
  }
}

// --- Registry ---

/**
 * The Block Registry owns the Block and AgentConfirmation lifecycles.
 *
 * It keeps no state of its own between calls; everything lives in the
 * repositories, so any number of registry instances may serve requests.
 *
 * @example
 * ```ts
 * const registry = createBlockRegistry({ repos });
 *
 * const { block } = await registry.addBlock({
 *   cidr: '1.2.3.4',
 *   requestedBy: 'admin',
 *   source: 'ids',
 *   reason: 'scanning',
 *   duration: 3600,
 * });
 * block.cidr; // '1.2.3.4/32'
 *
 * await registry.setBlocked('1.2.3.4', 'bgp1');
 * ```
 */
export class BlockRegistry {
  private readonly repos: RepositoryContext | TransactionalRepositoryContext;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(options: BlockRegistryOptions) {
    this.repos = options.repos;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Request a block for a network.
   *
   * If a live block already exists for the normalized network it is returned
   * unchanged. Otherwise the whitelist is consulted (unless skipWhitelist)
   * and a new block is created.
   *
   * @throws BlockValidationError if a request field is missing or malformed
   * @throws InvalidNetworkError if the cidr does not parse
   * @throws WhitelistConflictError if a whitelist entry covers the network
   */
  async addBlock(request: BlockRequest): Promise<AddBlockResult> {
    const validation = validateBlockRequest(request);
    if (!validation.valid) {
      throw new BlockValidationError('Invalid block request', validation.errors);
    }

    const network = parseNetwork(request.cidr);
    const cidr = normalizeCidr(request.cidr);
    const now = this.now();

    const result = await this.atomically(async (repos) => {
      // An elapsed block must not satisfy dedup, and must free the
      // one-active-per-cidr slot before we try to insert
      const expired = await repos.blocks.expireDue(now, cidr);
      for (const block of expired) {
        this.logger.info('Block expired', { blockId: block.id, cidr: block.cidr });
      }

      const existing = await repos.blocks.findLive(cidr, now);
      if (existing) {
        return { block: existing, created: false };
      }

      if (!request.skipWhitelist) {
        // Read through the transaction so the check holds no second connection
        const entry = await new WhitelistMatcher(repos).findCovering(network);
        if (entry) {
          throw new WhitelistConflictError(cidr, entry);
        }
      }

      return repos.blocks.createIfNoActive({
        cidr,
        requestedBy: request.requestedBy,
        source: request.source,
        reason: request.reason,
        createdAt: now,
        duration: request.duration,
      });
    });

    if (result.created) {
      this.logger.info('Block added', {
        blockId: result.block.id,
        cidr,
        requestedBy: request.requestedBy,
        source: request.source,
        duration: request.duration,
        skipWhitelist: request.skipWhitelist ?? false,
      });
    } else {
      this.logger.debug('Block already active', { blockId: result.block.id, cidr });
    }

    return result;
  }

  /**
   * Record that an agent has applied the live block for a network.
   * Safe to repeat; the confirmation time moves to the latest call.
   *
   * @throws InvalidNetworkError if the cidr does not parse
   * @throws NoSuchActiveBlockError if the network has no live block
   */
  async setBlocked(cidr: string, agentId: AgentId): Promise<AgentConfirmation> {
    requireAgentId(agentId);
    const normalized = normalizeCidr(cidr);
    const now = this.now();

    const confirmation = await this.atomically(async (repos) => {
      const block = await repos.blocks.findLive(normalized, now);
      if (!block) {
        throw new NoSuchActiveBlockError(normalized);
      }
      return repos.confirmations.confirm(block.id, agentId, now);
    });

    this.logger.info('Block confirmed', {
      blockId: confirmation.blockId,
      cidr: normalized,
      agentId,
    });
    return confirmation;
  }

  /**
   * Record that an agent no longer applies the live block for a network.
   * The block stays expected and returns to that agent's queue.
   *
   * @returns The cleared confirmation, or null if the agent never confirmed
   * @throws InvalidNetworkError if the cidr does not parse
   * @throws NoSuchActiveBlockError if the network has no live block
   */
  async setUnblocked(cidr: string, agentId: AgentId): Promise<AgentConfirmation | null> {
    requireAgentId(agentId);
    const normalized = normalizeCidr(cidr);
    const now = this.now();

    const confirmation = await this.atomically(async (repos) => {
      const block = await repos.blocks.findLive(normalized, now);
      if (!block) {
        throw new NoSuchActiveBlockError(normalized);
      }
      return repos.confirmations.clear(block.id, agentId, now);
    });

    this.logger.info('Block unconfirmed', {
      cidr: normalized,
      agentId,
      hadConfirmation: confirmation !== null,
    });
    return confirmation;
  }

  /**
   * Look up a block by network among all blocks, active or not.
   * When a network has several blocks the active one wins, then the newest.
   *
   * @throws InvalidNetworkError if the cidr does not parse
   */
  async getBlock(cidr: string): Promise<Block | null> {
    const history = await this.repos.blocks.history(normalizeCidr(cidr));
    return history.find((b) => b.active) ?? history[0] ?? null;
  }

  async getBlockById(id: Id): Promise<Block | null> {
    return this.repos.blocks.get(id);
  }

  /**
   * Every block ever created for a network, newest first.
   *
   * @throws InvalidNetworkError if the cidr does not parse
   */
  async history(cidr: string): Promise<Block[]> {
    return this.repos.blocks.history(normalizeCidr(cidr));
  }

  /**
   * Administratively end a block. Confirmations are kept for audit;
   * agents that still hold the block see it in their unblock queue.
   * Withdrawing an inactive block returns it unchanged.
   *
   * @throws BlockNotFoundError if no block has this id
   */
  async withdraw(blockId: Id, options: WithdrawOptions = {}): Promise<Block> {
    const block = await this.repos.blocks.get(blockId);
    if (!block) {
      throw new BlockNotFoundError(blockId);
    }
    if (!block.active) {
      return block;
    }

    const withdrawn = await this.repos.blocks.deactivate(blockId, {
      at: this.now(),
      cause: 'withdrawn',
      by: options.by,
      reason: options.reason,
    });

    if (!withdrawn) {
      // Deactivated concurrently (swept or withdrawn); report the stored state
      return (await this.repos.blocks.get(blockId)) ?? block;
    }

    this.logger.info('Block withdrawn', {
      blockId,
      cidr: withdrawn.cidr,
      by: options.by,
      reason: options.reason,
    });
    return withdrawn;
  }

  /**
   * Record that an agent removed a block that is no longer live.
   *
   * @returns The cleared confirmation, or null if the agent never confirmed
   * @throws BlockNotFoundError if no block has this id
   * @throws BlockStillActiveError if the block is still live
   */
  async markRemoved(blockId: Id, agentId: AgentId): Promise<AgentConfirmation | null> {
    requireAgentId(agentId);
    const now = this.now();

    const block = await this.repos.blocks.get(blockId);
    if (!block) {
      throw new BlockNotFoundError(blockId);
    }
    if (isBlockLive(block, now)) {
      throw new BlockStillActiveError(blockId);
    }

    const confirmation = await this.repos.confirmations.clear(blockId, agentId, now);
    this.logger.info('Block removed by agent', { blockId, cidr: block.cidr, agentId });
    return confirmation;
  }

  private now(): Timestamp {
    return this.clock().toISOString();
  }

  private atomically<T>(fn: (repos: RepositoryContext) => Promise<T>): Promise<T> {
    const repos = this.repos;
    if (isTransactional(repos)) {
      return repos.transaction(fn);
    }
    return fn(repos);
  }
}

export function createBlockRegistry(options: BlockRegistryOptions): BlockRegistry {
  return new BlockRegistry(options);
}
