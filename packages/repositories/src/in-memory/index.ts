// In-memory repository implementations for development and testing
//
// This module provides a complete in-memory implementation of all repositories,
// useful for:
// - Local development without a database
// - Fast unit testing
//
// Each mutating method does its check and write without awaiting in between,
// so concurrent callers on one event loop cannot interleave inside it.
// Data does not persist between restarts.

import type { AgentConfirmation, Block, WhitelistEntry } from '@bhr/protocol';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  BlockRepository,
  BlockView,
  ConfirmationRepository,
  WhitelistRepository,
} from '../interfaces/index.js';

/**
 * In-memory data store that can be accessed for debugging/inspection.
 */
export interface InMemoryDataStore {
  blocks: Map<string, Block>;
  /** Keyed by confirmationKey(blockId, agentId) */
  confirmations: Map<string, AgentConfirmation>;
  whitelist: Map<string, WhitelistEntry>;
}

/**
 * Extended repository context with access to underlying data and clear function.
 */
export interface InMemoryRepositoryContext extends TransactionalRepositoryContext {
  /** Direct access to underlying data stores (for debugging/testing) */
  _data: InMemoryDataStore;
  /** Clear all data */
  clear(): void;
}

export function confirmationKey(blockId: string, agentId: string): string {
  return `${blockId}\u0000${agentId}`;
}

function copyBlock(block: Block): Block {
  return {
    ...block,
    deactivated: block.deactivated ? { ...block.deactivated } : undefined,
  };
}

function expiresAtFor(createdAt: string, duration?: number): string | undefined {
  if (duration === undefined) return undefined;
  return new Date(Date.parse(createdAt) + duration * 1000).toISOString();
}

function isLive(block: Block, asOfMs: number): boolean {
  if (!block.active) return false;
  return !block.expiresAt || Date.parse(block.expiresAt) > asOfMs;
}

function byCreatedAt(a: Block, b: Block): number {
  return Date.parse(a.createdAt) - Date.parse(b.createdAt);
}

/**
 * Create a complete in-memory repository context.
 *
 * @example
 * ```typescript
 * const repos = createInMemoryRepositoryContext();
 * const registry = new BlockRegistry({ repos });
 *
 * await registry.addBlock({ cidr: '1.2.3.4', ... });
 * console.log(repos._data.blocks.size); // 1
 *
 * repos.clear();
 * ```
 */
export function createInMemoryRepositoryContext(): InMemoryRepositoryContext {
  // Data stores
  const blocks = new Map<string, Block>();
  const confirmations = new Map<string, AgentConfirmation>();
  const whitelist = new Map<string, WhitelistEntry>();

  // Ids stay unique across clear()
  let blockSeq = 0;
  let whitelistSeq = 0;

  const isConfirmedBy = (blockId: string, agentId: string): boolean =>
    confirmations.get(confirmationKey(blockId, agentId))?.confirmedAt !== undefined;

  const isConfirmedAnywhere = (blockId: string): boolean => {
    for (const confirmation of confirmations.values()) {
      if (confirmation.blockId === blockId && confirmation.confirmedAt !== undefined) {
        return true;
      }
    }
    return false;
  };

  const matchesView = (block: Block, view: BlockView, asOfMs: number): boolean => {
    switch (view.kind) {
      case 'expected':
        return isLive(block, asOfMs);
      case 'pending':
        return isLive(block, asOfMs) && !isConfirmedAnywhere(block.id);
      case 'current':
        return isLive(block, asOfMs) && isConfirmedAnywhere(block.id);
      case 'queue':
        return isLive(block, asOfMs) && !isConfirmedBy(block.id, view.agentId);
      case 'unblock_queue':
        return !isLive(block, asOfMs) && isConfirmedBy(block.id, view.agentId);
    }
  };

  // Block repository
  const blockRepo: BlockRepository = {
    async createIfNoActive(input) {
      for (const existing of blocks.values()) {
        if (existing.active && existing.cidr === input.cidr) {
          return { block: copyBlock(existing), created: false };
        }
      }

      blockSeq += 1;
      const id = input.id ?? `block-${blockSeq}`;
      const block: Block = {
        id,
        cidr: input.cidr,
        requestedBy: input.requestedBy,
        source: input.source,
        reason: input.reason,
        createdAt: input.createdAt,
        duration: input.duration,
        expiresAt: expiresAtFor(input.createdAt, input.duration),
        active: true,
      };
      blocks.set(id, block);
      return { block: copyBlock(block), created: true };
    },
    async get(id) {
      const block = blocks.get(id);
      return block ? copyBlock(block) : null;
    },
    async findLive(cidr, asOf) {
      const asOfMs = Date.parse(asOf);
      for (const block of blocks.values()) {
        if (block.cidr === cidr && isLive(block, asOfMs)) {
          return copyBlock(block);
        }
      }
      return null;
    },
    async history(cidr) {
      return Array.from(blocks.values())
        .filter((b) => b.cidr === cidr)
        .sort(byCreatedAt)
        .reverse()
        .map(copyBlock);
    },
    async query(filter) {
      const asOfMs = Date.parse(filter.asOf);
      let result = Array.from(blocks.values())
        .filter((b) => matchesView(b, filter.view, asOfMs))
        .sort(byCreatedAt);
      if (filter.offset) {
        result = result.slice(filter.offset);
      }
      if (filter.limit) {
        result = result.slice(0, filter.limit);
      }
      return result.map(copyBlock);
    },
    async deactivate(id, deactivation) {
      const block = blocks.get(id);
      if (!block || !block.active) return null;
      block.active = false;
      block.deactivated = { ...deactivation };
      return copyBlock(block);
    },
    async expireDue(asOf, cidr) {
      const asOfMs = Date.parse(asOf);
      const expired: Block[] = [];
      for (const block of blocks.values()) {
        if (!block.active || !block.expiresAt) continue;
        if (cidr !== undefined && block.cidr !== cidr) continue;
        if (Date.parse(block.expiresAt) <= asOfMs) {
          block.active = false;
          block.deactivated = { at: asOf, cause: 'expired' };
          expired.push(copyBlock(block));
        }
      }
      return expired;
    },
  };

  // Confirmation repository
  const confirmationRepo: ConfirmationRepository = {
    async confirm(blockId, agentId, at) {
      const key = confirmationKey(blockId, agentId);
      const existing = confirmations.get(key);
      const confirmation: AgentConfirmation = {
        blockId,
        agentId,
        confirmedAt: at,
        firstSeenAt: existing?.firstSeenAt ?? at,
        updatedAt: at,
      };
      confirmations.set(key, confirmation);
      return { ...confirmation };
    },
    async clear(blockId, agentId, at) {
      const key = confirmationKey(blockId, agentId);
      const existing = confirmations.get(key);
      if (!existing) return null;
      const confirmation: AgentConfirmation = {
        blockId,
        agentId,
        confirmedAt: undefined,
        firstSeenAt: existing.firstSeenAt,
        updatedAt: at,
      };
      confirmations.set(key, confirmation);
      return { ...confirmation };
    },
    async get(blockId, agentId) {
      const confirmation = confirmations.get(confirmationKey(blockId, agentId));
      return confirmation ? { ...confirmation } : null;
    },
    async listAgents() {
      const agents = new Set<string>();
      for (const confirmation of confirmations.values()) {
        agents.add(confirmation.agentId);
      }
      return Array.from(agents).sort();
    },
  };

  // Whitelist repository
  const whitelistRepo: WhitelistRepository = {
    async create(input) {
      for (const existing of whitelist.values()) {
        if (existing.cidr === input.cidr) return { ...existing };
      }
      whitelistSeq += 1;
      const entry: WhitelistEntry = {
        id: input.id ?? `whitelist-${whitelistSeq}`,
        cidr: input.cidr,
        who: input.who,
        why: input.why,
        createdAt: input.createdAt,
      };
      whitelist.set(entry.id, entry);
      return { ...entry };
    },
    async get(id) {
      const entry = whitelist.get(id);
      return entry ? { ...entry } : null;
    },
    async list() {
      return Array.from(whitelist.values()).map((e) => ({ ...e }));
    },
    async delete(id) {
      return whitelist.delete(id);
    },
  };

  // Build context
  const context: RepositoryContext = {
    blocks: blockRepo,
    confirmations: confirmationRepo,
    whitelist: whitelistRepo,
  };

  return {
    ...context,
    // Transaction support (each in-memory call is already atomic)
    async transaction<T>(fn: (repos: RepositoryContext) => Promise<T>): Promise<T> {
      return fn(context);
    },
    _data: {
      blocks,
      confirmations,
      whitelist,
    },
    clear() {
      blocks.clear();
      confirmations.clear();
      whitelist.clear();
    },
  };
}
