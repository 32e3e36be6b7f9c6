// Tests for the Block Registry

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { InvalidNetworkError, type BlockRequest } from '@bhr/protocol';
import {
  memory,
  type RepositoryContext,
  type TransactionalRepositoryContext,
} from '@bhr/repositories';
import { BlockRegistry, isBlockLive } from './registry.js';
import { BlockViews } from '../views/views.js';
import { WhitelistAdmin } from '../whitelist/admin.js';
import {
  BlockNotFoundError,
  BlockStillActiveError,
  BlockValidationError,
  NoSuchActiveBlockError,
  WhitelistConflictError,
} from '../errors.js';
import { createManualClock } from '../clock.js';
import { createCapturingLogger } from '../logging.js';

const START = '2025-03-01T00:00:00.000Z';

function request(cidr: string, overrides: Partial<BlockRequest> = {}): BlockRequest {
  return {
    cidr,
    requestedBy: 'admin',
    source: 'ids',
    reason: 'port scanning',
    ...overrides,
  };
}

describe('BlockRegistry', () => {
  let repos: memory.InMemoryRepositoryContext;
  let clock: ReturnType<typeof createManualClock>;
  let registry: BlockRegistry;
  let views: BlockViews;
  let whitelist: WhitelistAdmin;

  beforeEach(() => {
    repos = memory.createInMemoryRepositoryContext();
    clock = createManualClock(START);
    registry = new BlockRegistry({ repos, clock });
    views = new BlockViews({ repos, clock });
    whitelist = new WhitelistAdmin({ repos, clock });
  });

  describe('addBlock', () => {
    it('renders a bare address as a single-host network', async () => {
      const { block, created } = await registry.addBlock(request('1.2.3.4'));

      expect(created).toBe(true);
      expect(block.cidr).toBe('1.2.3.4/32');
      expect(block.active).toBe(true);
      expect(block.createdAt).toBe(START);
      expect(block.expiresAt).toBeUndefined();
    });

    it('derives expiresAt from the duration', async () => {
      const { block } = await registry.addBlock(request('1.2.3.4', { duration: 3600 }));

      expect(block.duration).toBe(3600);
      expect(block.expiresAt).toBe('2025-03-01T01:00:00.000Z');
    });

    it('returns the same block when asked twice', async () => {
      const first = await registry.addBlock(request('1.2.3.4'));
      clock.advance(1000);
      const second = await registry.addBlock(request('1.2.3.4/32', { reason: 'again' }));

      expect(second.created).toBe(false);
      expect(second.block.id).toBe(first.block.id);
      expect(second.block.reason).toBe('port scanning');
    });

    it('keeps exactly one expected block per network', async () => {
      await registry.addBlock(request('1.2.3.4'));
      await registry.addBlock(request('1.2.3.4'));
      await registry.addBlock(request(' 1.2.3.4/32 '));

      const expected = await views.expected();
      expect(expected).toHaveLength(1);
      expect(expected[0].cidr).toBe('1.2.3.4/32');
    });

    it('hands concurrent creators the same block', async () => {
      const [a, b] = await Promise.all([
        registry.addBlock(request('10.0.0.0/8')),
        registry.addBlock(request('10.0.0.0/8')),
      ]);

      expect(a.block.id).toBe(b.block.id);
      expect([a.created, b.created].filter(Boolean)).toHaveLength(1);
      expect(repos._data.blocks.size).toBe(1);
    });

    it('masks host bits before deduplicating', async () => {
      const first = await registry.addBlock(request('10.1.2.3/8'));
      const second = await registry.addBlock(request('10.0.0.0/8'));

      expect(first.block.cidr).toBe('10.0.0.0/8');
      expect(second.block.id).toBe(first.block.id);
    });

    it('treats networks of different prefix length as distinct', async () => {
      const host = await registry.addBlock(request('1.2.3.4'));
      const net = await registry.addBlock(request('1.2.3.0/24'));

      expect(net.created).toBe(true);
      expect(net.block.id).not.toBe(host.block.id);
      expect(await views.expected()).toHaveLength(2);
    });

    it('rejects malformed networks without storing anything', async () => {
      await expect(registry.addBlock(request('1.2.3.999'))).rejects.toBeInstanceOf(
        InvalidNetworkError
      );
      await expect(registry.addBlock(request('1.2.3.4/33'))).rejects.toBeInstanceOf(
        InvalidNetworkError
      );
      expect(repos._data.blocks.size).toBe(0);
    });

    it('rejects requests with missing fields', async () => {
      const error = await registry
        .addBlock(request('1.2.3.4', { reason: '' }))
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BlockValidationError);
      expect(error).toMatchObject({
        code: 'VALIDATION_ERROR',
        errors: [{ path: 'reason', code: 'MISSING_FIELD' }],
      });
      expect(repos._data.blocks.size).toBe(0);
    });

    it('logs created blocks', async () => {
      const logger = createCapturingLogger();
      registry = new BlockRegistry({ repos, clock, logger });

      const { block } = await registry.addBlock(request('1.2.3.4'));

      expect(logger.entries).toHaveLength(1);
      expect(logger.entries[0]).toMatchObject({
        level: 'info',
        message: 'Block added',
        data: { blockId: block.id, cidr: '1.2.3.4/32', requestedBy: 'admin' },
      });
    });
  });

  describe('whitelist enforcement', () => {
    beforeEach(async () => {
      await whitelist.addEntry({ cidr: '1.2.3.0/24', who: 'netops', why: 'office uplink' });
    });

    it('refuses a network inside a whitelist entry', async () => {
      const error = await registry.addBlock(request('1.2.3.4')).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(WhitelistConflictError);
      expect(error).toMatchObject({
        code: 'WHITELIST_CONFLICT',
        cidr: '1.2.3.4/32',
        entry: { cidr: '1.2.3.0/24', who: 'netops' },
      });
      expect(repos._data.blocks.size).toBe(0);
    });

    it('reads the whitelist through the transaction it runs in', async () => {
      const rootList = vi.fn(repos.whitelist.list);
      const txList = vi.fn(repos.whitelist.list);
      const txRepos: RepositoryContext = {
        ...repos,
        whitelist: { ...repos.whitelist, list: txList },
      };
      const wrapped: TransactionalRepositoryContext = {
        ...repos,
        whitelist: { ...repos.whitelist, list: rootList },
        transaction: (fn) => fn(txRepos),
      };
      registry = new BlockRegistry({ repos: wrapped, clock });

      await expect(registry.addBlock(request('1.2.3.4'))).rejects.toBeInstanceOf(
        WhitelistConflictError
      );
      expect(txList).toHaveBeenCalledTimes(1);
      expect(rootList).not.toHaveBeenCalled();
    });

    it('creates the block when told to skip the whitelist', async () => {
      const { block, created } = await registry.addBlock(
        request('1.2.3.4', { skipWhitelist: true })
      );

      expect(created).toBe(true);
      expect(block.cidr).toBe('1.2.3.4/32');
    });

    it('allows a broader network that only overlaps an entry', async () => {
      const { created } = await registry.addBlock(request('1.2.0.0/16'));
      expect(created).toBe(true);
    });

    it('returns an existing block even if the network was whitelisted later', async () => {
      const { block } = await registry.addBlock(request('5.6.7.8'));
      await whitelist.addEntry({ cidr: '5.6.7.0/24', who: 'netops', why: 'partner' });

      const again = await registry.addBlock(request('5.6.7.8'));
      expect(again.created).toBe(false);
      expect(again.block.id).toBe(block.id);
    });
  });

  describe('agent confirmations', () => {
    it('moves a block from pending to current on the first confirmation', async () => {
      const { block } = await registry.addBlock(request('1.2.3.4'));

      expect((await views.pending()).map((b) => b.id)).toEqual([block.id]);
      expect(await views.current()).toEqual([]);

      await registry.setBlocked('1.2.3.4', 'bgp1');

      expect(await views.pending()).toEqual([]);
      expect((await views.current()).map((b) => b.id)).toEqual([block.id]);
    });

    it('keeps the block expected after the sole agent unblocks it', async () => {
      await registry.addBlock(request('1.2.3.4'));
      await registry.setBlocked('1.2.3.4', 'bgp1');
      await registry.setUnblocked('1.2.3.4', 'bgp1');

      expect(await views.current()).toEqual([]);
      expect(await views.pending()).toHaveLength(1);
      expect(await views.expected()).toHaveLength(1);
      expect(await views.queue('bgp1')).toHaveLength(1);
    });

    it('tracks each agent queue independently', async () => {
      await registry.addBlock(request('1.2.3.4'));

      expect(await views.queue('bgp1')).toHaveLength(1);
      expect(await views.queue('bgp2')).toHaveLength(1);

      await registry.setBlocked('1.2.3.4', 'bgp1');

      expect(await views.queue('bgp1')).toHaveLength(0);
      expect(await views.queue('bgp2')).toHaveLength(1);
      expect(await views.current()).toHaveLength(1);
    });

    it('counts a block once however many agents confirm it', async () => {
      await registry.addBlock(request('1.2.3.4'));
      await registry.setBlocked('1.2.3.4', 'bgp1');
      await registry.setBlocked('1.2.3.4', 'bgp2');

      expect(await views.queue('bgp1')).toHaveLength(0);
      expect(await views.queue('bgp2')).toHaveLength(0);
      expect(await views.current()).toHaveLength(1);
      expect(await views.pending()).toHaveLength(0);
    });

    it('accepts repeated confirmations from one agent', async () => {
      const { block } = await registry.addBlock(request('1.2.3.4'));
      const first = await registry.setBlocked('1.2.3.4', 'bgp1');
      clock.advance(5000);
      const second = await registry.setBlocked('1.2.3.4/32', 'bgp1');

      expect(first.blockId).toBe(block.id);
      expect(second.firstSeenAt).toBe(START);
      expect(second.confirmedAt).toBe('2025-03-01T00:00:05.000Z');
      expect(repos._data.confirmations.size).toBe(1);
    });

    it('returns null when unblocking a block the agent never confirmed', async () => {
      await registry.addBlock(request('1.2.3.4'));
      expect(await registry.setUnblocked('1.2.3.4', 'bgp1')).toBeNull();
    });

    it('rejects reports for networks without an active block', async () => {
      await expect(registry.setBlocked('9.9.9.9', 'bgp1')).rejects.toBeInstanceOf(
        NoSuchActiveBlockError
      );
      await expect(registry.setUnblocked('9.9.9.9', 'bgp1')).rejects.toMatchObject({
        code: 'NO_SUCH_ACTIVE_BLOCK',
        cidr: '9.9.9.9/32',
      });
    });

    it('rejects an empty agent id', async () => {
      await registry.addBlock(request('1.2.3.4'));
      await expect(registry.setBlocked('1.2.3.4', ' ')).rejects.toBeInstanceOf(
        BlockValidationError
      );
    });
  });

  describe('expiry', () => {
    it('stops treating an elapsed block as live', async () => {
      await registry.addBlock(request('1.2.3.4', { duration: 60 }));
      clock.advance(60_000);

      expect(await views.expected()).toEqual([]);
      await expect(registry.setBlocked('1.2.3.4', 'bgp1')).rejects.toBeInstanceOf(
        NoSuchActiveBlockError
      );
    });

    it('creates a fresh block once the previous one has elapsed', async () => {
      const first = await registry.addBlock(request('1.2.3.4', { duration: 60 }));
      clock.advance(61_000);

      const second = await registry.addBlock(request('1.2.3.4'));

      expect(second.created).toBe(true);
      expect(second.block.id).not.toBe(first.block.id);

      const old = await registry.getBlockById(first.block.id);
      expect(old?.active).toBe(false);
      expect(old?.deactivated).toEqual({ at: '2025-03-01T00:01:01.000Z', cause: 'expired' });
    });
  });

  describe('withdraw', () => {
    it('deactivates the block and records who withdrew it', async () => {
      const { block } = await registry.addBlock(request('1.2.3.4'));
      clock.advance(1000);

      const withdrawn = await registry.withdraw(block.id, { by: 'alice', reason: 'false positive' });

      expect(withdrawn.active).toBe(false);
      expect(withdrawn.deactivated).toEqual({
        at: '2025-03-01T00:00:01.000Z',
        cause: 'withdrawn',
        by: 'alice',
        reason: 'false positive',
      });
      expect(await views.expected()).toEqual([]);
    });

    it('puts the block in the unblock queue of agents that applied it', async () => {
      const { block } = await registry.addBlock(request('1.2.3.4'));
      await registry.setBlocked('1.2.3.4', 'bgp1');
      await registry.withdraw(block.id);

      expect((await views.unblockQueue('bgp1')).map((b) => b.id)).toEqual([block.id]);
      expect(await views.unblockQueue('bgp2')).toEqual([]);

      await registry.markRemoved(block.id, 'bgp1');
      expect(await views.unblockQueue('bgp1')).toEqual([]);
    });

    it('returns an already inactive block unchanged', async () => {
      const { block } = await registry.addBlock(request('1.2.3.4'));
      const first = await registry.withdraw(block.id, { by: 'alice' });
      clock.advance(1000);
      const second = await registry.withdraw(block.id, { by: 'bob' });

      expect(second).toEqual(first);
    });

    it('rejects unknown block ids', async () => {
      await expect(registry.withdraw('block-missing')).rejects.toBeInstanceOf(BlockNotFoundError);
    });
  });

  describe('markRemoved', () => {
    it('refuses while the block is still live', async () => {
      const { block } = await registry.addBlock(request('1.2.3.4'));
      await registry.setBlocked('1.2.3.4', 'bgp1');

      await expect(registry.markRemoved(block.id, 'bgp1')).rejects.toBeInstanceOf(
        BlockStillActiveError
      );
    });

    it('accepts elapsed blocks that have not been swept yet', async () => {
      const { block } = await registry.addBlock(request('1.2.3.4', { duration: 60 }));
      await registry.setBlocked('1.2.3.4', 'bgp1');
      clock.advance(60_000);

      expect(await views.unblockQueue('bgp1')).toHaveLength(1);

      const cleared = await registry.markRemoved(block.id, 'bgp1');
      expect(cleared?.confirmedAt).toBeUndefined();
      expect(await views.unblockQueue('bgp1')).toEqual([]);
    });
  });

  describe('getBlock', () => {
    it('returns null for a network never blocked', async () => {
      expect(await registry.getBlock('1.2.3.4')).toBeNull();
    });

    it('prefers the active block over older inactive ones', async () => {
      const first = await registry.addBlock(request('1.2.3.4'));
      await registry.withdraw(first.block.id);
      clock.advance(1000);
      const second = await registry.addBlock(request('1.2.3.4'));

      expect((await registry.getBlock('1.2.3.4'))?.id).toBe(second.block.id);
      expect((await registry.history('1.2.3.4')).map((b) => b.id)).toEqual([
        second.block.id,
        first.block.id,
      ]);
    });

    it('falls back to the newest inactive block', async () => {
      const first = await registry.addBlock(request('1.2.3.4'));
      await registry.withdraw(first.block.id);

      const found = await registry.getBlock('1.2.3.4/32');
      expect(found?.id).toBe(first.block.id);
      expect(found?.active).toBe(false);
    });
  });
});

describe('isBlockLive', () => {
  const block = {
    id: 'block-1',
    cidr: '1.2.3.4/32',
    requestedBy: 'admin',
    source: 'ids',
    reason: 'test',
    createdAt: START,
    duration: 60,
    expiresAt: '2025-03-01T00:01:00.000Z',
    active: true,
  };

  it('is live before expiresAt', () => {
    expect(isBlockLive(block, '2025-03-01T00:00:59.999Z')).toBe(true);
  });

  it('is not live at expiresAt', () => {
    expect(isBlockLive(block, '2025-03-01T00:01:00.000Z')).toBe(false);
  });

  it('is not live once deactivated', () => {
    expect(isBlockLive({ ...block, active: false }, START)).toBe(false);
  });
});
