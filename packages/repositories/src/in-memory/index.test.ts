// Tests for the in-memory repository context
// Verifies idempotent block creation, derived views and confirmation upserts.

import { describe, it, expect, beforeEach } from 'vitest';
import type { CreateBlockInput } from '../interfaces/index.js';
import {
  createInMemoryRepositoryContext,
  type InMemoryRepositoryContext,
} from './index.js';

const T0 = '2024-01-01T00:00:00.000Z';
const T1 = '2024-01-01T00:00:10.000Z';
const T2 = '2024-01-01T00:00:30.000Z';

function blockInput(overrides: Partial<CreateBlockInput> = {}): CreateBlockInput {
  return {
    cidr: '1.2.3.4/32',
    requestedBy: 'admin',
    source: 'test',
    reason: 'testing',
    createdAt: T0,
    ...overrides,
  };
}

describe('InMemoryRepositoryContext', () => {
  let repos: InMemoryRepositoryContext;

  beforeEach(() => {
    repos = createInMemoryRepositoryContext();
  });

  describe('blocks.createIfNoActive', () => {
    it('creates a block the first time', async () => {
      const result = await repos.blocks.createIfNoActive(blockInput());

      expect(result.created).toBe(true);
      expect(result.block).toMatchObject({
        id: 'block-1',
        cidr: '1.2.3.4/32',
        active: true,
      });
      expect(result.block.expiresAt).toBeUndefined();
    });

    it('returns the active block unchanged on a repeat', async () => {
      const first = await repos.blocks.createIfNoActive(blockInput());
      const second = await repos.blocks.createIfNoActive(
        blockInput({ source: 'other', reason: 'different', createdAt: T1 })
      );

      expect(second.created).toBe(false);
      expect(second.block).toEqual(first.block);
      expect(repos._data.blocks.size).toBe(1);
    });

    it('creates a fresh block once the previous one is inactive', async () => {
      const first = await repos.blocks.createIfNoActive(blockInput());
      await repos.blocks.deactivate(first.block.id, { at: T1, cause: 'withdrawn' });

      const second = await repos.blocks.createIfNoActive(blockInput({ createdAt: T1 }));

      expect(second.created).toBe(true);
      expect(second.block.id).toBe('block-2');
    });

    it('derives expiresAt from the duration', async () => {
      const { block } = await repos.blocks.createIfNoActive(blockInput({ duration: 30 }));
      expect(block.expiresAt).toBe(T2);
    });

    it('hands out copies that cannot alter the store', async () => {
      const { block } = await repos.blocks.createIfNoActive(blockInput());
      block.active = false;

      const stored = await repos.blocks.get(block.id);
      expect(stored?.active).toBe(true);
    });
  });

  describe('blocks.query', () => {
    it('splits live blocks into pending and current', async () => {
      const a = await repos.blocks.createIfNoActive(blockInput());
      const b = await repos.blocks.createIfNoActive(blockInput({ cidr: '5.6.7.8/32', createdAt: T1 }));
      await repos.confirmations.confirm(a.block.id, 'bgp1', T1);

      const ids = async (kind: 'expected' | 'pending' | 'current') =>
        (await repos.blocks.query({ view: { kind }, asOf: T1 })).map((blk) => blk.id);

      expect(await ids('expected')).toEqual([a.block.id, b.block.id]);
      expect(await ids('pending')).toEqual([b.block.id]);
      expect(await ids('current')).toEqual([a.block.id]);
    });

    it('builds per-agent queues', async () => {
      const { block } = await repos.blocks.createIfNoActive(blockInput());
      await repos.confirmations.confirm(block.id, 'bgp1', T1);

      const queue = (agentId: string) =>
        repos.blocks.query({ view: { kind: 'queue', agentId }, asOf: T1 });

      expect(await queue('bgp1')).toHaveLength(0);
      expect(await queue('bgp2')).toHaveLength(1);
    });

    it('puts a cleared confirmation back in the queue', async () => {
      const { block } = await repos.blocks.createIfNoActive(blockInput());
      await repos.confirmations.confirm(block.id, 'bgp1', T1);
      await repos.confirmations.clear(block.id, 'bgp1', T1);

      const queue = await repos.blocks.query({
        view: { kind: 'queue', agentId: 'bgp1' },
        asOf: T1,
      });
      expect(queue.map((blk) => blk.id)).toEqual([block.id]);
    });

    it('treats a block as gone once its expiry time is reached', async () => {
      const { block } = await repos.blocks.createIfNoActive(blockInput({ duration: 30 }));
      await repos.confirmations.confirm(block.id, 'bgp1', T1);

      expect(await repos.blocks.query({ view: { kind: 'current' }, asOf: T1 })).toHaveLength(1);
      expect(await repos.blocks.query({ view: { kind: 'current' }, asOf: T2 })).toHaveLength(0);
      expect(await repos.blocks.findLive('1.2.3.4/32', T2)).toBeNull();

      const unblock = await repos.blocks.query({
        view: { kind: 'unblock_queue', agentId: 'bgp1' },
        asOf: T2,
      });
      expect(unblock.map((blk) => blk.id)).toEqual([block.id]);
    });

    it('applies offset then limit', async () => {
      for (const cidr of ['10.0.0.1/32', '10.0.0.2/32', '10.0.0.3/32']) {
        await repos.blocks.createIfNoActive(blockInput({ cidr }));
      }

      const page = await repos.blocks.query({
        view: { kind: 'expected' },
        asOf: T1,
        offset: 1,
        limit: 1,
      });
      expect(page.map((blk) => blk.cidr)).toEqual(['10.0.0.2/32']);
    });
  });

  describe('blocks.deactivate', () => {
    it('only deactivates active blocks', async () => {
      const { block } = await repos.blocks.createIfNoActive(blockInput());

      const first = await repos.blocks.deactivate(block.id, {
        at: T1,
        cause: 'withdrawn',
        by: 'admin',
      });
      const second = await repos.blocks.deactivate(block.id, { at: T2, cause: 'withdrawn' });

      expect(first?.deactivated).toEqual({ at: T1, cause: 'withdrawn', by: 'admin' });
      expect(second).toBeNull();
    });
  });

  describe('blocks.expireDue', () => {
    it('expires only blocks whose time has come', async () => {
      const short = await repos.blocks.createIfNoActive(blockInput({ duration: 10 }));
      await repos.blocks.createIfNoActive(blockInput({ cidr: '5.6.7.8/32', duration: 60 }));
      await repos.blocks.createIfNoActive(blockInput({ cidr: '9.9.9.9/32' }));

      const expired = await repos.blocks.expireDue(T1);

      expect(expired.map((b) => b.id)).toEqual([short.block.id]);
      expect(expired[0].deactivated).toEqual({ at: T1, cause: 'expired' });
      expect(await repos.blocks.expireDue(T1)).toEqual([]);
    });

    it('can be limited to one network', async () => {
      await repos.blocks.createIfNoActive(blockInput({ duration: 10 }));
      await repos.blocks.createIfNoActive(blockInput({ cidr: '5.6.7.8/32', duration: 10 }));

      const expired = await repos.blocks.expireDue(T2, '5.6.7.8/32');

      expect(expired.map((b) => b.cidr)).toEqual(['5.6.7.8/32']);
    });
  });

  describe('blocks.history', () => {
    it('lists every block for a network, newest first', async () => {
      const first = await repos.blocks.createIfNoActive(blockInput());
      await repos.blocks.deactivate(first.block.id, { at: T1, cause: 'withdrawn' });
      const second = await repos.blocks.createIfNoActive(blockInput({ createdAt: T1 }));

      const history = await repos.blocks.history('1.2.3.4/32');
      expect(history.map((b) => b.id)).toEqual([second.block.id, first.block.id]);
    });
  });

  describe('confirmations', () => {
    it('keeps one row per block and agent', async () => {
      await repos.confirmations.confirm('block-1', 'bgp1', T0);
      const again = await repos.confirmations.confirm('block-1', 'bgp1', T1);

      expect(again).toEqual({
        blockId: 'block-1',
        agentId: 'bgp1',
        confirmedAt: T1,
        firstSeenAt: T0,
        updatedAt: T1,
      });
      expect(repos._data.confirmations.size).toBe(1);
    });

    it('clears without deleting the row', async () => {
      await repos.confirmations.confirm('block-1', 'bgp1', T0);
      const cleared = await repos.confirmations.clear('block-1', 'bgp1', T1);

      expect(cleared?.confirmedAt).toBeUndefined();
      expect(await repos.confirmations.get('block-1', 'bgp1')).not.toBeNull();
    });

    it('returns null when clearing a row that never existed', async () => {
      expect(await repos.confirmations.clear('block-1', 'bgp9', T0)).toBeNull();
    });

    it('lists distinct agents in order', async () => {
      await repos.confirmations.confirm('block-1', 'bgp2', T0);
      await repos.confirmations.confirm('block-2', 'bgp1', T0);
      await repos.confirmations.confirm('block-2', 'bgp2', T0);

      expect(await repos.confirmations.listAgents()).toEqual(['bgp1', 'bgp2']);
    });
  });

  describe('whitelist', () => {
    it('returns the existing entry for a duplicate cidr', async () => {
      const first = await repos.whitelist.create({
        cidr: '10.0.0.0/8',
        who: 'ops',
        why: 'core',
        createdAt: T0,
      });
      const second = await repos.whitelist.create({
        cidr: '10.0.0.0/8',
        who: 'someone-else',
        why: 'again',
        createdAt: T1,
      });

      expect(second).toEqual(first);
      expect(await repos.whitelist.list()).toHaveLength(1);
    });

    it('deletes by id', async () => {
      const entry = await repos.whitelist.create({
        cidr: '10.0.0.0/8',
        who: 'ops',
        why: 'core',
        createdAt: T0,
      });

      expect(await repos.whitelist.delete(entry.id)).toBe(true);
      expect(await repos.whitelist.delete(entry.id)).toBe(false);
    });
  });

  it('clear() empties every store', async () => {
    await repos.blocks.createIfNoActive(blockInput());
    await repos.confirmations.confirm('block-1', 'bgp1', T0);
    repos.clear();

    expect(repos._data.blocks.size).toBe(0);
    expect(repos._data.confirmations.size).toBe(0);
  });
});
