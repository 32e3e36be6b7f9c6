// Block types - distributed blackhole requests and per-agent acknowledgements

import type { AgentId, Id, Timestamp } from './common.js';

/**
 * Why a block stopped being active.
 */
export type DeactivationCause = 'expired' | 'withdrawn';

/**
 * Record of a block leaving the active set. Once written it never changes.
 */
export type BlockDeactivation = {
  at: Timestamp;
  cause: DeactivationCause;
  by?: string;
  reason?: string;
};

/**
 * A Block asks every agent in the fleet to drop traffic for one network.
 *
 * At most one active Block exists per canonical CIDR. Views only ever
 * show live blocks: active and not past `expiresAt`.
 */
export type Block = {
  id: Id;

  /**
   * Canonical network text, always with an explicit prefix (`1.2.3.4/32`)
   */
  cidr: string;

  /**
   * Principal that asked for the block
   */
  requestedBy: string;

  /**
   * Free-text provenance, e.g. the detector or ticket that produced it
   */
  source: string;

  reason: string;

  createdAt: Timestamp;

  /**
   * Time-to-live in seconds. Absent means the block never expires.
   */
  duration?: number;

  /**
   * `createdAt + duration`, absent for indefinite blocks
   */
  expiresAt?: Timestamp;

  active: boolean;

  deactivated?: BlockDeactivation;
};

/**
 * One agent's acknowledgement state for one Block.
 *
 * Keyed by (blockId, agentId). `confirmedAt` is set while the agent reports
 * the block as applied and cleared when it reports it removed.
 */
export type AgentConfirmation = {
  blockId: Id;
  agentId: AgentId;
  confirmedAt?: Timestamp;
  firstSeenAt: Timestamp;
  updatedAt: Timestamp;
};

/**
 * Names of the derived block views.
 */
export type BlockViewName = 'expected' | 'pending' | 'current';

/**
 * Aggregate counts over the derived views.
 */
export type BlockStats = {
  expected: number;
  pending: number;
  current: number;
  queues: Record<AgentId, number>;
};
