import type { AgentConfirmation, AgentId, Id, Timestamp } from '@bhr/protocol';

/**
 * Repository interface for per-agent block confirmations.
 *
 * (blockId, agentId) is the natural key; there is no agent table.
 * Rows are never deleted, only their confirmedAt toggled.
 */
export interface ConfirmationRepository {
  /**
   * Upsert the row for (blockId, agentId) with confirmedAt = at
   */
  confirm(blockId: Id, agentId: AgentId, at: Timestamp): Promise<AgentConfirmation>;

  /**
   * Clear confirmedAt on an existing row
   * @returns The updated row, or null if the agent never reported this block
   */
  clear(blockId: Id, agentId: AgentId, at: Timestamp): Promise<AgentConfirmation | null>;

  /**
   * Get the row for (blockId, agentId)
   */
  get(blockId: Id, agentId: AgentId): Promise<AgentConfirmation | null>;

  /**
   * Every agent id that has ever reported, sorted
   */
  listAgents(): Promise<AgentId[]>;
}
