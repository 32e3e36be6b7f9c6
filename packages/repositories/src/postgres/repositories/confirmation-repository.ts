import { and, asc, eq } from 'drizzle-orm';
import type { DbExecutor } from '../db.js';
import { blockConfirmations } from '../schema/index.js';
import type { ConfirmationRepository } from '../../interfaces/index.js';
import type { AgentConfirmation, AgentId, Id, Timestamp } from '@bhr/protocol';

export class PgConfirmationRepository implements ConfirmationRepository {
  constructor(private db: DbExecutor) {}

  async confirm(blockId: Id, agentId: AgentId, at: Timestamp): Promise<AgentConfirmation> {
    const now = new Date(at);

    // Upsert on the (block_id, agent_id) primary key; the last report wins
    const [row] = await this.db
      .insert(blockConfirmations)
      .values({
        blockId,
        agentId,
        confirmedAt: now,
        firstSeenAt: now,
        updatedAt: now,
      })
      .onConflictDoUpdate({
        target: [blockConfirmations.blockId, blockConfirmations.agentId],
        set: { confirmedAt: now, updatedAt: now },
      })
      .returning();

    return this.rowToConfirmation(row);
  }

  async clear(blockId: Id, agentId: AgentId, at: Timestamp): Promise<AgentConfirmation | null> {
    const [row] = await this.db
      .update(blockConfirmations)
      .set({ confirmedAt: null, updatedAt: new Date(at) })
      .where(
        and(
          eq(blockConfirmations.blockId, blockId),
          eq(blockConfirmations.agentId, agentId)
        )
      )
      .returning();

    return row ? this.rowToConfirmation(row) : null;
  }

  async get(blockId: Id, agentId: AgentId): Promise<AgentConfirmation | null> {
    const [row] = await this.db
      .select()
      .from(blockConfirmations)
      .where(
        and(
          eq(blockConfirmations.blockId, blockId),
          eq(blockConfirmations.agentId, agentId)
        )
      );

    return row ? this.rowToConfirmation(row) : null;
  }

  async listAgents(): Promise<AgentId[]> {
    const rows = await this.db
      .selectDistinct({ agentId: blockConfirmations.agentId })
      .from(blockConfirmations)
      .orderBy(asc(blockConfirmations.agentId));

    return rows.map((r) => r.agentId);
  }

  private rowToConfirmation(row: typeof blockConfirmations.$inferSelect): AgentConfirmation {
    return {
      blockId: row.blockId,
      agentId: row.agentId,
      confirmedAt: row.confirmedAt?.toISOString(),
      firstSeenAt: row.firstSeenAt.toISOString(),
      updatedAt: row.updatedAt.toISOString(),
    };
  }
}
