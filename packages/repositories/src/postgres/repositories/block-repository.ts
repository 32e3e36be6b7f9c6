import {
  and,
  asc,
  desc,
  eq,
  exists,
  gt,
  isNotNull,
  isNull,
  lte,
  notExists,
  or,
  sql,
  type SQL,
} from 'drizzle-orm';
import type { DbExecutor } from '../db.js';
import { blocks, blockConfirmations } from '../schema/index.js';
import type {
  BlockRepository,
  BlockFilter,
  BlockView,
  CreateBlockInput,
  CreateBlockResult,
} from '../../interfaces/index.js';
import type { Block, BlockDeactivation, Id, Timestamp } from '@bhr/protocol';

// A concurrent withdraw can remove the winner between our insert and re-read
const CREATE_ATTEMPTS = 3;

export class PgBlockRepository implements BlockRepository {
  constructor(private db: DbExecutor) {}

  async createIfNoActive(input: CreateBlockInput): Promise<CreateBlockResult> {
    const createdAt = new Date(input.createdAt);
    const expiresAt =
      input.duration !== undefined
        ? new Date(createdAt.getTime() + input.duration * 1000)
        : null;

    for (let attempt = 0; attempt < CREATE_ATTEMPTS; attempt++) {
      const [row] = await this.db
        .insert(blocks)
        .values({
          id: input.id ?? crypto.randomUUID(),
          cidr: input.cidr,
          requestedBy: input.requestedBy,
          source: input.source,
          reason: input.reason,
          createdAt,
          duration: input.duration ?? null,
          expiresAt,
          active: true,
        })
        .onConflictDoNothing({ target: blocks.cidr, where: sql`${blocks.active}` })
        .returning();

      if (row) {
        return { block: this.rowToBlock(row), created: true };
      }

      // Lost the race (or the block already existed): hand back the winner
      const [existing] = await this.db
        .select()
        .from(blocks)
        .where(and(eq(blocks.cidr, input.cidr), eq(blocks.active, true)));

      if (existing) {
        return { block: this.rowToBlock(existing), created: false };
      }
    }

    throw new Error(`Could not create or find an active block for ${input.cidr}`);
  }

  async get(id: Id): Promise<Block | null> {
    const [row] = await this.db.select().from(blocks).where(eq(blocks.id, id));
    return row ? this.rowToBlock(row) : null;
  }

  async findLive(cidr: string, asOf: Timestamp): Promise<Block | null> {
    const [row] = await this.db
      .select()
      .from(blocks)
      .where(and(eq(blocks.cidr, cidr), this.liveAt(new Date(asOf))));
    return row ? this.rowToBlock(row) : null;
  }

  async history(cidr: string): Promise<Block[]> {
    const rows = await this.db
      .select()
      .from(blocks)
      .where(eq(blocks.cidr, cidr))
      .orderBy(desc(blocks.createdAt), desc(blocks.id));
    return rows.map((r) => this.rowToBlock(r));
  }

  async query(filter: BlockFilter): Promise<Block[]> {
    let query = this.db
      .select()
      .from(blocks)
      .where(this.viewCondition(filter.view, new Date(filter.asOf)))
      .orderBy(asc(blocks.createdAt), asc(blocks.id))
      .$dynamic();

    if (filter.limit) {
      query = query.limit(filter.limit);
    }

    if (filter.offset) {
      query = query.offset(filter.offset);
    }

    const rows = await query;
    return rows.map((r) => this.rowToBlock(r));
  }

  async deactivate(id: Id, deactivation: BlockDeactivation): Promise<Block | null> {
    const [row] = await this.db
      .update(blocks)
      .set({ active: false, deactivated: deactivation })
      .where(and(eq(blocks.id, id), eq(blocks.active, true)))
      .returning();

    return row ? this.rowToBlock(row) : null;
  }

  async expireDue(asOf: Timestamp, cidr?: string): Promise<Block[]> {
    const conditions = [
      eq(blocks.active, true),
      isNotNull(blocks.expiresAt),
      lte(blocks.expiresAt, new Date(asOf)),
    ];

    if (cidr !== undefined) {
      conditions.push(eq(blocks.cidr, cidr));
    }

    const rows = await this.db
      .update(blocks)
      .set({ active: false, deactivated: { at: asOf, cause: 'expired' } })
      .where(and(...conditions))
      .returning();

    return rows.map((r) => this.rowToBlock(r));
  }

  private liveAt(asOf: Date): SQL | undefined {
    return and(
      eq(blocks.active, true),
      or(isNull(blocks.expiresAt), gt(blocks.expiresAt, asOf))
    );
  }

  private confirmation(agentId?: string) {
    const conditions = [
      eq(blockConfirmations.blockId, blocks.id),
      isNotNull(blockConfirmations.confirmedAt),
    ];
    if (agentId !== undefined) {
      conditions.push(eq(blockConfirmations.agentId, agentId));
    }
    return this.db
      .select({ one: sql`1` })
      .from(blockConfirmations)
      .where(and(...conditions));
  }

  private viewCondition(view: BlockView, asOf: Date): SQL | undefined {
    const live = this.liveAt(asOf);
    switch (view.kind) {
      case 'expected':
        return live;
      case 'pending':
        return and(live, notExists(this.confirmation()));
      case 'current':
        return and(live, exists(this.confirmation()));
      case 'queue':
        return and(live, notExists(this.confirmation(view.agentId)));
      case 'unblock_queue':
        return and(
          or(
            eq(blocks.active, false),
            and(isNotNull(blocks.expiresAt), lte(blocks.expiresAt, asOf))
          ),
          exists(this.confirmation(view.agentId))
        );
    }
  }

  private rowToBlock(row: typeof blocks.$inferSelect): Block {
    return {
      id: row.id,
      cidr: row.cidr,
      requestedBy: row.requestedBy,
      source: row.source,
      reason: row.reason,
      createdAt: row.createdAt.toISOString(),
      duration: row.duration ?? undefined,
      expiresAt: row.expiresAt?.toISOString(),
      active: row.active,
      deactivated: row.deactivated ?? undefined,
    };
  }
}
