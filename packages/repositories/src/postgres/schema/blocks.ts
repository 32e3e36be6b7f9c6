import { sql } from 'drizzle-orm';
import {
  pgTable,
  text,
  timestamp,
  integer,
  boolean,
  jsonb,
  index,
  uniqueIndex,
  primaryKey,
} from 'drizzle-orm/pg-core';
import type { BlockDeactivation } from '@bhr/protocol';

/**
 * Blocks table - one row per blackhole request.
 *
 * The partial unique index is what makes create idempotent under
 * concurrency: only one row per cidr may have active = true.
 */
export const blocks = pgTable(
  'blocks',
  {
    id: text('id').primaryKey(),
    cidr: text('cidr').notNull(), // canonical text, e.g. 1.2.3.4/32
    requestedBy: text('requested_by').notNull(),
    source: text('source').notNull(),
    reason: text('reason').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    duration: integer('duration'), // seconds
    expiresAt: timestamp('expires_at', { withTimezone: true }),
    active: boolean('active').notNull().default(true),
    deactivated: jsonb('deactivated').$type<BlockDeactivation>(),
  },
  (table) => [
    uniqueIndex('blocks_active_cidr_idx')
      .on(table.cidr)
      .where(sql`${table.active}`),
    index('blocks_cidr_idx').on(table.cidr),
    index('blocks_active_expires_idx').on(table.active, table.expiresAt),
  ]
);

/**
 * Block confirmations - one row per (block, agent).
 *
 * Agents are identified only by this key; there is no agent table.
 * A null confirmed_at means the agent has reported the block removed.
 */
export const blockConfirmations = pgTable(
  'block_confirmations',
  {
    blockId: text('block_id')
      .notNull()
      .references(() => blocks.id, { onDelete: 'cascade' }),
    agentId: text('agent_id').notNull(),
    confirmedAt: timestamp('confirmed_at', { withTimezone: true }),
    firstSeenAt: timestamp('first_seen_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    primaryKey({ columns: [table.blockId, table.agentId] }),
    index('block_confirmations_agent_idx').on(table.agentId),
  ]
);
