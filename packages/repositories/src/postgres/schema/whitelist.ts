import { pgTable, text, timestamp, uniqueIndex } from 'drizzle-orm/pg-core';

/**
 * Whitelist entries - networks that block creation must not cover.
 */
export const whitelistEntries = pgTable(
  'whitelist_entries',
  {
    id: text('id').primaryKey(),
    cidr: text('cidr').notNull(),
    who: text('who').notNull(),
    why: text('why').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [uniqueIndex('whitelist_entries_cidr_idx').on(table.cidr)]
);
