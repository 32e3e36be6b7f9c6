import { asc, eq } from 'drizzle-orm';
import type { DbExecutor } from '../db.js';
import { whitelistEntries } from '../schema/index.js';
import type {
  WhitelistRepository,
  CreateWhitelistEntryInput,
} from '../../interfaces/index.js';
import type { Id, WhitelistEntry } from '@bhr/protocol';

export class PgWhitelistRepository implements WhitelistRepository {
  constructor(private db: DbExecutor) {}

  async create(input: CreateWhitelistEntryInput): Promise<WhitelistEntry> {
    const [row] = await this.db
      .insert(whitelistEntries)
      .values({
        id: input.id ?? crypto.randomUUID(),
        cidr: input.cidr,
        who: input.who,
        why: input.why,
        createdAt: new Date(input.createdAt),
      })
      .onConflictDoNothing({ target: whitelistEntries.cidr })
      .returning();

    if (row) return this.rowToEntry(row);

    const [existing] = await this.db
      .select()
      .from(whitelistEntries)
      .where(eq(whitelistEntries.cidr, input.cidr));

    if (!existing) {
      throw new Error(`Whitelist entry for ${input.cidr} vanished during create`);
    }
    return this.rowToEntry(existing);
  }

  async get(id: Id): Promise<WhitelistEntry | null> {
    const [row] = await this.db
      .select()
      .from(whitelistEntries)
      .where(eq(whitelistEntries.id, id));
    return row ? this.rowToEntry(row) : null;
  }

  async list(): Promise<WhitelistEntry[]> {
    const rows = await this.db
      .select()
      .from(whitelistEntries)
      .orderBy(asc(whitelistEntries.createdAt), asc(whitelistEntries.id));
    return rows.map((r) => this.rowToEntry(r));
  }

  async delete(id: Id): Promise<boolean> {
    const rows = await this.db
      .delete(whitelistEntries)
      .where(eq(whitelistEntries.id, id))
      .returning({ id: whitelistEntries.id });
    return rows.length > 0;
  }

  private rowToEntry(row: typeof whitelistEntries.$inferSelect): WhitelistEntry {
    return {
      id: row.id,
      cidr: row.cidr,
      who: row.who,
      why: row.why,
      createdAt: row.createdAt.toISOString(),
    };
  }
}
