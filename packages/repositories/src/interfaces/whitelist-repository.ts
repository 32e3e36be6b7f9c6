import type { Id, Timestamp, WhitelistEntry } from '@bhr/protocol';

/**
 * Input for creating a WhitelistEntry. `cidr` must already be canonical.
 */
export type CreateWhitelistEntryInput = {
  id?: Id;
  cidr: string;
  who: string;
  why: string;
  createdAt: Timestamp;
};

/**
 * Repository interface for protected networks.
 * Block creation only ever reads from it.
 */
export interface WhitelistRepository {
  /**
   * Create an entry, or return the existing one for the same cidr
   */
  create(input: CreateWhitelistEntryInput): Promise<WhitelistEntry>;

  get(id: Id): Promise<WhitelistEntry | null>;

  /**
   * All entries, oldest first
   */
  list(): Promise<WhitelistEntry[]>;

  /**
   * @returns true if an entry was removed
   */
  delete(id: Id): Promise<boolean>;
}
