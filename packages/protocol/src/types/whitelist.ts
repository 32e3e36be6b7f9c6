// Whitelist types - networks that must never be blackholed

import type { Id, Timestamp } from './common.js';

/**
 * A protected network. Block creation refuses any network inside one of
 * these unless the caller explicitly overrides the check.
 */
export type WhitelistEntry = {
  id: Id;
  cidr: string;
  who: string;
  why: string;
  createdAt: Timestamp;
};
