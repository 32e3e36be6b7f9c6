// Whitelist matching - is a candidate network protected?

import { networkContains, parseNetwork } from '@bhr/protocol';
import type { Network, WhitelistEntry } from '@bhr/protocol';
import type { RepositoryContext } from '@bhr/repositories';

/**
 * Checks candidate networks against the stored whitelist.
 *
 * A candidate is whitelisted when it lies entirely inside some entry.
 * A broader candidate that merely overlaps a narrower entry is not.
 * Every call reads the entry set afresh; nothing is cached.
 */
export class WhitelistMatcher {
  constructor(private readonly repos: RepositoryContext) {}

  /**
   * The first entry (oldest first) whose network contains the candidate.
   */
  async findCovering(network: Network): Promise<WhitelistEntry | null> {
    const entries = await this.repos.whitelist.list();
    for (const entry of entries) {
      if (networkContains(parseNetwork(entry.cidr), network)) {
        return entry;
      }
    }
    return null;
  }

  async isWhitelisted(network: Network): Promise<boolean> {
    return (await this.findCovering(network)) !== null;
  }
}

export function createWhitelistMatcher(repos: RepositoryContext): WhitelistMatcher {
  return new WhitelistMatcher(repos);
}
