// Whitelist administration - the write side of the protected network set

import { normalizeCidr, validateWhitelistRequest } from '@bhr/protocol';
import type { Id, WhitelistEntry, WhitelistRequest } from '@bhr/protocol';
import type { RepositoryContext } from '@bhr/repositories';
import { BlockValidationError, WhitelistEntryNotFoundError } from '../errors.js';
import { systemClock, type Clock } from '../clock.js';
import { silentLogger, type Logger } from '../logging.js';

export type WhitelistAdminOptions = {
  repos: RepositoryContext;
  logger?: Logger;
  clock?: Clock;
};

/**
 * Adds and removes whitelist entries. Existing blocks are left alone:
 * protecting a network only affects blocks requested afterwards.
 */
export class WhitelistAdmin {
  private readonly repos: RepositoryContext;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(options: WhitelistAdminOptions) {
    this.repos = options.repos;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Protect a network. Re-adding a network returns the existing entry.
   *
   * @throws BlockValidationError if who or why is missing
   * @throws InvalidNetworkError if the cidr does not parse
   */
  async addEntry(request: WhitelistRequest): Promise<WhitelistEntry> {
    const validation = validateWhitelistRequest(request);
    if (!validation.valid) {
      throw new BlockValidationError('Invalid whitelist request', validation.errors);
    }

    const entry = await this.repos.whitelist.create({
      cidr: normalizeCidr(request.cidr),
      who: request.who,
      why: request.why,
      createdAt: this.clock().toISOString(),
    });

    this.logger.info('Whitelist entry added', { id: entry.id, cidr: entry.cidr, who: entry.who });
    return entry;
  }

  async listEntries(): Promise<WhitelistEntry[]> {
    return this.repos.whitelist.list();
  }

  /**
   * @throws WhitelistEntryNotFoundError if no entry has this id
   */
  async removeEntry(id: Id): Promise<WhitelistEntry> {
    const entry = await this.repos.whitelist.get(id);
    if (!entry || !(await this.repos.whitelist.delete(id))) {
      throw new WhitelistEntryNotFoundError(id);
    }

    this.logger.info('Whitelist entry removed', { id, cidr: entry.cidr });
    return entry;
  }
}

export function createWhitelistAdmin(options: WhitelistAdminOptions): WhitelistAdmin {
  return new WhitelistAdmin(options);
}
