// tRPC request context
//
// Services are built once per process; each request adds its own auth.

import type { CreateHTTPContextOptions } from '@trpc/server/adapters/standalone';
import type { TransactionalRepositoryContext } from '@bhr/repositories';
import {
  BlockRegistry,
  BlockViews,
  WhitelistAdmin,
  WhitelistMatcher,
  systemClock,
  type Clock,
  type Logger,
} from '@bhr/runtime';
import type { AuthContext } from '../auth/types.js';
import { getAuthFromHeaders, type AuthOptions } from '../auth/token-auth.js';
import type { StorageKind } from '../db.js';

/**
 * Long-lived services shared by every request.
 */
export type Services = {
  registry: BlockRegistry;
  views: BlockViews;
  whitelistAdmin: WhitelistAdmin;
  whitelistMatcher: WhitelistMatcher;
  logger: Logger;
  storage: StorageKind;
};

/**
 * Context available to all tRPC procedures.
 */
export type Context = Services & {
  /** Authentication context (null if not authenticated) */
  auth: AuthContext | null;
};

export type CreateServicesOptions = {
  repos: TransactionalRepositoryContext;
  logger: Logger;
  storage: StorageKind;
  clock?: Clock;
};

export function createServices(options: CreateServicesOptions): Services {
  const { repos, logger, storage } = options;
  const clock = options.clock ?? systemClock;
  const whitelistMatcher = new WhitelistMatcher(repos);

  return {
    registry: new BlockRegistry({ repos, logger, clock }),
    views: new BlockViews({ repos, clock }),
    whitelistAdmin: new WhitelistAdmin({ repos, logger, clock }),
    whitelistMatcher,
    logger,
    storage,
  };
}

/**
 * Build the createContext callback for the HTTP adapter.
 */
export function createContextFactory(services: Services, auth: AuthOptions) {
  return ({ req }: CreateHTTPContextOptions): Context => {
    const result = getAuthFromHeaders(req.headers, auth);
    return {
      ...services,
      auth: result.success ? result.auth : null,
    };
  };
}
