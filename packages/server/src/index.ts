// @bhr/server
// tRPC API over the block registry, and the process that serves it

export { appRouter, type AppRouter } from './trpc/routers/index.js';
export { createCallerFactory } from './trpc/index.js';
export {
  createServices,
  createContextFactory,
  type Context,
  type Services,
  type CreateServicesOptions,
} from './trpc/context.js';
export type { QueueEntry, UnblockQueueEntry } from './trpc/routers/agents.js';
export type { AuthContext, AuthResult } from './auth/types.js';
export { loadConfig, ConfigError, type ServerConfig } from './config.js';
